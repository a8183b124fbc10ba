#!/usr/bin/env tsx
/**
 * Separate a WAV file into harmonic and percussive stems.
 *
 * Run: npm run separate -- mix.wav --out stems --method hpss-eq --notch-low 80 --notch-high 250
 */

import { parseArgs } from 'node:util';
import type { HpssConfig, MaskMode, ModelType, SeparationMethod } from './types';
import { MODEL_SOURCES } from './types';
import { runSeparation } from './cli/run';
import { errorMessage, invalidParameter, isSeparationError } from './utils/errors';
import { createConsoleLog } from './utils/logger';

const USAGE = `Usage: separate <input.wav> [options]

  --out <dir>            output directory (default: ./separated)
  --method <name>        hpss | hpss-eq | demucs (default: hpss)
  --window <n>           STFT window size (default: 2048)
  --hop <n>              STFT hop size (default: 512)
  --time-filter <n>      harmonic median length, odd (default: 31)
  --freq-filter <n>      percussive median length, odd (default: 31)
  --power <p>            soft-mask exponent (default: 2)
  --mode <mode>          soft | binary (default: soft)
  --notch-low <hz>       band-stop low edge for hpss-eq (default: 10)
  --notch-high <hz>      band-stop high edge for hpss-eq (default: 4000)
  --model <file.onnx>    exported Demucs model for --method demucs
  --model-type <name>    htdemucs | htdemucs_6s | hdemucs_mmi (default: htdemucs)
  --timeout <ms>         abort separation after this long
  --retries <n>          retries after the runtime runs out of memory (default: 0)`;

const METHODS: readonly SeparationMethod[] = ['hpss', 'hpss-eq', 'demucs'];
const MODES: readonly MaskMode[] = ['soft', 'binary'];

function pick<T extends string>(flag: string, value: string | undefined, choices: readonly T[]): T | undefined {
    if (value === undefined) return undefined;
    const match = choices.find(choice => choice === value);
    if (!match) {
        throw invalidParameter(`--${flag} must be one of ${choices.join(', ')} (got '${value}')`);
    }
    return match;
}

function numberFlag(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw invalidParameter(`--${flag} must be a number (got '${value}')`);
    }
    return parsed;
}

function isModelType(value: string): value is ModelType {
    return value in MODEL_SOURCES;
}

async function main(argv: string[]): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'out': { type: 'string' },
            'method': { type: 'string' },
            'window': { type: 'string' },
            'hop': { type: 'string' },
            'time-filter': { type: 'string' },
            'freq-filter': { type: 'string' },
            'power': { type: 'string' },
            'mode': { type: 'string' },
            'notch-low': { type: 'string' },
            'notch-high': { type: 'string' },
            'model': { type: 'string' },
            'model-type': { type: 'string' },
            'timeout': { type: 'string' },
            'retries': { type: 'string' },
            'help': { type: 'boolean', short: 'h' },
        },
    });

    if (values.help || positionals.length !== 1) {
        console.log(USAGE);
        return values.help ? 0 : 1;
    }

    const modelType = values['model-type'];
    if (modelType !== undefined && !isModelType(modelType)) {
        throw invalidParameter(`--model-type must be one of ${Object.keys(MODEL_SOURCES).join(', ')}`);
    }

    const config: Partial<HpssConfig> = {
        windowSize: numberFlag('window', values.window),
        hopSize: numberFlag('hop', values.hop),
        filterLengthTime: numberFlag('time-filter', values['time-filter']),
        filterLengthFreq: numberFlag('freq-filter', values['freq-filter']),
        power: numberFlag('power', values.power),
        mode: pick('mode', values.mode, MODES),
    };

    const outDir = values.out ?? 'separated';
    const { report, files } = await runSeparation({
        inputPath: positionals[0],
        outDir,
        method: pick('method', values.method, METHODS) ?? 'hpss',
        config,
        notch: {
            lowHz: numberFlag('notch-low', values['notch-low']),
            highHz: numberFlag('notch-high', values['notch-high']),
        },
        modelPath: values.model,
        modelType,
        timeoutMs: numberFlag('timeout', values.timeout),
        retries: numberFlag('retries', values.retries),
        addLog: createConsoleLog('separate'),
    });

    console.log(`OK: ${report.methodLabel}, ${files.length} files in ${outDir}`);
    return 0;
}

main(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
        const code = isSeparationError(error) ? error.code : 'Error';
        console.error(`${code}: ${errorMessage(error)}`);
        process.exit(1);
    }
);
