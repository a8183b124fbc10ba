import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { AddLog, DemucsFraming, DemucsInference, HpssConfig, ModelType, SeparationMethod, StemSet } from '../types';
import { DEFAULT_EQ_ORDER, DEFAULT_NOTCH_HIGH_HZ, DEFAULT_NOTCH_LOW_HZ } from '../types';
import { withSeparationBoundary } from '../separators/boundary';
import { DemucsSeparator, toHarmonicPercussive } from '../separators/demucs-separator';
import { HpssSeparator } from '../separators/hpss-separator';
import type { NotchSettings } from '../separators/hpss-separator';
import {
    decimateSpectrogram,
    decimateSpectrum,
    magnitudeSpectrum,
    signalStats,
    spectrogramDb,
    waveformBars,
} from '../utils/analysis';
import type { SignalStats } from '../utils/analysis';
import { invalidParameter } from '../utils/errors';
import { silentLog } from '../utils/logger';
import { loadOnnxInference } from '../utils/onnx-runtime';
import { decodeWav, encodeWav } from '../utils/wav-utils';

export const METHOD_LABELS: Record<SeparationMethod, string> = {
    'hpss': 'HPSS (analytical, fast)',
    'hpss-eq': 'HPSS + EQ filtering',
    'demucs': 'Demucs (learned)',
};

export const METHOD_NOTES: Record<SeparationMethod, string> = {
    'hpss':
        'Median filtering along time keeps sustained, tonal partials in the harmonic stem; ' +
        'median filtering along frequency keeps broadband transients in the percussive stem. ' +
        'Soft masks built from the two enhanced magnitudes split the mixture spectrogram.',
    'hpss-eq':
        'After HPSS a Butterworth band-stop filter is run over the harmonic stem to attenuate ' +
        'percussive bleed left in the notched band. The unfiltered harmonic stem is kept alongside.',
    'demucs':
        'A hybrid time/spectrogram network separates drums, bass, other and vocals. ' +
        'Percussion lands mostly in drums.wav; sustained melodic parts mostly in other.wav.',
};

export interface RunOptions {
    inputPath: string;
    outDir: string;
    method: SeparationMethod;
    config?: Partial<HpssConfig>;
    /** Used by `hpss-eq`; defaults to 10-4000 Hz, order 4 */
    notch?: Partial<NotchSettings>;
    modelPath?: string;
    modelType?: ModelType;
    /** Pre-loaded model, takes precedence over `modelPath` */
    inference?: DemucsInference;
    /** Segment geometry of the exported model, 44.1 kHz htdemucs framing by default */
    framing?: DemucsFraming;
    timeoutMs?: number;
    retries?: number;
    addLog?: AddLog;
}

// Plot data limits per signal
const SPECTRUM_MAX_HZ = 5000;
const SPECTRUM_POINTS = 512;
const SPECTROGRAM_BINS = 128;
const SPECTROGRAM_FRAMES = 256;

export interface SpectrumReport {
    frequencies: number[];
    magnitudes: number[];
}

export interface SpectrogramReport {
    numBins: number;
    numFrames: number;
    /** Frequency of the top bin row */
    maxFrequency: number;
    /** dB relative to the loudest cell, bin-major, 0.01 dB steps */
    db: number[];
}

export interface SignalReport {
    label: string;
    /** null for the input mix */
    file: string | null;
    stats: SignalStats;
    bars: number[];
    /** FFT magnitude from 0 to 5 kHz, max-pooled */
    spectrum: SpectrumReport;
    spectrogram: SpectrogramReport;
}

export interface RunReport {
    input: string;
    sampleRate: number;
    method: SeparationMethod;
    methodLabel: string;
    methodNote: string;
    notch: Required<NotchSettings> | null;
    config: HpssConfig | null;
    signals: SignalReport[];
}

export interface RunResult {
    report: RunReport;
    /** Paths of everything written, report last */
    files: string[];
}

function signalReport(label: string, file: string | null, samples: Float32Array, sampleRate: number): SignalReport {
    const spectrum = decimateSpectrum(magnitudeSpectrum(samples, sampleRate, SPECTRUM_MAX_HZ), SPECTRUM_POINTS);
    const spectrogram = decimateSpectrogram(spectrogramDb(samples), SPECTROGRAM_BINS, SPECTROGRAM_FRAMES);
    return {
        label,
        file,
        stats: signalStats(samples, sampleRate),
        bars: waveformBars(samples),
        spectrum: {
            frequencies: Array.from(spectrum.frequencies),
            magnitudes: Array.from(spectrum.magnitudes),
        },
        spectrogram: {
            numBins: spectrogram.numBins,
            numFrames: spectrogram.numFrames,
            maxFrequency: sampleRate / 2,
            // `|| 0` folds -0 so the JSON reads back equal
            db: Array.from(spectrogram.db, v => Math.round(v * 100) / 100 || 0),
        },
    };
}

async function runDemucs(
    samples: Float32Array,
    sampleRate: number,
    options: RunOptions,
    addLog: AddLog
): Promise<StemSet> {
    let inference = options.inference;
    let owned = false;
    if (!inference) {
        if (!options.modelPath) {
            throw invalidParameter('The demucs method needs a model path');
        }
        inference = await loadOnnxInference(options.modelPath, options.modelType ?? 'htdemucs', addLog);
        owned = true;
    }

    const separator = new DemucsSeparator(inference, { framing: options.framing, addLog });
    try {
        return await withSeparationBoundary(() => separator.separate(samples, sampleRate), {
            timeoutMs: options.timeoutMs,
            retries: options.retries,
            addLog,
        });
    } finally {
        if (owned) {
            await inference.release();
        }
    }
}

/**
 * Read a WAV file, separate it, and write stems plus report.json to `outDir`
 */
export async function runSeparation(options: RunOptions): Promise<RunResult> {
    const addLog = options.addLog ?? silentLog;
    const { method, outDir } = options;

    addLog(`Loading audio: ${options.inputPath}`, 'info');
    const wav = decodeWav(await readFile(options.inputPath));
    const { samples, sampleRate } = wav;
    addLog(`Audio loaded: ${(samples.length / sampleRate).toFixed(2)}s, ${sampleRate} Hz, ${wav.numChannels} channel(s)`, 'success');

    let notch: Required<NotchSettings> | null = null;
    let config: HpssConfig | null = null;
    const outputs: [name: string, label: string, samples: Float32Array][] = [];

    if (method === 'demucs') {
        const stemSet = await runDemucs(samples, sampleRate, options, addLog);
        const folded = toHarmonicPercussive(stemSet);
        outputs.push(['harmonic', 'Harmonic (all but drums)', folded.stems['harmonic']]);
        outputs.push(['percussive', 'Percussive (drums)', folded.stems['percussive']]);
        for (const [source, stem] of Object.entries(stemSet.stems)) {
            outputs.push([source, source.charAt(0).toUpperCase() + source.slice(1), stem]);
        }
    } else {
        if (method === 'hpss-eq') {
            notch = {
                lowHz: options.notch?.lowHz ?? DEFAULT_NOTCH_LOW_HZ,
                highHz: options.notch?.highHz ?? DEFAULT_NOTCH_HIGH_HZ,
                order: options.notch?.order ?? DEFAULT_EQ_ORDER,
            };
        }
        const separator = new HpssSeparator({ config: options.config, notch: notch ?? undefined, addLog });
        config = separator.config;
        const { stems } = await withSeparationBoundary(() => separator.separate(samples, sampleRate), {
            timeoutMs: options.timeoutMs,
            addLog,
        });
        outputs.push(['harmonic', 'Harmonic', stems['harmonic']]);
        if (stems['harmonic_eq']) {
            outputs.push(['harmonic_eq', 'Harmonic (EQ cleaned)', stems['harmonic_eq']]);
        }
        outputs.push(['percussive', 'Percussive', stems['percussive']]);
    }

    await mkdir(outDir, { recursive: true });
    const files: string[] = [];
    const signals: SignalReport[] = [signalReport('Original mix', null, samples, sampleRate)];

    for (const [name, label, stem] of outputs) {
        const file = `${name}.wav`;
        const path = join(outDir, file);
        await writeFile(path, new Uint8Array(encodeWav(stem, sampleRate)));
        files.push(path);
        signals.push(signalReport(label, file, stem, sampleRate));
        addLog(`Wrote ${path}`, 'info');
    }

    const report: RunReport = {
        input: basename(options.inputPath),
        sampleRate,
        method,
        methodLabel: METHOD_LABELS[method],
        methodNote: METHOD_NOTES[method],
        notch,
        config,
        signals,
    };
    const reportPath = join(outDir, 'report.json');
    await writeFile(reportPath, JSON.stringify(report, null, 2));
    files.push(reportPath);
    addLog(`Wrote ${reportPath}`, 'success');

    return { report, files };
}
