import type {
    AddLog,
    DemucsFraming,
    DemucsInference,
    InferenceResult,
    ProgressCallback,
    StemSeparator,
    StemSet,
} from '../types';
import { DEMUCS_FRAMING } from '../types';
import {
    computeISTFT,
    computeSTFT,
    createDemucsGeometry,
    createISTFTBuffers,
    createSTFTBuffers,
} from '../utils/audio-processor';
import type { DemucsGeometry } from '../utils/audio-processor';
import { SeparationError, errorMessage, invalidParameter, isSeparationError } from '../utils/errors';
import { elapsedSeconds, silentLog } from '../utils/logger';
import { normalize } from '../utils/synthesis';

export interface DemucsSeparatorOptions {
    framing?: DemucsFraming;
    addLog?: AddLog;
    onProgress?: ProgressCallback;
}

const NUM_CHANNELS = 2;

/**
 * Allocation failures become ResourceExhausted, anything else from the
 * runtime means the model could not be used
 */
export function classifyInferenceError(error: unknown): SeparationError {
    if (isSeparationError(error)) return error;
    const message = errorMessage(error);
    if (error instanceof RangeError || /out of memory|alloc|memory/i.test(message)) {
        return new SeparationError('ResourceExhausted', `Inference ran out of resources: ${message}`, { cause: error });
    }
    return new SeparationError('ModelUnavailable', `Inference failed: ${message}`, { cause: error });
}

function checkOutputs(result: InferenceResult, numSources: number, g: DemucsGeometry): void {
    const specSize = numSources * NUM_CHANNELS * g.outBins * g.le;
    const waveSize = numSources * NUM_CHANNELS * g.segmentSamples;
    if (result.outSpecReal.length < specSize || result.outSpecImag.length < specSize || result.outWave.length < waveSize) {
        throw new SeparationError(
            'ModelUnavailable',
            `Model outputs [${result.outSpecShape.join(', ')}] / [${result.outWaveShape.join(', ')}] do not match ${numSources} sources`
        );
    }
}

/**
 * Learned separation with an exported hybrid Demucs model. Mono input is
 * duplicated to stereo, cut into half-overlapping segments with linear
 * cross-fades, and every source is folded back to mono.
 */
export class DemucsSeparator implements StemSeparator {
    readonly kind = 'learned';
    readonly label = 'Demucs';
    private readonly inference: DemucsInference;
    private readonly framing: DemucsFraming;
    private readonly addLog: AddLog;
    private readonly onProgress: ProgressCallback | undefined;

    constructor(inference: DemucsInference, options: DemucsSeparatorOptions = {}) {
        this.inference = inference;
        this.framing = options.framing ?? DEMUCS_FRAMING;
        this.addLog = options.addLog ?? silentLog;
        this.onProgress = options.onProgress;
    }

    get sources(): readonly string[] {
        return this.inference.sources;
    }

    async separate(waveform: ArrayLike<number>, sampleRate: number): Promise<StemSet> {
        const separated = await this.neuralSeparate(waveform, sampleRate);
        const stems: Record<string, Float32Array> = {};
        this.sources.forEach((source, s) => {
            stems[source] = separated[s];
        });
        return { stems, sampleRate };
    }

    /**
     * One mono waveform per model source, in the model's source order
     */
    async neuralSeparate(waveform: ArrayLike<number>, sampleRate: number): Promise<Float32Array[]> {
        const { framing } = this;
        if (sampleRate !== framing.sampleRate) {
            throw invalidParameter(`Demucs expects ${framing.sampleRate} Hz input (got ${sampleRate} Hz)`);
        }
        const numSamples = waveform.length;
        if (numSamples === 0) {
            throw new SeparationError('EmptyInput', 'Cannot separate an empty waveform');
        }

        const startTime = performance.now();
        this.addLog('Starting separation...', 'info');

        const g = createDemucsGeometry(framing, NUM_CHANNELS);
        const segmentSamples = g.segmentSamples;
        const sources = this.sources;

        const OVERLAP = Math.floor(segmentSamples * 0.5);
        const STEP = segmentSamples - OVERLAP;
        const numSegments = Math.max(1, Math.ceil((numSamples - OVERLAP) / STEP));

        const outputs = sources.map(() => new Float32Array(numSamples * NUM_CHANNELS));

        const fadeIn = new Float32Array(OVERLAP);
        const fadeOut = new Float32Array(OVERLAP);
        for (let i = 0; i < OVERLAP; i++) {
            fadeIn[i] = i / OVERLAP;
            fadeOut[i] = 1 - i / OVERLAP;
        }

        const segmentPlanar = new Float32Array(segmentSamples * NUM_CHANNELS);
        const segmentInterleaved = new Float32Array(segmentSamples * NUM_CHANNELS);
        const specBufferSize = NUM_CHANNELS * g.outBins * g.le;
        const sourceReal = new Float32Array(specBufferSize);
        const sourceImag = new Float32Array(specBufferSize);
        const stftBuffers = createSTFTBuffers(g);
        const istftBuffers = createISTFTBuffers(g);

        for (let seg = 0; seg < numSegments; seg++) {
            const segStart = seg * STEP;
            const segEnd = Math.min(segStart + segmentSamples, numSamples);
            const segLength = segEnd - segStart;

            this.onProgress?.(((seg + 1) / numSegments) * 95, `Separating segment ${seg + 1} of ${numSegments}...`);

            // Mono duplicated to both channels
            segmentPlanar.fill(0);
            segmentInterleaved.fill(0);
            for (let i = 0; i < segLength; i++) {
                const sample = waveform[segStart + i];
                segmentPlanar[i] = sample;
                segmentPlanar[segmentSamples + i] = sample;
                segmentInterleaved[i * 2] = sample;
                segmentInterleaved[i * 2 + 1] = sample;
            }

            const stft = computeSTFT(segmentInterleaved, g, stftBuffers);

            let result: InferenceResult;
            try {
                result = await this.inference.run({
                    specReal: stft.real,
                    specImag: stft.imag,
                    audio: segmentPlanar,
                    specShape: [1, NUM_CHANNELS, stft.numBins, stft.numFrames],
                    audioShape: [1, NUM_CHANNELS, segmentSamples],
                });
            } catch (error) {
                const failure = classifyInferenceError(error);
                this.addLog(`Separation failed: ${failure.message}`, 'error');
                throw failure;
            }
            checkOutputs(result, sources.length, g);

            for (let s = 0; s < sources.length; s++) {
                const specOffset = s * specBufferSize;
                sourceReal.set(result.outSpecReal.subarray(specOffset, specOffset + specBufferSize));
                sourceImag.set(result.outSpecImag.subarray(specOffset, specOffset + specBufferSize));

                const freqAudio = computeISTFT(sourceReal, sourceImag, g, segmentSamples, istftBuffers);
                const sourceWaveOffset = s * NUM_CHANNELS * segmentSamples;
                const output = outputs[s];

                for (let i = 0; i < segLength; i++) {
                    const outIdx = (segStart + i) * NUM_CHANNELS;

                    const leftVal = freqAudio[i] + result.outWave[sourceWaveOffset + i];
                    const rightVal = freqAudio[segmentSamples + i] + result.outWave[sourceWaveOffset + segmentSamples + i];

                    let weight = 1.0;
                    if (seg > 0 && i < OVERLAP) {
                        weight = fadeIn[i];
                    }
                    if (seg < numSegments - 1 && i >= segmentSamples - OVERLAP) {
                        weight = fadeOut[i - (segmentSamples - OVERLAP)];
                    }

                    output[outIdx] += leftVal * weight;
                    output[outIdx + 1] += rightVal * weight;
                }
            }
        }

        const separated = outputs.map((stereo) => {
            const mono = new Float32Array(numSamples);
            for (let i = 0; i < numSamples; i++) {
                mono[i] = (stereo[i * 2] + stereo[i * 2 + 1]) / 2;
            }
            return normalize(mono);
        });

        this.onProgress?.(100, 'Complete!');
        this.addLog(`Finished separation in ${elapsedSeconds(startTime)}s.`, 'success');
        return separated;
    }
}

/**
 * Fold learned stems into the two-stem contract: drums are percussive,
 * everything else is harmonic
 */
export function toHarmonicPercussive(stemSet: StemSet): StemSet {
    const drums = stemSet.stems['drums'];
    if (!drums) {
        throw invalidParameter(`No drums stem among: ${Object.keys(stemSet.stems).join(', ')}`);
    }
    const harmonic = new Float32Array(drums.length);
    for (const [name, stem] of Object.entries(stemSet.stems)) {
        if (name === 'drums') continue;
        for (let i = 0; i < harmonic.length; i++) {
            harmonic[i] += stem[i] ?? 0;
        }
    }
    return {
        stems: { harmonic: normalize(harmonic), percussive: normalize(drums) },
        sampleRate: stemSet.sampleRate,
    };
}
