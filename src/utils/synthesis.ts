import type { HpssResult, Spectrogram, TransformParams } from '../types';
import { SeparationError } from './errors';
import { applyMask } from './masks';
import { inverseTransform } from './stft';

/**
 * Mask the same spectrogram twice and invert both. With soft masks the two
 * stems add back up to the mixture, up to the transform's own error.
 */
export function synthesizeStems(
    spectrogram: Spectrogram,
    harmonicMask: Float64Array,
    percussiveMask: Float64Array,
    params: TransformParams,
    originalLength: number
): HpssResult {
    const harmonicSpec = applyMask(spectrogram, harmonicMask);
    const percussiveSpec = applyMask(spectrogram, percussiveMask);

    const harmonic = toStem(inverseTransform(harmonicSpec, params.windowSize, params.hopSize, originalLength), 'harmonic');
    const percussive = toStem(inverseTransform(percussiveSpec, params.windowSize, params.hopSize, originalLength), 'percussive');

    return { harmonic, percussive };
}

function toStem(samples: Float64Array, name: string): Float32Array {
    const stem = new Float32Array(samples.length);
    for (let i = 0; i < samples.length; i++) {
        const v = samples[i];
        if (!Number.isFinite(v)) {
            throw new SeparationError('NumericInstability', `Non-finite sample at ${i} in ${name} stem`);
        }
        stem[i] = v;
    }
    return stem;
}

export function peakAmplitude(waveform: ArrayLike<number>): number {
    let peak = 0;
    for (let i = 0; i < waveform.length; i++) {
        const a = Math.abs(waveform[i]);
        if (a > peak) peak = a;
    }
    return peak;
}

/**
 * Divide by the peak when it exceeds 1. Silent and in-range stems come back as they are.
 */
export function normalize(waveform: Float32Array): Float32Array {
    const peak = peakAmplitude(waveform);
    return peak > 1 ? divideBy(waveform, peak) : waveform;
}

/**
 * Divide both stems by the larger of their peaks when it exceeds 1, so their
 * sum stays proportional to the mixture.
 */
export function normalizeTogether(stems: HpssResult): HpssResult {
    const peak = Math.max(peakAmplitude(stems.harmonic), peakAmplitude(stems.percussive));
    if (peak <= 1) {
        return stems;
    }
    return { harmonic: divideBy(stems.harmonic, peak), percussive: divideBy(stems.percussive, peak) };
}

function divideBy(waveform: Float32Array, peak: number): Float32Array {
    const scaled = new Float32Array(waveform.length);
    for (let i = 0; i < waveform.length; i++) {
        scaled[i] = waveform[i] / peak;
    }
    return scaled;
}
