import type { MaskMode, MaskPair, Spectrogram } from '../types';
import { MASK_EPSILON } from '../types';
import { invalidParameter } from './errors';

export function powerProblems(power: number): string[] {
    if (!Number.isFinite(power) || power <= 0) {
        return [`power must be a positive finite number (got ${power})`];
    }
    return [];
}

/**
 * Soft (Wiener-like) or binary masks from the two enhanced magnitudes.
 *
 * Soft: mask = enh^p / (H^p + P^p + eps), computed on values scaled by max(H, P)
 * so the denominator never under- or overflows. Bins where both enhancements
 * are zero get 0.5 / 0.5.
 *
 * Binary: every bin goes to the larger enhancement, ties to harmonic.
 */
export function maskFromEnhancements(
    harmonicEnh: Float64Array,
    percussiveEnh: Float64Array,
    power: number,
    mode: MaskMode
): MaskPair {
    const powerIssues = powerProblems(power);
    if (powerIssues.length > 0) {
        throw invalidParameter(powerIssues[0]);
    }
    if (harmonicEnh.length !== percussiveEnh.length) {
        throw invalidParameter(
            `Enhancement shapes differ (${harmonicEnh.length} vs ${percussiveEnh.length} bins)`
        );
    }

    const n = harmonicEnh.length;
    const harmonic = new Float64Array(n);
    const percussive = new Float64Array(n);

    if (mode === 'binary') {
        for (let i = 0; i < n; i++) {
            const isHarmonic = harmonicEnh[i] >= percussiveEnh[i];
            harmonic[i] = isHarmonic ? 1 : 0;
            percussive[i] = isHarmonic ? 0 : 1;
        }
        return { harmonic, percussive };
    }

    for (let i = 0; i < n; i++) {
        const h = harmonicEnh[i];
        const p = percussiveEnh[i];
        const z = Math.max(h, p);
        if (!(z > Number.MIN_VALUE)) {
            harmonic[i] = 0.5;
            percussive[i] = 0.5;
            continue;
        }
        const hp = Math.pow(h / z, power);
        const pp = Math.pow(p / z, power);
        const denom = hp + pp + MASK_EPSILON;
        harmonic[i] = hp / denom;
        percussive[i] = pp / denom;
    }
    return { harmonic, percussive };
}

/**
 * Scale each bin's magnitude by the mask, keeping its phase
 */
export function applyMask(spectrogram: Spectrogram, mask: Float64Array): Spectrogram {
    const { real, imag } = spectrogram;
    if (mask.length !== real.length) {
        throw invalidParameter(
            `Mask has ${mask.length} bins, spectrogram has ${spectrogram.numBins}x${spectrogram.numFrames}`
        );
    }
    const maskedReal = new Float64Array(real.length);
    const maskedImag = new Float64Array(imag.length);
    for (let i = 0; i < real.length; i++) {
        maskedReal[i] = real[i] * mask[i];
        maskedImag[i] = imag[i] * mask[i];
    }
    return { ...spectrogram, real: maskedReal, imag: maskedImag };
}
