import type { HpssConfig, HpssResult, MaskPair, Spectrogram } from '../types';
import { DEFAULT_CONFIG } from '../types';
import { SeparationError, invalidParameter } from './errors';
import { maskFromEnhancements, powerProblems } from './masks';
import { filterLengthProblems, harmonicEnhancement, percussiveEnhancement } from './median-filter';
import { forwardTransform, magnitudeOf, transformParamProblems } from './stft';
import { normalizeTogether, synthesizeStems } from './synthesis';

export function resolveConfig(config: Partial<HpssConfig> = {}): HpssConfig {
    return {
        windowSize: config.windowSize ?? DEFAULT_CONFIG.windowSize,
        hopSize: config.hopSize ?? DEFAULT_CONFIG.hopSize,
        filterLengthTime: config.filterLengthTime ?? DEFAULT_CONFIG.filterLengthTime,
        filterLengthFreq: config.filterLengthFreq ?? DEFAULT_CONFIG.filterLengthFreq,
        power: config.power ?? DEFAULT_CONFIG.power,
        mode: config.mode ?? DEFAULT_CONFIG.mode,
    };
}

/**
 * Every problem with a configuration, empty when it is usable
 */
export function configProblems(config: HpssConfig): string[] {
    const problems = [
        ...transformParamProblems(config.windowSize, config.hopSize),
        ...filterLengthProblems('filterLengthTime', config.filterLengthTime),
        ...filterLengthProblems('filterLengthFreq', config.filterLengthFreq),
        ...powerProblems(config.power),
    ];
    if (config.mode !== 'soft' && config.mode !== 'binary') {
        problems.push(`mode must be 'soft' or 'binary' (got ${String(config.mode)})`);
    }
    return problems;
}

export function validateConfig(config: HpssConfig): void {
    const problems = configProblems(config);
    if (problems.length > 0) {
        throw invalidParameter(`Invalid configuration: ${problems.join('; ')}`);
    }
}

function validateInput(waveform: ArrayLike<number>, sampleRate: number): void {
    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
        throw invalidParameter(`sampleRate must be a positive integer (got ${sampleRate})`);
    }
    if (waveform.length === 0) {
        throw new SeparationError('EmptyInput', 'Cannot separate an empty waveform');
    }
    for (let i = 0; i < waveform.length; i++) {
        if (!Number.isFinite(waveform[i])) {
            throw invalidParameter(`Waveform sample ${i} is not finite (${waveform[i]})`);
        }
    }
}

export interface HpssAnalysis {
    spectrogram: Spectrogram;
    harmonicEnhanced: Float64Array;
    percussiveEnhanced: Float64Array;
    masks: MaskPair;
}

/**
 * Transform and classify without synthesizing, for inspection and tests
 */
export function analyze(waveform: ArrayLike<number>, config: HpssConfig): HpssAnalysis {
    const spectrogram = forwardTransform(waveform, config.windowSize, config.hopSize);
    const { numBins, numFrames } = spectrogram;

    // Each filter gets its own magnitude copy
    const harmonicEnhanced = harmonicEnhancement(magnitudeOf(spectrogram), numBins, numFrames, config.filterLengthTime);
    const percussiveEnhanced = percussiveEnhancement(magnitudeOf(spectrogram), numBins, numFrames, config.filterLengthFreq);

    const masks = maskFromEnhancements(harmonicEnhanced, percussiveEnhanced, config.power, config.mode);
    return { spectrogram, harmonicEnhanced, percussiveEnhanced, masks };
}

/**
 * Split a mono waveform into harmonic and percussive stems of the same length.
 * Configuration is checked before any transform work; either both stems are
 * produced or a SeparationError is thrown. Loud stems share one scale factor.
 */
export function separate(
    waveform: ArrayLike<number>,
    sampleRate: number,
    config: Partial<HpssConfig> = {}
): HpssResult {
    const resolved = resolveConfig(config);
    validateConfig(resolved);
    validateInput(waveform, sampleRate);

    const { spectrogram, masks } = analyze(waveform, resolved);
    const stems = synthesizeStems(spectrogram, masks.harmonic, masks.percussive, resolved, waveform.length);
    return normalizeTogether(stems);
}
