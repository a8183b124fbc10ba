export * from './types';
export * from './separators';
export { analyze, configProblems, resolveConfig, separate, validateConfig } from './utils/hpss';
export type { HpssAnalysis } from './utils/hpss';
export { forwardTransform, inverseTransform, magnitudeOf, frameCount, fftSizeFor, hammingWindow, hannWindow } from './utils/stft';
export { harmonicEnhancement, percussiveEnhancement, slidingMedian, reflectIndex } from './utils/median-filter';
export { maskFromEnhancements, applyMask } from './utils/masks';
export { synthesizeStems, normalize, normalizeTogether, peakAmplitude } from './utils/synthesis';
export { designBandstop, applyBandstop, filterSections } from './utils/eq-filter';
export type { Biquad } from './utils/eq-filter';
export { signalStats, magnitudeSpectrum, spectrogramDb, decimateSpectrum, decimateSpectrogram, waveformBars, rms } from './utils/analysis';
export type { SignalStats, MagnitudeSpectrum, DbSpectrogram } from './utils/analysis';
export { decodeWav, encodeWav, createWavBlob } from './utils/wav-utils';
export type { DecodedWav } from './utils/wav-utils';
export { loadOnnxInference } from './utils/onnx-runtime';
export { SeparationError, isSeparationError, errorMessage } from './utils/errors';
export type { SeparationErrorCode } from './utils/errors';
export { createLogCollector, createConsoleLog, formatLogEntry, silentLog } from './utils/logger';
export type { LogCollector } from './utils/logger';
export { runSeparation, METHOD_LABELS, METHOD_NOTES } from './cli/run';
export type { RunOptions, RunReport, RunResult, SignalReport, SpectrumReport, SpectrogramReport } from './cli/run';
