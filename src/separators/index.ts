export { withSeparationBoundary } from './boundary';
export type { BoundaryOptions } from './boundary';
export { DemucsSeparator, classifyInferenceError, toHarmonicPercussive } from './demucs-separator';
export type { DemucsSeparatorOptions } from './demucs-separator';
export { HpssSeparator } from './hpss-separator';
export type { HpssSeparatorOptions, NotchSettings } from './hpss-separator';
