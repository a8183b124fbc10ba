export interface LogEntry {
    timestamp: Date;
    message: string;
    type: 'info' | 'success' | 'error';
}

export type AddLog = (message: string, type?: LogEntry['type']) => void;

/**
 * Complex time-frequency grid, bin-major: index = bin * numFrames + frame
 */
export interface Spectrogram {
    real: Float64Array;
    imag: Float64Array;
    numBins: number;
    numFrames: number;
    windowSize: number;
    hopSize: number;
}

export type MaskMode = 'soft' | 'binary';

export interface HpssConfig {
    windowSize: number;
    hopSize: number;
    /** Median length along time (harmonic enhancement), odd */
    filterLengthTime: number;
    /** Median length along frequency (percussive enhancement), odd */
    filterLengthFreq: number;
    power: number;
    mode: MaskMode;
}

export interface TransformParams {
    windowSize: number;
    hopSize: number;
}

export interface MaskPair {
    harmonic: Float64Array;
    percussive: Float64Array;
}

export interface HpssResult {
    harmonic: Float32Array;
    percussive: Float32Array;
}

export interface StemSet {
    stems: Record<string, Float32Array>;
    sampleRate: number;
}

export const DEFAULT_WINDOW_SIZE = 2048;
export const DEFAULT_HOP_SIZE = DEFAULT_WINDOW_SIZE / 4;
export const DEFAULT_FILTER_LENGTH = 31;
export const DEFAULT_POWER = 2;
export const DEFAULT_MODE: MaskMode = 'soft';

export const DEFAULT_CONFIG: Readonly<HpssConfig> = {
    windowSize: DEFAULT_WINDOW_SIZE,
    hopSize: DEFAULT_HOP_SIZE,
    filterLengthTime: DEFAULT_FILTER_LENGTH,
    filterLengthFreq: DEFAULT_FILTER_LENGTH,
    power: DEFAULT_POWER,
    mode: DEFAULT_MODE,
};

export const MASK_EPSILON = 1e-12;
export const WINDOW_SUM_FLOOR = 1e-10;

// Demucs (hybrid transformer) export framing
export const SOURCES = ['drums', 'bass', 'other', 'vocals'] as const;
export type SourceName = typeof SOURCES[number];

export const SAMPLE_RATE = 44100;
export const NFFT = 4096;
export const HOP_LENGTH = NFFT / 4;
export const SEGMENT_SECONDS = 10;
export const SEGMENT_SAMPLES = SEGMENT_SECONDS * SAMPLE_RATE;

export interface DemucsFraming {
    sampleRate: number;
    nfft: number;
    hopLength: number;
    segmentSamples: number;
}

export const DEMUCS_FRAMING: Readonly<DemucsFraming> = {
    sampleRate: SAMPLE_RATE,
    nfft: NFFT,
    hopLength: HOP_LENGTH,
    segmentSamples: SEGMENT_SAMPLES,
};

export interface STFTResult {
    real: Float32Array;
    imag: Float32Array;
    numBins: number;
    numFrames: number;
}

export type SeparationMethod = 'hpss' | 'hpss-eq' | 'demucs';

// Band the original app notches out of the harmonic stem
export const DEFAULT_NOTCH_LOW_HZ = 10;
export const DEFAULT_NOTCH_HIGH_HZ = 4000;
export const DEFAULT_EQ_ORDER = 4;

export type ModelType = 'htdemucs' | 'htdemucs_6s' | 'hdemucs_mmi';

// Must match the order in the trained model
export const MODEL_SOURCES: Record<ModelType, string[]> = {
    'htdemucs': [...SOURCES],
    'htdemucs_6s': ['drums', 'bass', 'guitar', 'piano', 'other', 'vocals'],
    'hdemucs_mmi': [...SOURCES],
};

export interface InferenceInput {
    specReal: Float32Array;
    specImag: Float32Array;
    audio: Float32Array;
    specShape: number[];
    audioShape: number[];
}

export interface InferenceResult {
    outSpecReal: Float32Array;
    outSpecImag: Float32Array;
    outWave: Float32Array;
    outSpecShape: number[];
    outWaveShape: number[];
}

/**
 * A loaded Demucs-style model: spectrogram + waveform in, per-source
 * spectrogram + waveform out
 */
export interface DemucsInference {
    readonly sources: readonly string[];
    run(input: InferenceInput): Promise<InferenceResult>;
    release(): Promise<void>;
}

export type ProgressCallback = (progress: number, status: string) => void;

/**
 * Interchangeable separation back ends: the median-filter engine and the learned model
 */
export interface StemSeparator {
    readonly kind: 'algorithmic' | 'learned';
    readonly label: string;
    separate(waveform: ArrayLike<number>, sampleRate: number): Promise<StemSet>;
}
