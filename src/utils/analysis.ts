import { DEFAULT_HOP_SIZE, DEFAULT_WINDOW_SIZE } from '../types';
import { SeparationError, invalidParameter } from './errors';
import { forwardTransform, getFFT, magnitudeOf, nextPowerOfTwo } from './stft';
import { peakAmplitude } from './synthesis';

export interface SignalStats {
    /** Seconds */
    duration: number;
    rms: number;
    peak: number;
}

export interface MagnitudeSpectrum {
    frequencies: Float64Array;
    magnitudes: Float64Array;
}

export interface DbSpectrogram {
    db: Float64Array;
    numBins: number;
    numFrames: number;
}

function assertNonEmpty(waveform: ArrayLike<number>): void {
    if (waveform.length === 0) {
        throw new SeparationError('EmptyInput', 'Cannot analyze an empty waveform');
    }
}

export function rms(samples: ArrayLike<number>, start = 0, end = samples.length): number {
    if (end <= start) return 0;
    let sumSquares = 0;
    for (let i = start; i < end; i++) {
        sumSquares += samples[i] * samples[i];
    }
    return Math.sqrt(sumSquares / (end - start));
}

export function signalStats(waveform: ArrayLike<number>, sampleRate: number): SignalStats {
    if (!(sampleRate > 0)) {
        throw invalidParameter(`sampleRate must be positive (got ${sampleRate})`);
    }
    return {
        duration: waveform.length / sampleRate,
        rms: rms(waveform),
        peak: peakAmplitude(waveform),
    };
}

/**
 * Magnitude of the real FFT of the whole signal (zero-padded to a power of
 * two), bins above maxFrequency dropped
 */
export function magnitudeSpectrum(
    waveform: ArrayLike<number>,
    sampleRate: number,
    maxFrequency: number = sampleRate / 2
): MagnitudeSpectrum {
    assertNonEmpty(waveform);
    if (!(sampleRate > 0)) {
        throw invalidParameter(`sampleRate must be positive (got ${sampleRate})`);
    }

    const size = nextPowerOfTwo(waveform.length);
    const fft = getFFT(size);
    const input = fft.createComplexArray();
    const output = fft.createComplexArray();
    for (let i = 0; i < waveform.length; i++) {
        input[i * 2] = waveform[i];
    }
    fft.transform(output, input);

    const binHz = sampleRate / size;
    const lastBin = Math.min(size / 2, Math.floor(maxFrequency / binHz));
    const frequencies = new Float64Array(lastBin + 1);
    const magnitudes = new Float64Array(lastBin + 1);
    for (let k = 0; k <= lastBin; k++) {
        frequencies[k] = k * binHz;
        magnitudes[k] = Math.hypot(output[k * 2], output[k * 2 + 1]);
    }
    return { frequencies, magnitudes };
}

/**
 * Spectrogram in dB relative to its loudest bin, floored at -topDb
 */
export function spectrogramDb(
    waveform: ArrayLike<number>,
    windowSize = DEFAULT_WINDOW_SIZE,
    hopSize = DEFAULT_HOP_SIZE,
    topDb = 80
): DbSpectrogram {
    const spectrogram = forwardTransform(waveform, windowSize, hopSize);
    const magnitude = magnitudeOf(spectrogram);
    const amin = 1e-5;

    let ref = 0;
    for (let i = 0; i < magnitude.length; i++) {
        if (magnitude[i] > ref) ref = magnitude[i];
    }
    const refDb = 20 * Math.log10(Math.max(amin, ref));

    const db = new Float64Array(magnitude.length);
    let maxDb = -Infinity;
    for (let i = 0; i < magnitude.length; i++) {
        db[i] = 20 * Math.log10(Math.max(amin, magnitude[i])) - refDb;
        if (db[i] > maxDb) maxDb = db[i];
    }
    const floor = maxDb - topDb;
    for (let i = 0; i < db.length; i++) {
        if (db[i] < floor) db[i] = floor;
    }
    return { db, numBins: spectrogram.numBins, numFrames: spectrogram.numFrames };
}

/**
 * RMS per bar scaled for display: 15 (quiet) to 100 (loud)
 */
export function waveformBars(audioData: ArrayLike<number>, numBars = 60): number[] {
    const samplesPerBar = Math.max(1, Math.floor(audioData.length / numBars));
    const bars: number[] = [];

    for (let i = 0; i < numBars; i++) {
        const start = i * samplesPerBar;
        const end = Math.min(start + samplesPerBar, audioData.length);

        // Audio RMS is typically 0-0.3, scale to 0-100
        const barHeight = Math.min(100, Math.max(15, rms(audioData, start, end) * 300));
        bars.push(barHeight);
    }

    return bars;
}

/**
 * Max-pool a spectrum down to at most maxPoints points. Each point keeps the
 * frequency of its first bin.
 */
export function decimateSpectrum(spectrum: MagnitudeSpectrum, maxPoints: number): MagnitudeSpectrum {
    const { frequencies, magnitudes } = spectrum;
    const factor = Math.max(1, Math.ceil(magnitudes.length / maxPoints));
    const count = Math.ceil(magnitudes.length / factor);

    const outFrequencies = new Float64Array(count);
    const outMagnitudes = new Float64Array(count);
    for (let p = 0; p < count; p++) {
        const end = Math.min(magnitudes.length, (p + 1) * factor);
        let peak = 0;
        for (let k = p * factor; k < end; k++) {
            if (magnitudes[k] > peak) peak = magnitudes[k];
        }
        outFrequencies[p] = frequencies[p * factor];
        outMagnitudes[p] = peak;
    }
    return { frequencies: outFrequencies, magnitudes: outMagnitudes };
}

/**
 * Max-pool a dB spectrogram to at most maxBins x maxFrames cells, bin-major
 */
export function decimateSpectrogram(spectrogram: DbSpectrogram, maxBins: number, maxFrames: number): DbSpectrogram {
    const { db, numBins, numFrames } = spectrogram;
    const binFactor = Math.max(1, Math.ceil(numBins / maxBins));
    const frameFactor = Math.max(1, Math.ceil(numFrames / maxFrames));
    const outBins = Math.ceil(numBins / binFactor);
    const outFrames = Math.ceil(numFrames / frameFactor);

    const out = new Float64Array(outBins * outFrames).fill(-Infinity);
    for (let b = 0; b < numBins; b++) {
        const row = Math.floor(b / binFactor) * outFrames;
        for (let f = 0; f < numFrames; f++) {
            const value = db[b * numFrames + f];
            const cell = row + Math.floor(f / frameFactor);
            if (value > out[cell]) out[cell] = value;
        }
    }
    return { db: out, numBins: outBins, numFrames: outFrames };
}
