import FFT from 'fft.js';
import type { Spectrogram } from '../types';
import { WINDOW_SUM_FLOOR } from '../types';
import { SeparationError, invalidParameter } from './errors';

const fftCache = new Map<number, FFT>();
const hannCache = new Map<number, Float64Array>();
const hammingCache = new Map<number, Float64Array>();

/**
 * Shared FFT plan for a size. Plans are read-only after construction.
 */
export function getFFT(size: number): FFT {
    let fft = fftCache.get(size);
    if (!fft) {
        fft = new FFT(size);
        fftCache.set(size, fft);
    }
    return fft;
}

/**
 * Periodic Hann window
 */
export function hannWindow(size: number): Float64Array {
    return cachedWindow(hannCache, size, i => 0.5 * (1 - Math.cos(2 * Math.PI * i / size)));
}

/**
 * Periodic Hamming window. No tap is zero, so every sample stays covered at hop == window.
 */
export function hammingWindow(size: number): Float64Array {
    return cachedWindow(hammingCache, size, i => 0.54 - 0.46 * Math.cos(2 * Math.PI * i / size));
}

function cachedWindow(cache: Map<number, Float64Array>, size: number, tap: (i: number) => number): Float64Array {
    let window = cache.get(size);
    if (!window) {
        window = new Float64Array(size);
        for (let i = 0; i < size; i++) {
            window[i] = tap(i);
        }
        cache.set(size, window);
    }
    return window;
}

export function nextPowerOfTwo(n: number): number {
    let size = 2;
    while (size < n) size *= 2;
    return size;
}

/**
 * FFT length for a window: frames are zero-padded up to the next power of two
 */
export function fftSizeFor(windowSize: number): number {
    return nextPowerOfTwo(windowSize);
}

export function transformParamProblems(windowSize: number, hopSize: number): string[] {
    const problems: string[] = [];
    if (!Number.isInteger(windowSize) || windowSize <= 0) {
        problems.push(`windowSize must be a positive integer (got ${windowSize})`);
    }
    if (!Number.isInteger(hopSize) || hopSize <= 0) {
        problems.push(`hopSize must be a positive integer (got ${hopSize})`);
    } else if (Number.isInteger(windowSize) && hopSize > windowSize) {
        problems.push(`hopSize (${hopSize}) must not exceed windowSize (${windowSize})`);
    }
    return problems;
}

function assertTransformParams(windowSize: number, hopSize: number): void {
    const problems = transformParamProblems(windowSize, hopSize);
    if (problems.length > 0) {
        throw invalidParameter(problems.join('; '));
    }
}

export function frameCount(length: number, hopSize: number): number {
    return 1 + Math.ceil(length / hopSize);
}

/**
 * Centered STFT. The signal is zero-padded by floor(windowSize / 2) on the left and
 * zero-extended on the right until the last frame starts at or past the final sample.
 * Each windowed frame is zero-padded to fftSizeFor(windowSize) before the FFT.
 */
export function forwardTransform(waveform: ArrayLike<number>, windowSize: number, hopSize: number): Spectrogram {
    assertTransformParams(windowSize, hopSize);
    const length = waveform.length;
    if (length === 0) {
        throw new SeparationError('EmptyInput', 'Cannot transform an empty waveform');
    }

    const nfft = fftSizeFor(windowSize);
    const fft = getFFT(nfft);
    const window = hammingWindow(windowSize);
    const pad = Math.floor(windowSize / 2);
    const numBins = nfft / 2 + 1;
    const numFrames = frameCount(length, hopSize);

    const real = new Float64Array(numBins * numFrames);
    const imag = new Float64Array(numBins * numFrames);
    // Tail past windowSize stays zero
    const fftInput = fft.createComplexArray();
    const fftOutput = fft.createComplexArray();

    for (let f = 0; f < numFrames; f++) {
        const frameStart = f * hopSize - pad;

        for (let i = 0; i < windowSize; i++) {
            const idx = frameStart + i;
            fftInput[i * 2] = idx >= 0 && idx < length ? waveform[idx] * window[i] : 0;
            fftInput[i * 2 + 1] = 0;
        }

        fft.transform(fftOutput, fftInput);

        for (let b = 0; b < numBins; b++) {
            real[b * numFrames + f] = fftOutput[b * 2];
            imag[b * numFrames + f] = fftOutput[b * 2 + 1];
        }
    }

    return { real, imag, numBins, numFrames, windowSize, hopSize };
}

/**
 * Overlap-add inverse of forwardTransform with sum-of-squared-window normalization.
 * Samples whose window sum is below WINDOW_SUM_FLOOR stay at zero.
 */
export function inverseTransform(
    spectrogram: Spectrogram,
    windowSize: number,
    hopSize: number,
    originalLength: number
): Float64Array {
    assertTransformParams(windowSize, hopSize);
    if (!Number.isInteger(originalLength) || originalLength <= 0) {
        throw invalidParameter(`originalLength must be a positive integer (got ${originalLength})`);
    }
    const { real, imag, numBins, numFrames } = spectrogram;
    const nfft = fftSizeFor(windowSize);
    if (numBins !== nfft / 2 + 1) {
        throw invalidParameter(`Spectrogram has ${numBins} bins, expected ${nfft / 2 + 1} for windowSize ${windowSize}`);
    }
    if (numFrames < 1 || real.length !== numBins * numFrames || imag.length !== numBins * numFrames) {
        throw invalidParameter(`Spectrogram data does not match its ${numBins}x${numFrames} shape`);
    }

    const fft = getFFT(nfft);
    const window = hammingWindow(windowSize);
    const pad = Math.floor(windowSize / 2);
    const rawLength = (numFrames - 1) * hopSize + windowSize;
    const output = new Float64Array(rawLength);
    const windowSum = new Float64Array(rawLength);
    const ifftInput = fft.createComplexArray();
    const ifftOutput = fft.createComplexArray();

    for (let f = 0; f < numFrames; f++) {
        for (let b = 0; b < numBins; b++) {
            ifftInput[b * 2] = real[b * numFrames + f];
            ifftInput[b * 2 + 1] = imag[b * numFrames + f];
        }
        for (let b = 1; b < numBins - 1; b++) {
            const negIdx = nfft - b;
            ifftInput[negIdx * 2] = ifftInput[b * 2];
            ifftInput[negIdx * 2 + 1] = -ifftInput[b * 2 + 1];
        }

        fft.inverseTransform(ifftOutput, ifftInput);

        // Only the first windowSize samples carry the frame
        const frameStart = f * hopSize;
        for (let i = 0; i < windowSize; i++) {
            output[frameStart + i] += ifftOutput[i * 2] * window[i];
            windowSum[frameStart + i] += window[i] * window[i];
        }
    }

    const result = new Float64Array(originalLength);
    const available = Math.min(originalLength, rawLength - pad);
    for (let i = 0; i < available; i++) {
        const w = windowSum[pad + i];
        result[i] = w > WINDOW_SUM_FLOOR ? output[pad + i] / w : 0;
    }
    return result;
}

export function magnitudeOf(spectrogram: Spectrogram): Float64Array {
    const { real, imag } = spectrogram;
    const magnitude = new Float64Array(real.length);
    for (let i = 0; i < real.length; i++) {
        magnitude[i] = Math.hypot(real[i], imag[i]);
    }
    return magnitude;
}
