/**
 * Demucs-compatible spectrogram framing for the learned separation path.
 *
 * Mirrors the hybrid model's export: reflect padding around each segment,
 * a centered normalized STFT, the Nyquist bin dropped and two frames trimmed
 * on each side. The inverse undoes the same steps. Stereo audio is interleaved
 * on input; spectra and output are channel-planar.
 */

import type { DemucsFraming, STFTResult } from '../types';
import { getFFT, hannWindow } from './stft';

export interface DemucsGeometry {
    nfft: number;
    hopLength: number;
    segmentSamples: number;
    numChannels: number;
    /** Frames kept per segment */
    le: number;
    demucsPad: number;
    demucsPaddedLength: number;
    centerPad: number;
    paddedLength: number;
    rawFrames: number;
    numBins: number;
    outBins: number;
    istftPad: number;
    istftLength: number;
}

export function createDemucsGeometry(framing: DemucsFraming, numChannels = 2): DemucsGeometry {
    const { nfft, hopLength, segmentSamples } = framing;
    const le = Math.ceil(segmentSamples / hopLength);
    const demucsPad = Math.floor(hopLength / 2) * 3;
    const demucsPadRight = demucsPad + le * hopLength - segmentSamples;
    const demucsPaddedLength = demucsPad + segmentSamples + demucsPadRight;
    const centerPad = nfft / 2;
    const paddedLength = demucsPaddedLength + 2 * centerPad;
    const numBins = nfft / 2 + 1;

    return {
        nfft,
        hopLength,
        segmentSamples,
        numChannels,
        le,
        demucsPad,
        demucsPaddedLength,
        centerPad,
        paddedLength,
        rawFrames: Math.floor((paddedLength - nfft) / hopLength) + 1,
        numBins,
        outBins: numBins - 1,
        istftPad: demucsPad,
        istftLength: hopLength * le + 2 * demucsPad,
    };
}

/**
 * Pre-allocated buffers for STFT computation to avoid repeated allocations
 */
export interface STFTBuffers {
    demucsPadded: Float32Array[];
    paddedChannels: Float32Array[];
    real: Float32Array;
    imag: Float32Array;
    outReal: Float32Array;
    outImag: Float32Array;
    fftInput: number[];
    fftOutput: number[];
}

/**
 * Pre-allocated buffers for ISTFT computation to avoid repeated allocations
 */
export interface ISTFTBuffers {
    output: Float32Array;
    windowSum: Float32Array;
    finalOutput: Float32Array;
    ifftInput: number[];
    ifftOutput: number[];
}

export function createSTFTBuffers(g: DemucsGeometry): STFTBuffers {
    const fft = getFFT(g.nfft);
    const perChannel = (length: number) => Array.from({ length: g.numChannels }, () => new Float32Array(length));
    return {
        demucsPadded: perChannel(g.demucsPaddedLength),
        paddedChannels: perChannel(g.paddedLength),
        real: new Float32Array(g.numChannels * g.numBins * g.rawFrames),
        imag: new Float32Array(g.numChannels * g.numBins * g.rawFrames),
        outReal: new Float32Array(g.numChannels * g.outBins * g.le),
        outImag: new Float32Array(g.numChannels * g.outBins * g.le),
        fftInput: fft.createComplexArray(),
        fftOutput: fft.createComplexArray(),
    };
}

export function createISTFTBuffers(g: DemucsGeometry): ISTFTBuffers {
    const fft = getFFT(g.nfft);
    return {
        output: new Float32Array(g.numChannels * g.istftLength),
        windowSum: new Float32Array(g.istftLength),
        finalOutput: new Float32Array(g.numChannels * g.segmentSamples),
        ifftInput: fft.createComplexArray(),
        ifftOutput: fft.createComplexArray(),
    };
}

// numpy-style reflect: the edge sample is not repeated
function reflectPadIndex(i: number, len: number): number {
    if (len === 1) return 0;
    while (i < 0 || i >= len) {
        if (i < 0) {
            i = -i;
        }
        if (i >= len) {
            i = 2 * (len - 1) - i;
        }
    }
    return i;
}

/**
 * Compute the model's input spectrogram for one interleaved segment
 */
export function computeSTFT(audio: Float32Array, g: DemucsGeometry, buffers: STFTBuffers): STFTResult {
    const { numChannels, nfft, hopLength } = g;
    const numSamples = audio.length / numChannels;
    const { demucsPadded, paddedChannels, real, imag, outReal, outImag, fftInput, fftOutput } = buffers;
    const fft = getFFT(nfft);
    const window = hannWindow(nfft);

    real.fill(0);
    imag.fill(0);
    outReal.fill(0);
    outImag.fill(0);

    for (let c = 0; c < numChannels; c++) {
        for (let i = 0; i < g.demucsPaddedLength; i++) {
            const srcIdx = reflectPadIndex(i - g.demucsPad, numSamples);
            demucsPadded[c][i] = audio[srcIdx * numChannels + c];
        }
        for (let i = 0; i < g.paddedLength; i++) {
            const srcIdx = reflectPadIndex(i - g.centerPad, g.demucsPaddedLength);
            paddedChannels[c][i] = demucsPadded[c][srcIdx];
        }
    }

    const norm = 1.0 / Math.sqrt(nfft);

    for (let c = 0; c < numChannels; c++) {
        const channelData = paddedChannels[c];

        for (let f = 0; f < g.rawFrames; f++) {
            const frameStart = f * hopLength;

            for (let i = 0; i < nfft; i++) {
                const idx = frameStart + i;
                fftInput[i * 2] = idx < g.paddedLength ? channelData[idx] * window[i] : 0;
                fftInput[i * 2 + 1] = 0;
            }

            fft.transform(fftOutput, fftInput);

            const binOffset = (c * g.rawFrames + f) * g.numBins;
            for (let k = 0; k < g.numBins; k++) {
                real[binOffset + k] = fftOutput[k * 2] * norm;
                imag[binOffset + k] = fftOutput[k * 2 + 1] * norm;
            }
        }
    }

    for (let c = 0; c < numChannels; c++) {
        for (let f = 0; f < g.le; f++) {
            for (let b = 0; b < g.outBins; b++) {
                const srcIdx = (c * g.rawFrames + (f + 2)) * g.numBins + b;
                const dstIdx = c * g.outBins * g.le + b * g.le + f;
                outReal[dstIdx] = real[srcIdx];
                outImag[dstIdx] = imag[srcIdx];
            }
        }
    }

    return { real: outReal, imag: outImag, numBins: g.outBins, numFrames: g.le };
}

/**
 * Invert one source's channel-planar model spectrogram back to a
 * channel-planar segment of `targetLength` samples
 */
export function computeISTFT(
    real: Float32Array,
    imag: Float32Array,
    g: DemucsGeometry,
    targetLength: number,
    buffers: ISTFTBuffers
): Float32Array {
    const { numChannels, nfft, hopLength, outBins: numBins, le: numFrames, istftLength } = g;
    const paddedBins = numBins + 1;
    const paddedFrames = numFrames + 4;
    const { output, windowSum, finalOutput, ifftInput, ifftOutput } = buffers;
    const fft = getFFT(nfft);
    const window = hannWindow(nfft);

    output.fill(0);
    windowSum.fill(0);
    finalOutput.fill(0);

    const scale = Math.sqrt(nfft);

    for (let c = 0; c < numChannels; c++) {
        for (let fp = 0; fp < paddedFrames; fp++) {
            const f = fp - 2;
            ifftInput.fill(0);

            for (let b = 0; b < paddedBins; b++) {
                let realVal = 0, imagVal = 0;

                if (f >= 0 && f < numFrames && b < numBins) {
                    const srcIdx = c * numBins * numFrames + b * numFrames + f;
                    realVal = real[srcIdx];
                    imagVal = imag[srcIdx];
                }

                ifftInput[b * 2] = realVal * scale;
                ifftInput[b * 2 + 1] = imagVal * scale;
            }

            for (let b = 1; b < paddedBins - 1; b++) {
                const negIdx = nfft - b;
                ifftInput[negIdx * 2] = ifftInput[b * 2];
                ifftInput[negIdx * 2 + 1] = -ifftInput[b * 2 + 1];
            }

            fft.inverseTransform(ifftOutput, ifftInput);

            const frameStart = fp * hopLength;
            for (let i = 0; i < nfft; i++) {
                const outIdx = frameStart + i - nfft / 2;
                if (outIdx >= 0 && outIdx < istftLength) {
                    output[c * istftLength + outIdx] += ifftOutput[i * 2] * window[i];
                    if (c === 0) {
                        windowSum[outIdx] += window[i] * window[i];
                    }
                }
            }
        }
    }

    for (let c = 0; c < numChannels; c++) {
        for (let i = 0; i < istftLength; i++) {
            if (windowSum[i] > 1e-8) {
                output[c * istftLength + i] /= windowSum[i];
            }
        }
    }

    const length = Math.min(targetLength, g.segmentSamples);
    for (let c = 0; c < numChannels; c++) {
        for (let i = 0; i < length; i++) {
            finalOutput[c * g.segmentSamples + i] = output[c * istftLength + g.istftPad + i];
        }
    }

    return finalOutput;
}
