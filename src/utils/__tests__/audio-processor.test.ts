import { describe, it, expect } from 'vitest';
import { DEMUCS_FRAMING } from '../../types';
import {
    computeISTFT,
    computeSTFT,
    createDemucsGeometry,
    createISTFTBuffers,
    createSTFTBuffers,
} from '../audio-processor';

const SMALL_FRAMING = { sampleRate: 8000, nfft: 256, hopLength: 64, segmentSamples: 2048 };

describe('createDemucsGeometry', () => {
    it('derives padding and frame counts from the framing', () => {
        const g = createDemucsGeometry(SMALL_FRAMING);

        expect(g).toMatchObject({
            le: 32,
            demucsPad: 96,
            demucsPaddedLength: 2240,
            centerPad: 128,
            paddedLength: 2496,
            rawFrames: 36,
            numBins: 129,
            outBins: 128,
            istftLength: 2240,
        });
    });

    it('matches the exported model at 44.1 kHz', () => {
        const g = createDemucsGeometry(DEMUCS_FRAMING);

        expect(g.segmentSamples).toBe(441000);
        expect(g.le).toBe(431);
        expect(g.outBins).toBe(2048);
    });
});

describe('computeSTFT / computeISTFT', () => {
    const g = createDemucsGeometry(SMALL_FRAMING);

    // Interleaved stereo: right channel is half the left
    const interleaved = new Float32Array(g.segmentSamples * 2);
    for (let i = 0; i < g.segmentSamples; i++) {
        const v = 0.5 * Math.sin(2 * Math.PI * 440 * i / SMALL_FRAMING.sampleRate);
        interleaved[i * 2] = v;
        interleaved[i * 2 + 1] = v / 2;
    }

    it('shapes the spectrogram as channels x bins x frames', () => {
        const stft = computeSTFT(interleaved, g, createSTFTBuffers(g));

        expect(stft.numBins).toBe(128);
        expect(stft.numFrames).toBe(32);
        expect(stft.real.length).toBe(2 * 128 * 32);
    });

    it('inverts to the original segment away from the trimmed edge frames', () => {
        const stft = computeSTFT(interleaved, g, createSTFTBuffers(g));
        const planar = computeISTFT(stft.real, stft.imag, g, g.segmentSamples, createISTFTBuffers(g));

        expect(planar.length).toBe(2 * g.segmentSamples);
        let maxError = 0;
        // Frames 1 and 34 are zeroed, so only samples 96..1951 see every frame
        for (let i = 96; i < 1952; i++) {
            maxError = Math.max(
                maxError,
                Math.abs(planar[i] - interleaved[i * 2]),
                Math.abs(planar[g.segmentSamples + i] - interleaved[i * 2 + 1])
            );
        }
        // The Nyquist bin is dropped and the spectrogram is float32, which caps
        // the accuracy near 1e-4 for a 0.5 amplitude tone
        expect(maxError).toBeLessThan(1e-3);
    });

    it('returns silence for a silent spectrogram', () => {
        const zeros = new Float32Array(2 * g.outBins * g.le);
        const planar = computeISTFT(zeros, zeros, g, g.segmentSamples, createISTFTBuffers(g));

        expect(planar.every(v => v === 0)).toBe(true);
    });
});
