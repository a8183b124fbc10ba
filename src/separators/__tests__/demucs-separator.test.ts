import { describe, it, expect } from 'vitest';
import { SOURCES } from '../../types';
import type { InferenceInput, InferenceResult } from '../../types';
import { isSeparationError } from '../../utils/errors';
import { createLogCollector } from '../../utils/logger';
import { createFakeInference, maxAbsDiff, noise } from '../../utils/__tests__/helpers';
import { DemucsSeparator, classifyInferenceError, toHarmonicPercussive } from '../demucs-separator';

const FRAMING = { sampleRate: 8000, nfft: 256, hopLength: 64, segmentSamples: 2048 };

async function codeOf(promise: Promise<unknown>): Promise<string> {
    try {
        await promise;
    } catch (error) {
        return isSeparationError(error) ? error.code : 'other';
    }
    return 'none';
}

describe('DemucsSeparator', () => {
    it('cross-fades overlapping segments back to the input', async () => {
        // drums passes the input through, other at half level, bass and vocals silent
        const inference = createFakeInference(SOURCES, [1, 0, 0.5, 0]);
        const separator = new DemucsSeparator(inference, { framing: FRAMING });
        const signal = noise(5000, 0.4);

        const { stems, sampleRate } = await separator.separate(signal, 8000);

        expect(sampleRate).toBe(8000);
        expect(Object.keys(stems)).toEqual(['drums', 'bass', 'other', 'vocals']);
        expect(inference.calls).toHaveLength(4);
        expect(maxAbsDiff(stems['drums'], signal)).toBeLessThan(1e-6);
        expect(maxAbsDiff(stems['other'], signal.map(v => v / 2))).toBeLessThan(1e-6);
        expect(stems['bass'].every(v => v === 0)).toBe(true);
        expect(stems['vocals'].length).toBe(5000);
    });

    it('feeds the model stereo segments in its tensor layout', async () => {
        const inference = createFakeInference(SOURCES, [1, 0, 0, 0]);
        const separator = new DemucsSeparator(inference, { framing: FRAMING });
        const signal = noise(3000);

        await separator.neuralSeparate(signal, 8000);

        const [first, second] = inference.calls;
        expect(first.specShape).toEqual([1, 2, 128, 32]);
        expect(first.audioShape).toEqual([1, 2, 2048]);
        // Mono duplicated into both channel planes
        expect(first.audio[10]).toBe(signal[10]);
        expect(first.audio[2048 + 10]).toBe(signal[10]);
        // Second segment starts half a segment in, zero-padded past the end
        expect(second.audio[0]).toBe(signal[1024]);
        expect(second.audio[1975]).toBe(signal[2999]);
        expect(second.audio[1976]).toBe(0);
    });

    it('runs a single segment for input shorter than the overlap', async () => {
        const inference = createFakeInference(SOURCES, [1, 0, 0, 0]);
        const separator = new DemucsSeparator(inference, { framing: FRAMING });
        const signal = noise(100);

        const separated = await separator.neuralSeparate(signal, 8000);

        expect(inference.calls).toHaveLength(1);
        expect(separated).toHaveLength(4);
        expect(maxAbsDiff(separated[0], signal)).toBeLessThan(1e-6);
    });

    it('reports progress and logs timing', async () => {
        const { logs, addLog } = createLogCollector();
        const progress: [number, string][] = [];
        const separator = new DemucsSeparator(createFakeInference(SOURCES, [1, 0, 0, 0]), {
            framing: FRAMING,
            addLog,
            onProgress: (value, status) => progress.push([value, status]),
        });

        await separator.separate(noise(3000), 8000);

        expect(progress).toEqual([
            [47.5, 'Separating segment 1 of 2...'],
            [95, 'Separating segment 2 of 2...'],
            [100, 'Complete!'],
        ]);
        expect(logs[0].message).toBe('Starting separation...');
        expect(logs[logs.length - 1].type).toBe('success');
        expect(logs[logs.length - 1].message).toMatch(/^Finished separation in \d+\.\d{2}s\.$/);
    });

    it('requires the model sample rate and non-empty input', async () => {
        const separator = new DemucsSeparator(createFakeInference(SOURCES, [1, 0, 0, 0]), { framing: FRAMING });

        expect(await codeOf(separator.separate(noise(100), 44100))).toBe('InvalidParameter');
        expect(await codeOf(separator.separate([], 8000))).toBe('EmptyInput');
    });

    it('maps runtime failures to error codes', async () => {
        const failing = (error: Error) => ({
            ...createFakeInference(SOURCES, []),
            run: (_input: InferenceInput): Promise<InferenceResult> => Promise.reject(error),
        });

        const oom = new DemucsSeparator(failing(new RangeError('Array buffer allocation failed')), { framing: FRAMING });
        const broken = new DemucsSeparator(failing(new Error('invalid graph')), { framing: FRAMING });

        expect(await codeOf(oom.separate(noise(100), 8000))).toBe('ResourceExhausted');
        expect(await codeOf(broken.separate(noise(100), 8000))).toBe('ModelUnavailable');
    });

    it('rejects model outputs that are too small', async () => {
        const inference = createFakeInference(SOURCES, [1, 0, 0, 0], () => 10);
        const separator = new DemucsSeparator(inference, { framing: FRAMING });

        await expect(separator.separate(noise(100), 8000)).rejects.toThrow(/do not match 4 sources/);
    });
});

describe('classifyInferenceError', () => {
    it('recognises allocation failures', () => {
        expect(classifyInferenceError(new Error('failed to allocate a buffer')).code).toBe('ResourceExhausted');
        expect(classifyInferenceError('out of memory').code).toBe('ResourceExhausted');
        expect(classifyInferenceError(new TypeError('bad input')).code).toBe('ModelUnavailable');
    });
});

describe('toHarmonicPercussive', () => {
    it('sends drums to percussive and sums the rest', () => {
        const folded = toHarmonicPercussive({
            sampleRate: 8000,
            stems: {
                drums: Float32Array.from([0.5, -0.5]),
                bass: Float32Array.from([0.25, 0]),
                other: Float32Array.from([0.5, 0.25]),
            },
        });

        expect(Object.keys(folded.stems)).toEqual(['harmonic', 'percussive']);
        expect(Array.from(folded.stems['harmonic'])).toEqual([0.75, 0.25]);
        expect(Array.from(folded.stems['percussive'])).toEqual([0.5, -0.5]);
    });

    it('normalizes a harmonic sum that clips', () => {
        const folded = toHarmonicPercussive({
            sampleRate: 8000,
            stems: { drums: new Float32Array(2), bass: Float32Array.from([1, 0]), other: Float32Array.from([1, 0.5]) },
        });

        expect(Array.from(folded.stems['harmonic'])).toEqual([1, 0.25]);
    });

    it('needs a drums stem', () => {
        expect(() => toHarmonicPercussive({ sampleRate: 8000, stems: { other: new Float32Array(1) } }))
            .toThrow('No drums stem among: other');
    });
});
