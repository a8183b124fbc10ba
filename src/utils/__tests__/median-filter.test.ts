import { describe, it, expect } from 'vitest';
import { harmonicEnhancement, percussiveEnhancement, reflectIndex, slidingMedian } from '../median-filter';

describe('reflectIndex', () => {
    it('mirrors about the half-sample boundary', () => {
        expect(reflectIndex(-1, 5)).toBe(0);
        expect(reflectIndex(-2, 5)).toBe(1);
        expect(reflectIndex(5, 5)).toBe(4);
        expect(reflectIndex(6, 5)).toBe(3);
        expect(reflectIndex(2, 5)).toBe(2);
        expect(reflectIndex(3, 1)).toBe(0);
    });

    it('wraps windows longer than the signal', () => {
        // d c b a | a b c d | d c b a, repeating
        expect(reflectIndex(-5, 2)).toBe(0);
        expect(reflectIndex(9, 2)).toBe(1);
    });
});

describe('slidingMedian', () => {
    it('computes the centred median with reflected edges', () => {
        expect(Array.from(slidingMedian([5, 1, 4, 2, 3], 3))).toEqual([5, 4, 2, 3, 3]);
    });

    it('is the identity for length 1', () => {
        expect(Array.from(slidingMedian([3, -1, 2], 1))).toEqual([3, -1, 2]);
    });

    it('handles windows longer than the input', () => {
        // Position 0 sees {2, 2, 1, 1, 2, 2, 1}, position 1 sees {2, 1, 1, 2, 2, 1, 1}
        expect(Array.from(slidingMedian([1, 2], 7))).toEqual([2, 1]);
    });

    it('rejects even and non-positive lengths', () => {
        expect(() => slidingMedian([1, 2, 3], 4)).toThrow('length must be odd (got 4)');
        expect(() => slidingMedian([1, 2, 3], 0)).toThrow('length must be a positive integer (got 0)');
    });
});

describe('harmonicEnhancement', () => {
    it('filters each bin along time without touching the input', () => {
        // 2 bins x 5 frames, bin-major
        const magnitude = Float64Array.from([5, 1, 4, 2, 3, 7, 7, 7, 7, 7]);
        const before = magnitude.slice();

        const enhanced = harmonicEnhancement(magnitude, 2, 5, 3);

        expect(Array.from(enhanced)).toEqual([5, 4, 2, 3, 3, 7, 7, 7, 7, 7]);
        expect(magnitude).toEqual(before);
        expect(enhanced).not.toBe(magnitude);
    });

    it('removes isolated transients', () => {
        const magnitude = Float64Array.from([0, 0, 9, 0, 0, 0, 0]);

        expect(Array.from(harmonicEnhancement(magnitude, 1, 7, 5))).toEqual([0, 0, 0, 0, 0, 0, 0]);
    });

    it('rejects a mismatched shape', () => {
        expect(() => harmonicEnhancement(new Float64Array(6), 2, 4, 3)).toThrow('expected 2x4');
    });
});

describe('percussiveEnhancement', () => {
    it('filters each frame along frequency', () => {
        // 3 bins x 2 frames: frame 0 column [1, 9, 2], frame 1 column [0, 0, 6]
        const magnitude = Float64Array.from([1, 0, 9, 0, 2, 6]);
        const before = magnitude.slice();

        const enhanced = percussiveEnhancement(magnitude, 3, 2, 3);

        expect(Array.from(enhanced)).toEqual([1, 0, 2, 0, 2, 6]);
        expect(magnitude).toEqual(before);
    });

    it('suppresses a narrow-band peak', () => {
        const magnitude = Float64Array.from([0, 0, 0, 5, 0, 0, 0]);

        expect(Array.from(percussiveEnhancement(magnitude, 7, 1, 3))).toEqual([0, 0, 0, 0, 0, 0, 0]);
    });
});
