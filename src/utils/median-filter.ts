/**
 * Median filters for harmonic/percussive enhancement.
 *
 * Both filters read a magnitude matrix in bin-major layout
 * (index = bin * numFrames + frame) and always return a freshly allocated
 * matrix; the input is never modified.
 *
 * Boundaries use half-sample symmetric reflection: d c b a | a b c d | d c b a
 */

import { invalidParameter } from './errors';

export function filterLengthProblems(name: string, length: number): string[] {
    if (!Number.isInteger(length) || length <= 0) {
        return [`${name} must be a positive integer (got ${length})`];
    }
    if (length % 2 !== 1) {
        return [`${name} must be odd (got ${length})`];
    }
    return [];
}

function assertFilterLength(name: string, length: number): void {
    const problems = filterLengthProblems(name, length);
    if (problems.length > 0) {
        throw invalidParameter(problems[0]);
    }
}

export function reflectIndex(i: number, len: number): number {
    if (len === 1) return 0;
    const period = 2 * len;
    let m = i % period;
    if (m < 0) m += period;
    return m < len ? m : period - 1 - m;
}

/**
 * Index of the first element >= value in a sorted array
 */
function lowerBound(sorted: number[], value: number): number {
    let lo = 0;
    let hi = sorted.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (sorted[mid] < value) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
}

/**
 * Running median of `length` (odd) samples centred on each position.
 * The window is kept sorted: each step removes the outgoing sample and
 * inserts the incoming one by binary search instead of re-sorting.
 */
export function slidingMedian(values: ArrayLike<number>, length: number, out?: Float64Array): Float64Array {
    assertFilterLength('length', length);
    const n = values.length;
    const result = out ?? new Float64Array(n);
    if (n === 0) return result;

    const half = (length - 1) / 2;
    const sorted: number[] = [];
    for (let i = -half; i <= half; i++) {
        const v = values[reflectIndex(i, n)];
        sorted.splice(lowerBound(sorted, v), 0, v);
    }
    result[0] = sorted[half];

    for (let pos = 1; pos < n; pos++) {
        const outgoing = values[reflectIndex(pos - half - 1, n)];
        sorted.splice(lowerBound(sorted, outgoing), 1);
        const incoming = values[reflectIndex(pos + half, n)];
        sorted.splice(lowerBound(sorted, incoming), 0, incoming);
        result[pos] = sorted[half];
    }
    return result;
}

function assertShape(magnitude: Float64Array, numBins: number, numFrames: number): void {
    if (magnitude.length !== numBins * numFrames) {
        throw invalidParameter(`Magnitude matrix has ${magnitude.length} values, expected ${numBins}x${numFrames}`);
    }
}

/**
 * Median along time for every frequency bin. Sustained partials survive,
 * short transients are suppressed.
 */
export function harmonicEnhancement(
    magnitude: Float64Array,
    numBins: number,
    numFrames: number,
    filterLengthTime: number
): Float64Array {
    assertFilterLength('filterLengthTime', filterLengthTime);
    assertShape(magnitude, numBins, numFrames);

    const enhanced = new Float64Array(magnitude.length);
    for (let b = 0; b < numBins; b++) {
        const start = b * numFrames;
        const row = magnitude.subarray(start, start + numFrames);
        slidingMedian(row, filterLengthTime, enhanced.subarray(start, start + numFrames));
    }
    return enhanced;
}

/**
 * Median along frequency for every frame. Broadband transients survive,
 * narrow-band peaks are suppressed.
 */
export function percussiveEnhancement(
    magnitude: Float64Array,
    numBins: number,
    numFrames: number,
    filterLengthFreq: number
): Float64Array {
    assertFilterLength('filterLengthFreq', filterLengthFreq);
    assertShape(magnitude, numBins, numFrames);

    const enhanced = new Float64Array(magnitude.length);
    const column = new Float64Array(numBins);
    const filtered = new Float64Array(numBins);
    for (let f = 0; f < numFrames; f++) {
        for (let b = 0; b < numBins; b++) {
            column[b] = magnitude[b * numFrames + f];
        }
        slidingMedian(column, filterLengthFreq, filtered);
        for (let b = 0; b < numBins; b++) {
            enhanced[b * numFrames + f] = filtered[b];
        }
    }
    return enhanced;
}
