/**
 * Butterworth band-stop filter, used to notch percussive bleed out of the
 * harmonic stem after separation.
 *
 * Design: analog Butterworth lowpass prototype -> lowpass-to-bandstop
 * transform -> bilinear transform with prewarped edges. The result is a
 * cascade of second-order sections, each normalized to unit gain at DC.
 */

import { DEFAULT_EQ_ORDER } from '../types';
import { invalidParameter } from './errors';

interface Complex {
    re: number;
    im: number;
}

export interface Biquad {
    b: [number, number, number];
    a: [number, number, number];
}

const c = (re: number, im = 0): Complex => ({ re, im });
const add = (x: Complex, y: Complex): Complex => c(x.re + y.re, x.im + y.im);
const sub = (x: Complex, y: Complex): Complex => c(x.re - y.re, x.im - y.im);
const mul = (x: Complex, y: Complex): Complex => c(x.re * y.re - x.im * y.im, x.re * y.im + x.im * y.re);

function div(x: Complex, y: Complex): Complex {
    const d = y.re * y.re + y.im * y.im;
    return c((x.re * y.re + x.im * y.im) / d, (x.im * y.re - x.re * y.im) / d);
}

function sqrt(x: Complex): Complex {
    const r = Math.hypot(x.re, x.im);
    const re = Math.sqrt((r + x.re) / 2);
    const im = Math.sqrt(Math.max(0, (r - x.re) / 2));
    return c(re, x.im < 0 ? -im : im);
}

export function bandstopProblems(lowHz: number, highHz: number, sampleRate: number, order: number): string[] {
    const problems: string[] = [];
    const nyquist = sampleRate / 2;
    if (!Number.isInteger(order) || order < 1) {
        problems.push(`order must be a positive integer (got ${order})`);
    }
    if (!(lowHz > 0 && highHz > lowHz && highHz < nyquist)) {
        problems.push(`band edges must satisfy 0 < low < high < ${nyquist} Hz (got ${lowHz}-${highHz} Hz)`);
    }
    return problems;
}

/**
 * Second-order sections of an order-N Butterworth band-stop (2N poles)
 */
export function designBandstop(
    lowHz: number,
    highHz: number,
    sampleRate: number,
    order: number = DEFAULT_EQ_ORDER
): Biquad[] {
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
        throw invalidParameter(`sampleRate must be positive (got ${sampleRate})`);
    }
    const problems = bandstopProblems(lowHz, highHz, sampleRate, order);
    if (problems.length > 0) {
        throw invalidParameter(problems.join('; '));
    }

    const fs2 = 2 * sampleRate;
    const w1 = fs2 * Math.tan(Math.PI * lowHz / sampleRate);
    const w2 = fs2 * Math.tan(Math.PI * highHz / sampleRate);
    const bw = w2 - w1;
    const w0sq = w1 * w2;

    const digitalPoles: Complex[] = [];
    for (let k = 0; k < order; k++) {
        const theta = Math.PI * (2 * k + order + 1) / (2 * order);
        const prototype = c(Math.cos(theta), Math.sin(theta));
        const scaled = div(c(bw / 2), prototype);
        const root = sqrt(sub(mul(scaled, scaled), c(w0sq)));
        for (const pole of [add(scaled, root), sub(scaled, root)]) {
            digitalPoles.push(div(add(c(fs2), pole), sub(c(fs2), pole)));
        }
    }

    // Zeros sit on the unit circle at the notch centre
    const notchAngle = 2 * Math.atan(Math.sqrt(w0sq) / fs2);
    const b1 = -2 * Math.cos(notchAngle);

    const eps = 1e-12;
    const sections: Biquad[] = [];
    const realPoles: number[] = [];
    for (const pole of digitalPoles) {
        if (Math.abs(pole.im) <= eps) {
            realPoles.push(pole.re);
        } else if (pole.im > 0) {
            sections.push(section(b1, -2 * pole.re, pole.re * pole.re + pole.im * pole.im));
        }
    }
    for (let i = 0; i + 1 < realPoles.length; i += 2) {
        const [r1, r2] = [realPoles[i], realPoles[i + 1]];
        sections.push(section(b1, -(r1 + r2), r1 * r2));
    }
    return sections;
}

function section(b1: number, a1: number, a2: number): Biquad {
    const gain = (1 + a1 + a2) / (2 + b1);
    return {
        b: [gain, gain * b1, gain],
        a: [1, a1, a2],
    };
}

/**
 * Causal cascade filtering (direct form II transposed)
 */
export function filterSections(sections: Biquad[], input: ArrayLike<number>): Float32Array {
    const output = new Float32Array(input.length);
    const state = sections.map(() => [0, 0]);

    for (let n = 0; n < input.length; n++) {
        let x = input[n];
        for (let s = 0; s < sections.length; s++) {
            const { b, a } = sections[s];
            const z = state[s];
            const y = b[0] * x + z[0];
            z[0] = b[1] * x - a[1] * y + z[1];
            z[1] = b[2] * x - a[2] * y;
            x = y;
        }
        output[n] = Number.isFinite(x) ? x : 0;
    }
    return output;
}

export function applyBandstop(
    waveform: ArrayLike<number>,
    lowHz: number,
    highHz: number,
    sampleRate: number,
    order: number = DEFAULT_EQ_ORDER
): Float32Array {
    return filterSections(designBandstop(lowHz, highHz, sampleRate, order), waveform);
}
