import type { DemucsInference, InferenceInput, InferenceResult } from '../../types';

/**
 * Sine with short raised-cosine fades at both ends
 */
export function tone(frequency: number, seconds: number, sampleRate: number, amplitude = 0.5, fadeSeconds = 0.02): Float32Array {
    const length = Math.round(seconds * sampleRate);
    const fade = Math.round(fadeSeconds * sampleRate);
    const out = new Float32Array(length);
    for (let i = 0; i < length; i++) {
        let gain = 1;
        if (i < fade) gain = 0.5 * (1 - Math.cos(Math.PI * i / fade));
        if (i >= length - fade) gain = 0.5 * (1 - Math.cos(Math.PI * (length - 1 - i) / fade));
        out[i] = amplitude * gain * Math.sin(2 * Math.PI * frequency * i / sampleRate);
    }
    return out;
}

/**
 * Single-sample impulses every `period` samples starting at `first`
 */
export function clickTrain(length: number, period: number, first: number, amplitude = 0.8): Float32Array {
    const out = new Float32Array(length);
    for (let i = first; i < length; i += period) {
        out[i] = amplitude;
    }
    return out;
}

/**
 * Deterministic noise in [-amplitude, amplitude)
 */
export function noise(length: number, amplitude = 0.25, seed = 12345): Float32Array {
    const out = new Float32Array(length);
    let state = seed >>> 0;
    for (let i = 0; i < length; i++) {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        out[i] = amplitude * (state / 2 ** 32 * 2 - 1);
    }
    return out;
}

export function rmsOf(samples: ArrayLike<number>, start = 0, end = samples.length): number {
    let sum = 0;
    for (let i = start; i < end; i++) sum += samples[i] * samples[i];
    return Math.sqrt(sum / (end - start));
}

export function maxAbsDiff(a: ArrayLike<number>, b: ArrayLike<number>, start = 0, end = a.length): number {
    let max = 0;
    for (let i = start; i < end; i++) {
        max = Math.max(max, Math.abs(a[i] - b[i]));
    }
    return max;
}

export interface FakeInference extends DemucsInference {
    calls: InferenceInput[];
    released: boolean;
}

/**
 * Stand-in model: zero spectrogram branch, and a waveform branch that
 * returns `gains[s]` times the input audio for source s
 */
export function createFakeInference(
    sources: readonly string[],
    gains: readonly number[],
    specSize: (input: InferenceInput) => number = input => input.specReal.length
): FakeInference {
    const fake: FakeInference = {
        sources,
        calls: [],
        released: false,
        async run(input: InferenceInput): Promise<InferenceResult> {
            fake.calls.push({ ...input, audio: input.audio.slice() });
            const perSource = specSize(input);
            const audioSize = input.audio.length;
            const outWave = new Float32Array(sources.length * audioSize);
            sources.forEach((_, s) => {
                for (let i = 0; i < audioSize; i++) {
                    outWave[s * audioSize + i] = input.audio[i] * (gains[s] ?? 0);
                }
            });
            return {
                outSpecReal: new Float32Array(sources.length * perSource),
                outSpecImag: new Float32Array(sources.length * perSource),
                outWave,
                outSpecShape: [1, sources.length, ...input.specShape.slice(1)],
                outWaveShape: [1, sources.length, ...input.audioShape.slice(1)],
            };
        },
        async release(): Promise<void> {
            fake.released = true;
        },
    };
    return fake;
}
