declare module 'fft.js' {
    export default class FFT {
        constructor(size: number);
        createComplexArray(): number[];
        transform(out: number[], data: ArrayLike<number>): void;
        inverseTransform(out: number[], data: ArrayLike<number>): void;
    }
}
