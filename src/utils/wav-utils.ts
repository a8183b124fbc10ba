import { invalidParameter } from './errors';

export interface DecodedWav {
    /** Mono mixdown (channel average) */
    samples: Float32Array;
    sampleRate: number;
    numChannels: number;
    bitsPerSample: number;
}

interface WavFormat {
    audioFormat: number;
    numChannels: number;
    sampleRate: number;
    bitsPerSample: number;
}

const FORMAT_PCM = 1;
const FORMAT_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

/**
 * Encode interleaved samples as 16-bit PCM WAV, clamping to [-1, 1]
 */
export function encodeWav(
    audioData: ArrayLike<number>,
    sampleRate: number,
    numChannels = 1
): ArrayBuffer {
    const numSamples = Math.floor(audioData.length / numChannels);
    const bytesPerSample = 2;
    const blockAlign = numChannels * bytesPerSample;
    const byteRate = sampleRate * blockAlign;
    const dataSize = numSamples * blockAlign;

    const buffer = new ArrayBuffer(44 + dataSize);
    const view = new DataView(buffer);

    const writeString = (offset: number, str: string) => {
        for (let i = 0; i < str.length; i++) {
            view.setUint8(offset + i, str.charCodeAt(i));
        }
    };

    writeString(0, 'RIFF');
    view.setUint32(4, 36 + dataSize, true);
    writeString(8, 'WAVE');
    writeString(12, 'fmt ');
    view.setUint32(16, 16, true);
    view.setUint16(20, FORMAT_PCM, true);
    view.setUint16(22, numChannels, true);
    view.setUint32(24, sampleRate, true);
    view.setUint32(28, byteRate, true);
    view.setUint16(32, blockAlign, true);
    view.setUint16(34, 16, true);
    writeString(36, 'data');
    view.setUint32(40, dataSize, true);

    let offset = 44;
    for (let i = 0; i < numSamples; i++) {
        for (let c = 0; c < numChannels; c++) {
            let sample = audioData[i * numChannels + c];
            sample = Math.max(-1, Math.min(1, sample));
            sample = sample * 32767;
            view.setInt16(offset, sample, true);
            offset += 2;
        }
    }

    return buffer;
}

export function createWavBlob(
    audioData: ArrayLike<number>,
    sampleRate: number,
    numChannels = 1
): Blob {
    return new Blob([encodeWav(audioData, sampleRate, numChannels)], { type: 'audio/wav' });
}

function readSample(view: DataView, offset: number, format: WavFormat): number {
    if (format.audioFormat === FORMAT_FLOAT) {
        return format.bitsPerSample === 64
            ? view.getFloat64(offset, true)
            : view.getFloat32(offset, true);
    }
    switch (format.bitsPerSample) {
        case 8:
            return (view.getUint8(offset) - 128) / 128;
        case 16:
            return view.getInt16(offset, true) / 32768;
        case 24: {
            const value = view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getInt8(offset + 2) << 16);
            return value / 8388608;
        }
        default:
            return view.getInt32(offset, true) / 2147483648;
    }
}

function checkFormat(format: WavFormat): void {
    const pcmBits = [8, 16, 24, 32];
    const floatBits = [32, 64];
    const supported = format.audioFormat === FORMAT_PCM
        ? pcmBits.includes(format.bitsPerSample)
        : format.audioFormat === FORMAT_FLOAT && floatBits.includes(format.bitsPerSample);
    if (!supported) {
        throw invalidParameter(
            `Unsupported WAV encoding (format ${format.audioFormat}, ${format.bitsPerSample}-bit)`
        );
    }
    if (format.numChannels < 1 || format.sampleRate < 1) {
        throw invalidParameter(`Invalid WAV header (${format.numChannels} channels at ${format.sampleRate} Hz)`);
    }
}

/**
 * Decode a RIFF/WAVE file (integer PCM or IEEE float) to a mono waveform
 */
export function decodeWav(data: ArrayBuffer | Uint8Array): DecodedWav {
    const view = data instanceof Uint8Array
        ? new DataView(data.buffer, data.byteOffset, data.byteLength)
        : new DataView(data);

    const tag = (offset: number) => String.fromCharCode(
        view.getUint8(offset), view.getUint8(offset + 1), view.getUint8(offset + 2), view.getUint8(offset + 3)
    );

    if (view.byteLength < 12 || tag(0) !== 'RIFF' || tag(8) !== 'WAVE') {
        throw invalidParameter('Not a RIFF/WAVE file');
    }

    let format: WavFormat | null = null;
    let dataOffset = -1;
    let dataLength = 0;
    let offset = 12;

    while (offset + 8 <= view.byteLength) {
        const id = tag(offset);
        const size = view.getUint32(offset + 4, true);
        const body = offset + 8;

        if (id === 'fmt ') {
            if (size < 16 || body + 16 > view.byteLength) {
                throw invalidParameter('Truncated fmt chunk');
            }
            let audioFormat = view.getUint16(body, true);
            if (audioFormat === FORMAT_EXTENSIBLE && size >= 40) {
                // Sub-format GUID starts with the actual format code
                audioFormat = view.getUint16(body + 24, true);
            }
            format = {
                audioFormat,
                numChannels: view.getUint16(body + 2, true),
                sampleRate: view.getUint32(body + 4, true),
                bitsPerSample: view.getUint16(body + 14, true),
            };
        } else if (id === 'data') {
            dataOffset = body;
            dataLength = Math.min(size, view.byteLength - body);
        }

        offset = body + size + (size & 1);
    }

    if (!format || dataOffset < 0) {
        throw invalidParameter('WAV file has no fmt or data chunk');
    }
    checkFormat(format);

    const bytesPerSample = format.bitsPerSample / 8;
    const blockAlign = bytesPerSample * format.numChannels;
    const frames = Math.floor(dataLength / blockAlign);
    const samples = new Float32Array(frames);

    for (let i = 0; i < frames; i++) {
        let sum = 0;
        for (let c = 0; c < format.numChannels; c++) {
            sum += readSample(view, dataOffset + i * blockAlign + c * bytesPerSample, format);
        }
        samples[i] = sum / format.numChannels;
    }

    return {
        samples,
        sampleRate: format.sampleRate,
        numChannels: format.numChannels,
        bitsPerSample: format.bitsPerSample,
    };
}
