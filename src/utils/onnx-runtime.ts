import { readFile } from 'node:fs/promises';
import * as ort from 'onnxruntime-web';
import type { AddLog, DemucsInference, InferenceInput, InferenceResult, ModelType } from '../types';
import { MODEL_SOURCES } from '../types';
import { SeparationError, errorMessage } from './errors';
import { elapsedSeconds, silentLog } from './logger';

// Node runs the single-threaded WASM backend
ort.env.wasm.numThreads = 1;
ort.env.logLevel = 'warning';

function float32Data(tensor: ort.Tensor | undefined, name: string): Float32Array {
    if (!tensor) {
        throw new SeparationError('ModelUnavailable', `Model did not produce output '${name}'`);
    }
    if (!(tensor.data instanceof Float32Array)) {
        throw new SeparationError('ModelUnavailable', `Model output '${name}' is ${tensor.type}, expected float32`);
    }
    return tensor.data;
}

/**
 * Load an exported Demucs ONNX model from disk
 */
export async function loadOnnxInference(
    modelPath: string,
    model: ModelType,
    addLog: AddLog = silentLog
): Promise<DemucsInference> {
    addLog(`Starting model load: ${model}...`, 'info');
    const startTime = performance.now();

    let session: ort.InferenceSession;
    try {
        const modelData = await readFile(modelPath);
        session = await ort.InferenceSession.create(new Uint8Array(modelData), {
            executionProviders: ['wasm'],
            graphOptimizationLevel: 'all',
        });
    } catch (error) {
        addLog(`Failed to load model: ${errorMessage(error)}`, 'error');
        throw new SeparationError('ModelUnavailable', `Could not load ${model} from ${modelPath}: ${errorMessage(error)}`, { cause: error });
    }

    const sources = MODEL_SOURCES[model];
    addLog(`Model sources: ${sources.join(', ')}`, 'info');
    addLog(`Model loaded in ${elapsedSeconds(startTime)}s`, 'success');

    return {
        sources,
        async run(input: InferenceInput): Promise<InferenceResult> {
            const specRealTensor = new ort.Tensor('float32', input.specReal, input.specShape);
            const specImagTensor = new ort.Tensor('float32', input.specImag, input.specShape);
            const audioTensor = new ort.Tensor('float32', input.audio, input.audioShape);

            let results: ort.InferenceSession.OnnxValueMapType | undefined;
            try {
                results = await session.run({
                    'spec_real': specRealTensor,
                    'spec_imag': specImagTensor,
                    'audio': audioTensor,
                });

                const outSpecReal = results['out_spec_real'];
                const outWave = results['out_wave'];

                // Copy out before the tensors are disposed
                return {
                    outSpecReal: float32Data(outSpecReal, 'out_spec_real').slice(),
                    outSpecImag: float32Data(results['out_spec_imag'], 'out_spec_imag').slice(),
                    outWave: float32Data(outWave, 'out_wave').slice(),
                    outSpecShape: Array.from(outSpecReal.dims),
                    outWaveShape: Array.from(outWave.dims),
                };
            } finally {
                specRealTensor.dispose();
                specImagTensor.dispose();
                audioTensor.dispose();
                if (results) {
                    for (const tensor of Object.values(results)) {
                        tensor.dispose();
                    }
                }
            }
        },
        async release(): Promise<void> {
            await session.release();
        },
    };
}
