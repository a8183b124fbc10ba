import type { AddLog } from '../types';
import { SeparationError, errorMessage, isSeparationError } from '../utils/errors';
import { silentLog } from '../utils/logger';

export interface BoundaryOptions {
    /** 0 or undefined disables the timeout */
    timeoutMs?: number;
    /** Extra attempts after a ResourceExhausted failure */
    retries?: number;
    backoffMs?: number;
    addLog?: AddLog;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function withTimeout<T>(task: () => Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) return task();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new SeparationError('ModelUnavailable', `Separation timed out after ${timeoutMs} ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Run a separation with an optional timeout, retrying only when the
 * runtime ran out of resources. Backoff doubles after every attempt.
 */
export async function withSeparationBoundary<T>(
    task: () => Promise<T>,
    options: BoundaryOptions = {}
): Promise<T> {
    const { timeoutMs = 0, retries = 0, backoffMs = 250, addLog = silentLog } = options;

    for (let attempt = 0; ; attempt++) {
        try {
            return await withTimeout(task, timeoutMs);
        } catch (error) {
            if (!isSeparationError(error, 'ResourceExhausted') || attempt >= retries) {
                throw error;
            }
            const delay = backoffMs * 2 ** attempt;
            addLog(`${errorMessage(error)}; retrying in ${delay} ms (attempt ${attempt + 2} of ${retries + 1})`, 'error');
            await sleep(delay);
        }
    }
}
