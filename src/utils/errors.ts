export type SeparationErrorCode =
    | 'InvalidParameter'
    | 'EmptyInput'
    | 'NumericInstability'
    | 'ModelUnavailable'
    | 'ResourceExhausted';

export class SeparationError extends Error {
    readonly code: SeparationErrorCode;

    constructor(code: SeparationErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SeparationError';
        this.code = code;
    }
}

export function invalidParameter(message: string): SeparationError {
    return new SeparationError('InvalidParameter', message);
}

export function isSeparationError(error: unknown, code?: SeparationErrorCode): error is SeparationError {
    return error instanceof SeparationError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
