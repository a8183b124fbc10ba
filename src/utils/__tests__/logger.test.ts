import { afterEach, describe, it, expect, vi } from 'vitest';
import { SeparationError, errorMessage, invalidParameter, isSeparationError } from '../errors';
import { createConsoleLog, createLogCollector, elapsedSeconds, formatLogEntry } from '../logger';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('createLogCollector', () => {
    it('keeps entries in order with info as the default type', () => {
        const { logs, addLog } = createLogCollector();

        addLog('Loading model...');
        addLog('Model loaded', 'success');

        expect(logs.map(({ message, type }) => [message, type])).toEqual([
            ['Loading model...', 'info'],
            ['Model loaded', 'success'],
        ]);
        expect(logs[0].timestamp).toBeInstanceOf(Date);
    });
});

describe('createConsoleLog', () => {
    it('tags lines and sends errors to stderr', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const addLog = createConsoleLog('separate');

        addLog('Starting separation...');
        addLog('Separation failed: boom', 'error');

        expect(log).toHaveBeenCalledWith('[separate] Starting separation...');
        expect(error).toHaveBeenCalledWith('[separate] Separation failed: boom');
    });
});

describe('formatLogEntry', () => {
    it('prefixes the local time', () => {
        const timestamp = new Date(2024, 0, 1, 9, 5, 3);
        const line = formatLogEntry({ timestamp, message: 'done', type: 'success' });

        expect(line).toBe(`[${timestamp.toLocaleTimeString()}] done`);
    });
});

describe('elapsedSeconds', () => {
    it('formats with two decimals', () => {
        expect(elapsedSeconds(performance.now())).toMatch(/^\d+\.\d{2}$/);
    });
});

describe('SeparationError', () => {
    it('carries a code and an optional cause', () => {
        const cause = new Error('inner');
        const error = new SeparationError('ModelUnavailable', 'outer', { cause });

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('SeparationError');
        expect(error.cause).toBe(cause);
        expect(isSeparationError(error)).toBe(true);
        expect(isSeparationError(error, 'ModelUnavailable')).toBe(true);
        expect(isSeparationError(error, 'EmptyInput')).toBe(false);
        expect(isSeparationError(cause)).toBe(false);
        expect(invalidParameter('bad').code).toBe('InvalidParameter');
    });

    it('extracts messages from anything thrown', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(404)).toBe('404');
    });
});
