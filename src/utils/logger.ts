import type { AddLog, LogEntry } from '../types';

export interface LogCollector {
    logs: LogEntry[];
    addLog: AddLog;
}

/**
 * Keep log entries in memory, oldest first
 */
export function createLogCollector(): LogCollector {
    const logs: LogEntry[] = [];
    const addLog: AddLog = (message, type = 'info') => {
        logs.push({ timestamp: new Date(), message, type });
    };
    return { logs, addLog };
}

/**
 * Write log entries to the console with a [prefix] tag
 */
export function createConsoleLog(prefix: string): AddLog {
    return (message, type = 'info') => {
        const line = `[${prefix}] ${message}`;
        if (type === 'error') {
            console.error(line);
        } else {
            console.log(line);
        }
    };
}

export const silentLog: AddLog = () => {};

export function formatLogEntry(entry: LogEntry): string {
    return `[${entry.timestamp.toLocaleTimeString()}] ${entry.message}`;
}

/**
 * Seconds elapsed since `startTime` (a performance.now() reading), two decimals
 */
export function elapsedSeconds(startTime: number): string {
    return ((performance.now() - startTime) / 1000).toFixed(2);
}
