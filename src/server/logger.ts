export type LogLevel = 'silent' | 'error' | 'warn' | 'info';

export type LogSink = (line: string, ...details: unknown[]) => void;

export interface Logger {
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3
};

/**
 * Tagged stderr logger: `[Server] message`. stdout belongs to the stdio
 * transport, so nothing here may write to it.
 */
export function createLogger(tag: string, level: LogLevel = 'info', sink: LogSink = console.error): Logger {
    const emit = (threshold: LogLevel, message: string, details: unknown[]) => {
        if (LEVEL_RANK[level] >= LEVEL_RANK[threshold]) {
            sink(`[${tag}] ${message}`, ...details);
        }
    };

    return {
        info: (message, ...details) => emit('info', message, details),
        warn: (message, ...details) => emit('warn', message, details),
        error: (message, ...details) => emit('error', message, details)
    };
}
