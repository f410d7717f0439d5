import { Logger, createLogger } from './logger.js';

export interface AuditEntry {
    action: string;
    args: unknown;
    result?: unknown;
    error?: string;
    duration: number;
    timestamp: string;
}

export const DEFAULT_AUDIT_CAPACITY = 500;

/**
 * Records every tool call in memory, keeping the most recent `capacity`
 * entries, and logs a one-line summary of it.
 */
export class AuditLogger {
    private entries: AuditEntry[] = [];
    private logger: Logger;
    private capacity: number;

    constructor(logger: Logger = createLogger('Audit'), capacity: number = DEFAULT_AUDIT_CAPACITY) {
        this.logger = logger;
        this.capacity = capacity;
    }

    wrapHandler<A, R>(toolName: string, handler: (args: A) => Promise<R>): (args: A) => Promise<R> {
        return async (args: A) => {
            const startTime = Date.now();
            let result: R | undefined;
            let error: unknown;

            try {
                result = await handler(args);
                return result;
            } catch (e) {
                error = e;
                throw e;
            } finally {
                try {
                    this.record({
                        action: toolName,
                        args,
                        result,
                        error: error === undefined ? undefined : error instanceof Error ? error.message : String(error),
                        duration: Date.now() - startTime,
                        timestamp: new Date().toISOString()
                    });
                } catch (logError) {
                    this.logger.error('Failed to write audit log:', logError);
                }
            }
        };
    }

    list(): readonly AuditEntry[] {
        return [...this.entries];
    }

    private record(entry: AuditEntry): void {
        this.entries.push(entry);
        if (this.entries.length > this.capacity) {
            this.entries.splice(0, this.entries.length - this.capacity);
        }

        if (entry.error !== undefined) {
            this.logger.error(`${entry.action} failed after ${entry.duration}ms: ${entry.error}`);
        } else {
            this.logger.info(`${entry.action} completed in ${entry.duration}ms`);
        }
    }
}
