import { ObservationRecord } from './memory_types';

/**
 * Persisting the observation log failed. The previously committed file is intact.
 * When raised by an append, `record` holds the un-persisted record so the caller can retry it.
 */
export class StoreIOError extends Error {
    readonly record?: ObservationRecord;
    readonly cause?: unknown;

    constructor(message: string, options: { record?: ObservationRecord; cause?: unknown } = {}) {
        super(message);
        this.name = 'StoreIOError';
        this.record = options.record;
        this.cause = options.cause;
    }
}

/**
 * The semantic index is unavailable for the remainder of this process.
 */
export class IndexUnavailableError extends Error {
    constructor(reason: string) {
        super(`Semantic index unavailable: ${reason}`);
        this.name = 'IndexUnavailableError';
    }
}

/**
 * A requested tool call could not be executed (unknown tool, malformed or invalid arguments).
 */
export class ToolExecutionError extends Error {
    readonly toolName: string;

    constructor(toolName: string, message: string) {
        super(message);
        this.name = 'ToolExecutionError';
        this.toolName = toolName;
    }
}
