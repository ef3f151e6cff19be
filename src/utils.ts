import * as uuid from 'uuid';
import * as fsPromises from 'fs/promises';
import * as path from 'path';

export function dbg(s: string) {
    console.debug(s);
}

export function say(s: string) {
    console.log(s);
}

/**
 * Reduces a caught value to a printable message.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Node file-system errors carry a `code` (ENOENT, ENOSPC, ...). Anything else yields undefined.
 */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        return typeof error.code === 'string' ? error.code : undefined;
    }
    return undefined;
}

export function newConversationId(): string {
    return uuid.v4();
}

export interface AtomicWriteDependencies {
    writeFileFn: (path: string, data: string) => Promise<void>;
    renameFn: (from: string, to: string) => Promise<void>;
    unlinkFn: (path: string) => Promise<void>;
}

export const defaultAtomicWriteDependencies: AtomicWriteDependencies = {
    writeFileFn: (filePath: string, data: string) => fsPromises.writeFile(filePath, data, 'utf-8'),
    renameFn: (from: string, to: string) => fsPromises.rename(from, to),
    unlinkFn: (filePath: string) => fsPromises.unlink(filePath),
};

let tempCounter = 0;

/**
 * Writes `data` to a sibling temp file and renames it over `filePath`.
 * Readers see either the previous content or the new content, never a partial file.
 * On failure the temp file is removed and the original error is re-thrown.
 */
export async function writeFileAtomic(
    filePath: string,
    data: string,
    deps: AtomicWriteDependencies = defaultAtomicWriteDependencies
): Promise<void> {
    tempCounter += 1;
    const tempPath = path.join(
        path.dirname(filePath),
        `.${path.basename(filePath)}.${process.pid}.${tempCounter}.tmp`
    );
    try {
        await deps.writeFileFn(tempPath, data);
        await deps.renameFn(tempPath, filePath);
    } catch (error) {
        try {
            await deps.unlinkFn(tempPath);
        } catch (cleanupError) {
            dbg(`writeFileAtomic: could not remove temp file ${tempPath}: ${errorMessage(cleanupError)}`);
        }
        throw error;
    }
}

export class TimeoutError extends Error {
    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Races `promise` against a timer. A non-positive timeout disables the timer.
 * The timer is always cleared so it never keeps the process alive.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    if (timeoutMs <= 0) {
        return promise;
    }
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            timedOut = true;
            reject(new TimeoutError(label, timeoutMs));
        }, timeoutMs);
    });
    // A promise abandoned by the timeout may still reject later; that failure is only logged.
    void promise.catch((error: unknown) => {
        if (timedOut) {
            dbg(`${label} failed after timing out: ${errorMessage(error)}`);
        }
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}
