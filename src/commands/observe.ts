import * as fs from 'fs/promises';
import { MemoryService } from '../memory/MemoryService';
import { ObservationRecord } from '../memory/memory_types';
import { dbg, say } from '../utils';

export const DEFAULT_SOURCE_REF = 'cli';

export interface ObserveOptions {
    content?: string;
    file?: string;
    source?: string;
    summary?: string;
}

type ReadFileFn = (path: string) => Promise<string>;

/**
 * Handles the 'observe' command: records one observation from inline text or a file.
 *
 * @throws Error when neither or both of `content` and `file` are given.
 * @throws StoreIOError when the observation could not be persisted.
 */
export async function runObserve(
    options: ObserveOptions,
    memoryService: MemoryService,
    readFile: ReadFileFn = (path: string) => fs.readFile(path, 'utf-8')
): Promise<ObservationRecord> {
    if ((options.content === undefined) === (options.file === undefined)) {
        throw new Error("Provide exactly one of --content or --file for the 'observe' command.");
    }
    const content = options.content ?? await readFile(options.file ?? '');
    dbg(`Recording observation (${content.length} characters) from ${options.source ?? DEFAULT_SOURCE_REF}`);

    const record = await memoryService.recordObservation(content, options.source ?? DEFAULT_SOURCE_REF, {
        summary: options.summary,
    });
    say(`Recorded observation #${record.id} at ${record.timestamp}`);
    say(`Summary: ${record.summary}`);

    await memoryService.flushIndexUpdates();
    return record;
}
