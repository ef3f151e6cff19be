import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
    MemoryStats,
    ObservationRecord,
    RetentionPolicy,
    SerializedObservation,
} from './memory_types';
import { StoreIOError } from './errors';
import { ISummarizer, fallbackSummary } from './Summarizer';
import {
    AtomicWriteDependencies,
    dbg,
    defaultAtomicWriteDependencies,
    errorCode,
    errorMessage,
    say,
    writeFileAtomic,
} from '../utils';
import { DEFAULT_MAX_ENTRIES, DEFAULT_RETENTION_DAYS, DEFAULT_SUMMARY_FALLBACK_LENGTH } from '../config';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const SerializedObservationSchema = z.object({
    id: z.number().int().positive(),
    timestamp: z.string().refine(value => !Number.isNaN(Date.parse(value)), {
        message: 'timestamp must be an ISO-8601 date',
    }),
    content: z.string(),
    summary: z.string(),
    source_ref: z.string(),
});

const ObservationLogSchema = z.array(SerializedObservationSchema);

const ObservationMetaSchema = z.object({
    last_id: z.number().int().nonnegative(),
});

export const DEFAULT_RETENTION_POLICY: RetentionPolicy = {
    retentionDays: DEFAULT_RETENTION_DAYS,
    maxEntries: DEFAULT_MAX_ENTRIES,
};

export interface ObservationStoreDependencies extends Partial<AtomicWriteDependencies> {
    readFileFn?: (path: string) => Promise<string>;
    mkdirFn?: (path: string) => Promise<void>;
    nowFn?: () => Date;
}

export interface ObservationStoreOptions {
    /** Path of the observation log (a JSON array of records). */
    filePath: string;
    retention?: RetentionPolicy;
    /** Used by append() when no precomputed summary is passed. */
    summarizer?: ISummarizer;
    /** Truncation length used when there is no summarizer. */
    fallbackLength?: number;
}

export interface AppendOptions {
    /** Precomputed summary; skips the summarizer. */
    summary?: string;
}

export function serializeObservation(record: ObservationRecord): SerializedObservation {
    return {
        id: record.id,
        timestamp: record.timestamp,
        content: record.content,
        summary: record.summary,
        source_ref: record.sourceRef,
    };
}

export function deserializeObservation(raw: SerializedObservation): ObservationRecord {
    return Object.freeze({
        id: raw.id,
        timestamp: raw.timestamp,
        content: raw.content,
        summary: raw.summary,
        sourceRef: raw.source_ref,
    });
}

/**
 * Applies the retention policy to id-ordered records: drops records older than the retention age,
 * then the oldest records beyond the maximum count.
 */
export function applyRetention(
    records: ObservationRecord[],
    policy: RetentionPolicy,
    now: Date
): { kept: ObservationRecord[]; removed: ObservationRecord[] } {
    let kept = records;
    if (policy.retentionDays !== null) {
        const cutoff = now.getTime() - policy.retentionDays * MS_PER_DAY;
        kept = kept.filter(record => Date.parse(record.timestamp) >= cutoff);
    }
    if (policy.maxEntries !== null && kept.length > policy.maxEntries) {
        kept = kept.slice(kept.length - policy.maxEntries);
    }
    const keptIds = new Set(kept.map(record => record.id));
    const removed = records.filter(record => !keptIds.has(record.id));
    return { kept, removed };
}

/**
 * Append-only, retention-bounded log of observations persisted to a single JSON file.
 * This is the source of truth for memory; the semantic index is only a cache over it.
 *
 * Writes are serialized through an internal queue and committed with write-to-temp-then-rename,
 * so the file on disk is always either the previous or the new complete state. The highest id ever
 * assigned is kept in a sidecar file (`<log>.meta.json`) so ids are never reused, even when
 * retention has removed every record.
 */
export class ObservationStore {
    private records: ObservationRecord[] = [];
    private lastId = 0;
    /** Ids handed out by `append()` whose write failed; `commit()` accepts only these. */
    private readonly uncommittedIds = new Set<number>();
    private writeQueue: Promise<void> = Promise.resolve();

    private readonly filePath: string;
    private readonly metaFilePath: string;
    private readonly retention: RetentionPolicy;
    private readonly summarizer?: ISummarizer;
    private readonly fallbackLength: number;

    private readonly readFileFn: (path: string) => Promise<string>;
    private readonly mkdirFn: (path: string) => Promise<void>;
    private readonly nowFn: () => Date;
    private readonly atomicWriteDeps: AtomicWriteDependencies;

    /**
     * Opens (and loads) the store at `options.filePath`. A missing file is an empty store.
     * @throws StoreIOError if the log exists but cannot be read or is corrupted.
     */
    static async open(options: ObservationStoreOptions, deps: ObservationStoreDependencies = {}): Promise<ObservationStore> {
        const store = new ObservationStore(options, deps);
        await store.load();
        return store;
    }

    private constructor(options: ObservationStoreOptions, deps: ObservationStoreDependencies) {
        this.filePath = path.resolve(options.filePath);
        this.metaFilePath = `${this.filePath.replace(/\.json$/, '')}.meta.json`;
        this.retention = options.retention ?? DEFAULT_RETENTION_POLICY;
        this.summarizer = options.summarizer;
        this.fallbackLength = options.fallbackLength ?? DEFAULT_SUMMARY_FALLBACK_LENGTH;

        this.readFileFn = deps.readFileFn ?? ((p: string) => fs.readFile(p, 'utf-8'));
        this.mkdirFn = deps.mkdirFn ?? (async (p: string) => { await fs.mkdir(p, { recursive: true }); });
        this.nowFn = deps.nowFn ?? (() => new Date());
        this.atomicWriteDeps = {
            writeFileFn: deps.writeFileFn ?? defaultAtomicWriteDependencies.writeFileFn,
            renameFn: deps.renameFn ?? defaultAtomicWriteDependencies.renameFn,
            unlinkFn: deps.unlinkFn ?? defaultAtomicWriteDependencies.unlinkFn,
        };
    }

    get path(): string {
        return this.filePath;
    }

    get size(): number {
        return this.records.length;
    }

    /** Highest id ever assigned (0 for a fresh store). */
    get lastAssignedId(): number {
        return this.lastId;
    }

    /**
     * (Re)loads committed state from disk, replacing the in-memory view.
     */
    async load(): Promise<void> {
        const records = await this.readLog();
        const metaLastId = await this.readMetaLastId();
        const maxRecordId = records.length > 0 ? records[records.length - 1].id : 0;

        this.records = records;
        this.lastId = Math.max(metaLastId, maxRecordId);
        dbg(`ObservationStore: loaded ${records.length} observations from ${this.filePath} (last id ${this.lastId}).`);
    }

    /**
     * Records a new observation: assigns the next id, stamps it with the current time, summarizes the
     * content (unless a summary is supplied), commits the full record set atomically and applies the
     * retention policy to the committed set.
     * @throws StoreIOError if the write fails; the error carries the record for a later `commit()`.
     */
    async append(content: string, sourceRef: string, options: AppendOptions = {}): Promise<ObservationRecord> {
        const summary = await this.resolveSummary(content, options.summary);
        return this.enqueue(async () => {
            this.lastId += 1;
            this.uncommittedIds.add(this.lastId);
            const record: ObservationRecord = Object.freeze({
                id: this.lastId,
                timestamp: this.nowFn().toISOString(),
                content,
                summary,
                sourceRef,
            });
            await this.commitNow(record);
            return record;
        });
    }

    /**
     * Persists a record built by a failed `append()` (retry path). Its id stays reserved while
     * later appends go ahead, so the retry can happen at any time during this run.
     * @throws Error if the id was not reserved by a failed append and is not above the highest assigned id.
     * @throws StoreIOError if the write fails again.
     */
    async commit(record: ObservationRecord): Promise<ObservationRecord> {
        return this.enqueue(async () => {
            if (!this.uncommittedIds.has(record.id) && record.id <= this.lastId) {
                throw new Error(`ObservationStore: cannot commit record ${record.id}; ids up to ${this.lastId} are already assigned.`);
            }
            const frozen = Object.freeze({ ...record });
            await this.commitNow(frozen);
            return frozen;
        });
    }

    /**
     * Removes records older than the retention age and beyond the maximum count, oldest first.
     * @returns the number of records removed.
     * @throws StoreIOError if persisting the pruned set fails (state is left unchanged).
     */
    async prune(): Promise<number> {
        return this.enqueue(async () => {
            const { kept, removed } = applyRetention(this.records, this.retention, this.nowFn());
            if (removed.length === 0) {
                return 0;
            }
            await this.writeState(kept, null);
            this.records = kept;
            say(`ObservationStore: pruned ${removed.length} observations.`);
            return removed.length;
        });
    }

    /**
     * The `n` most recent records, most recent first. Returns everything when fewer exist
     * and an empty list for a non-positive `n`.
     */
    recent(n: number): ObservationRecord[] {
        if (!Number.isFinite(n) || n <= 0) {
            return [];
        }
        return this.records.slice(-Math.floor(n)).reverse();
    }

    get(id: number): ObservationRecord | undefined {
        return this.records.find(record => record.id === id);
    }

    /** All records, oldest first. */
    all(): readonly ObservationRecord[] {
        return this.records;
    }

    ids(): Set<number> {
        return new Set(this.records.map(record => record.id));
    }

    stats(): MemoryStats {
        return {
            totalEntries: this.records.length,
            oldestEntry: this.records[0]?.timestamp ?? null,
            newestEntry: this.records[this.records.length - 1]?.timestamp ?? null,
            lastId: this.lastId,
        };
    }

    private async resolveSummary(content: string, precomputed?: string): Promise<string> {
        if (precomputed !== undefined && precomputed.trim() !== '') {
            return precomputed.trim();
        }
        if (this.summarizer) {
            return this.summarizer.summarize(content);
        }
        return fallbackSummary(content, this.fallbackLength);
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.writeQueue.then(task);
        // The queue only orders writes; each caller receives its own outcome through `run`.
        this.writeQueue = run.then(() => undefined, () => undefined);
        return run;
    }

    private async commitNow(record: ObservationRecord): Promise<void> {
        const candidates = [...this.records, record].sort((a, b) => a.id - b.id);
        const { kept, removed } = applyRetention(candidates, this.retention, this.nowFn());
        const lastId = Math.max(this.lastId, record.id);
        await this.writeState(kept, lastId, record);
        this.records = kept;
        this.lastId = lastId;
        this.uncommittedIds.delete(record.id);
        dbg(`ObservationStore: observation ${record.id} committed.`);
        if (removed.length > 0) {
            say(`ObservationStore: pruned ${removed.length} observations.`);
        }
    }

    private async writeState(records: ObservationRecord[], newLastId: number | null, pending?: ObservationRecord): Promise<void> {
        try {
            await this.mkdirFn(path.dirname(this.filePath));
            if (newLastId !== null) {
                await writeFileAtomic(this.metaFilePath, JSON.stringify({ last_id: newLastId }), this.atomicWriteDeps);
            }
            const data = JSON.stringify(records.map(serializeObservation), null, 2);
            await writeFileAtomic(this.filePath, data, this.atomicWriteDeps);
        } catch (error) {
            console.error(`ObservationStore: Error saving ${this.filePath}: ${errorMessage(error)}`);
            throw new StoreIOError(`Failed to persist observation log ${this.filePath}: ${errorMessage(error)}`, {
                record: pending,
                cause: error,
            });
        }
    }

    private async readLog(): Promise<ObservationRecord[]> {
        let data: string;
        try {
            data = await this.readFileFn(this.filePath);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                dbg(`ObservationStore: no log at ${this.filePath}, starting empty.`);
                return [];
            }
            throw new StoreIOError(`Failed to read observation log ${this.filePath}: ${errorMessage(error)}`, { cause: error });
        }
        if (data.trim() === '') {
            return [];
        }

        let raw: unknown;
        try {
            raw = JSON.parse(data);
        } catch (error) {
            throw new StoreIOError(`Observation log ${this.filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
        }
        const parsed = ObservationLogSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new StoreIOError(
                `Observation log ${this.filePath} is corrupted at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`
            );
        }

        const records = parsed.data.map(deserializeObservation).sort((a, b) => a.id - b.id);
        for (let i = 1; i < records.length; i++) {
            if (records[i].id === records[i - 1].id) {
                throw new StoreIOError(`Observation log ${this.filePath} contains duplicate id ${records[i].id}`);
            }
        }
        return records;
    }

    private async readMetaLastId(): Promise<number> {
        try {
            const data = await this.readFileFn(this.metaFilePath);
            const parsed = ObservationMetaSchema.safeParse(JSON.parse(data));
            if (parsed.success) {
                return parsed.data.last_id;
            }
            console.warn(`ObservationStore: ignoring malformed id file ${this.metaFilePath}.`);
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') {
                console.warn(`ObservationStore: could not read id file ${this.metaFilePath}: ${errorMessage(error)}`);
            }
        }
        return 0;
    }
}
