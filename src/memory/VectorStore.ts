import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { EmbeddingEntry, SemanticHit } from './memory_types';
import {
    AtomicWriteDependencies,
    dbg,
    defaultAtomicWriteDependencies,
    errorCode,
    errorMessage,
    writeFileAtomic,
} from '../utils';

export const VECTOR_STORE_FORMAT_VERSION = 1;

const VectorFileSchema = z.object({
    version: z.literal(VECTOR_STORE_FORMAT_VERSION),
    model: z.string(),
    dimensions: z.number().int().nonnegative(),
    entries: z.array(z.object({
        record_id: z.number().int().positive(),
        vector: z.array(z.number()),
    })),
});

export interface IVectorStore {
    readonly size: number;
    load(): Promise<void>;
    upsert(recordId: number, vector: number[]): void;
    remove(recordId: number): boolean;
    has(recordId: number): boolean;
    ids(): number[];
    clear(): void;
    /** At most `topK` hits by descending similarity; ties go to the higher record id. */
    search(query: number[], topK: number): SemanticHit[];
    save(): Promise<void>;
}

export interface VectorStoreDependencies extends Partial<AtomicWriteDependencies> {
    readFileFn?: (path: string) => Promise<string>;
    mkdirFn?: (path: string) => Promise<void>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length === 0 || a.length !== b.length) return 0;

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Embedding vectors kept in memory and persisted as one JSON file.
 * The file is a cache: unreadable contents or vectors built by another model are discarded.
 */
export class JsonVectorStore implements IVectorStore {
    private entries = new Map<number, number[]>();
    private dimensions = 0;
    private saveQueue: Promise<void> = Promise.resolve();

    private readonly filePath: string;
    private readonly readFileFn: (path: string) => Promise<string>;
    private readonly mkdirFn: (path: string) => Promise<void>;
    private readonly atomicWriteDeps: AtomicWriteDependencies;

    constructor(filePath: string, private readonly modelName: string, deps: VectorStoreDependencies = {}) {
        this.filePath = path.resolve(filePath);
        this.readFileFn = deps.readFileFn ?? ((p: string) => fs.readFile(p, 'utf-8'));
        this.mkdirFn = deps.mkdirFn ?? (async (p: string) => { await fs.mkdir(p, { recursive: true }); });
        this.atomicWriteDeps = {
            writeFileFn: deps.writeFileFn ?? defaultAtomicWriteDependencies.writeFileFn,
            renameFn: deps.renameFn ?? defaultAtomicWriteDependencies.renameFn,
            unlinkFn: deps.unlinkFn ?? defaultAtomicWriteDependencies.unlinkFn,
        };
    }

    get size(): number {
        return this.entries.size;
    }

    async load(): Promise<void> {
        this.clear();

        let data: string;
        try {
            data = await this.readFileFn(this.filePath);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                dbg(`VectorStore: no index file at ${this.filePath}, starting empty.`);
                return;
            }
            throw error;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(data);
        } catch (error) {
            console.warn(`VectorStore: discarding unreadable index file ${this.filePath}: ${errorMessage(error)}`);
            return;
        }
        const parsed = VectorFileSchema.safeParse(raw);
        if (!parsed.success) {
            console.warn(`VectorStore: discarding malformed index file ${this.filePath}.`);
            return;
        }
        if (parsed.data.model !== this.modelName) {
            console.warn(`VectorStore: index was built with model '${parsed.data.model}', not '${this.modelName}'; discarding stored vectors.`);
            return;
        }

        for (const entry of parsed.data.entries) {
            if (entry.vector.length !== parsed.data.dimensions) {
                dbg(`VectorStore: skipping entry ${entry.record_id} with ${entry.vector.length} dimensions.`);
                continue;
            }
            this.entries.set(entry.record_id, entry.vector);
        }
        this.dimensions = this.entries.size > 0 ? parsed.data.dimensions : 0;
        dbg(`VectorStore: loaded ${this.entries.size} vectors from ${this.filePath}.`);
    }

    upsert(recordId: number, vector: number[]): void {
        if (vector.length === 0) {
            throw new Error(`VectorStore: refusing empty vector for record ${recordId}.`);
        }
        if (this.entries.size > 0 && vector.length !== this.dimensions) {
            throw new Error(`VectorStore: vector for record ${recordId} has ${vector.length} dimensions, expected ${this.dimensions}.`);
        }
        this.dimensions = vector.length;
        this.entries.set(recordId, vector);
    }

    remove(recordId: number): boolean {
        const removed = this.entries.delete(recordId);
        if (this.entries.size === 0) {
            this.dimensions = 0;
        }
        return removed;
    }

    has(recordId: number): boolean {
        return this.entries.has(recordId);
    }

    ids(): number[] {
        return [...this.entries.keys()];
    }

    clear(): void {
        this.entries.clear();
        this.dimensions = 0;
    }

    search(query: number[], topK: number): SemanticHit[] {
        if (topK <= 0 || this.entries.size === 0) {
            return [];
        }
        const hits: SemanticHit[] = [];
        for (const [recordId, vector] of this.entries) {
            const score = cosineSimilarity(query, vector);
            if (Number.isFinite(score)) {
                hits.push({ recordId, score });
            }
        }
        hits.sort((a, b) => b.score - a.score || b.recordId - a.recordId);
        return hits.slice(0, Math.floor(topK));
    }

    /**
     * Writes the current vectors. Saves run one at a time and each snapshots the vectors
     * when it starts, so the file always ends with the latest state.
     */
    save(): Promise<void> {
        const run = this.saveQueue.then(() => this.writeSnapshot());
        this.saveQueue = run.then(() => undefined, () => undefined);
        return run;
    }

    private async writeSnapshot(): Promise<void> {
        const entries: EmbeddingEntry[] = [...this.entries]
            .sort(([a], [b]) => a - b)
            .map(([recordId, vector]) => ({ recordId, vector }));
        const payload = {
            version: VECTOR_STORE_FORMAT_VERSION,
            model: this.modelName,
            dimensions: this.dimensions,
            entries: entries.map(entry => ({ record_id: entry.recordId, vector: entry.vector })),
        };
        await this.mkdirFn(path.dirname(this.filePath));
        await writeFileAtomic(this.filePath, JSON.stringify(payload), this.atomicWriteDeps);
    }
}
