import { IEmbeddingClient } from '../agents/ILLMClient';
import { IVectorStore } from './VectorStore';
import { ObservationRecord, SemanticHit } from './memory_types';
import { IndexUnavailableError } from './errors';
import { dbg, errorMessage, say, withTimeout } from '../utils';

export type IndexAvailability = 'unknown' | 'available' | 'unavailable';

/**
 * Similarity search over record summaries. Consumers only rely on this surface.
 */
export interface ISemanticIndex {
    isAvailable(): Promise<boolean>;
    /** Best effort; never rejects. Resolves false when the vector was not stored. */
    add(recordId: number, text: string): Promise<boolean>;
    /** @throws IndexUnavailableError, or the embedding failure that made the index unavailable. */
    query(text: string, topK: number): Promise<SemanticHit[]>;
}

export interface SemanticIndexOptions {
    /** Upper bound for the embedding call made by `add()`; 0 disables it. */
    addTimeoutMs?: number;
}

export interface RebuildOptions {
    /** Re-embed every record instead of only those without a vector. */
    force?: boolean;
}

/**
 * Embedding-backed index with an explicit availability lifecycle:
 * `unknown` until first use, then `available` or `unavailable` for the rest of the process.
 * An embedding failure flips it to `unavailable`; nothing retries.
 */
export class SemanticIndex implements ISemanticIndex {
    private availability: IndexAvailability = 'unknown';
    private unavailableReason?: string;
    private initializing?: Promise<boolean>;
    private readonly addTimeoutMs: number;

    constructor(
        private readonly embeddingClient: IEmbeddingClient | null,
        private readonly vectorStore: IVectorStore,
        private readonly enabled: boolean = true,
        options: SemanticIndexOptions = {}
    ) {
        this.addTimeoutMs = options.addTimeoutMs ?? 0;
    }

    getAvailability(): IndexAvailability {
        return this.availability;
    }

    get size(): number {
        return this.availability === 'available' ? this.vectorStore.size : 0;
    }

    /**
     * Resolves availability once: loads stored vectors when an embedding client is configured.
     */
    async initialize(): Promise<boolean> {
        if (this.availability !== 'unknown') {
            return this.availability === 'available';
        }
        if (!this.initializing) {
            this.initializing = this.doInitialize();
        }
        return this.initializing;
    }

    async isAvailable(): Promise<boolean> {
        return this.initialize();
    }

    markUnavailable(reason: string): void {
        if (this.availability === 'unavailable') {
            return;
        }
        this.availability = 'unavailable';
        this.unavailableReason = reason;
        this.vectorStore.clear();
        console.warn(`SemanticIndex: disabled for this run: ${reason}`);
    }

    async add(recordId: number, text: string): Promise<boolean> {
        if (!(await this.initialize())) {
            dbg(`SemanticIndex: skipping add for record ${recordId} (index unavailable).`);
            return false;
        }
        try {
            // A timeout only drops this add; the index stays available.
            const vector = await withTimeout(this.embed(text), this.addTimeoutMs, 'Embedding');
            this.vectorStore.upsert(recordId, vector);
        } catch (error) {
            console.warn(`SemanticIndex: could not index record ${recordId}: ${errorMessage(error)}`);
            return false;
        }
        return this.persist();
    }

    async query(text: string, topK: number): Promise<SemanticHit[]> {
        if (!(await this.initialize())) {
            throw new IndexUnavailableError(this.unavailableReason ?? 'not initialized');
        }
        if (topK <= 0 || this.vectorStore.size === 0) {
            return [];
        }
        const vector = await this.embed(text);
        return this.vectorStore.search(vector, topK);
    }

    /**
     * Drops vectors whose record no longer exists.
     * @returns the number of vectors removed.
     */
    async retain(liveIds: Set<number>): Promise<number> {
        if (this.availability !== 'available') {
            return 0;
        }
        let removed = 0;
        for (const id of this.vectorStore.ids()) {
            if (!liveIds.has(id) && this.vectorStore.remove(id)) {
                removed++;
            }
        }
        if (removed > 0) {
            dbg(`SemanticIndex: dropped ${removed} orphaned vectors.`);
            await this.persist();
        }
        return removed;
    }

    /**
     * Recreates the index from the observation log. Only records without a vector are embedded
     * unless `force` is set; vectors of records that no longer exist are dropped.
     * @returns the number of records embedded.
     * @throws IndexUnavailableError when the index is (or becomes) unavailable.
     */
    async rebuild(records: readonly ObservationRecord[], options: RebuildOptions = {}): Promise<number> {
        if (!(await this.initialize())) {
            throw new IndexUnavailableError(this.unavailableReason ?? 'not initialized');
        }
        if (options.force) {
            this.vectorStore.clear();
        }

        let embedded = 0;
        for (const record of records) {
            if (this.vectorStore.has(record.id)) {
                continue;
            }
            const vector = await this.embed(record.summary || record.content);
            this.vectorStore.upsert(record.id, vector);
            embedded++;
        }
        const liveIds = new Set(records.map(record => record.id));
        for (const id of this.vectorStore.ids()) {
            if (!liveIds.has(id)) {
                this.vectorStore.remove(id);
            }
        }

        await this.vectorStore.save();
        say(`SemanticIndex: rebuilt index (${embedded} embedded, ${this.vectorStore.size} total).`);
        return embedded;
    }

    private async doInitialize(): Promise<boolean> {
        if (!this.enabled) {
            this.markUnavailable('semantic search is disabled by configuration');
            return false;
        }
        if (!this.embeddingClient) {
            this.markUnavailable('no embedding client configured');
            return false;
        }
        try {
            await this.vectorStore.load();
            this.availability = 'available';
            dbg(`SemanticIndex: available with ${this.vectorStore.size} vectors (${this.embeddingClient.modelName}).`);
            return true;
        } catch (error) {
            this.markUnavailable(`could not load vector store: ${errorMessage(error)}`);
            return false;
        }
    }

    private async embed(text: string): Promise<number[]> {
        if (!this.embeddingClient) {
            throw new IndexUnavailableError('no embedding client configured');
        }
        try {
            return await this.embeddingClient.embed(text);
        } catch (error) {
            this.markUnavailable(`embedding failed: ${errorMessage(error)}`);
            throw error;
        }
    }

    private async persist(): Promise<boolean> {
        try {
            await this.vectorStore.save();
            return true;
        } catch (error) {
            console.warn(`SemanticIndex: could not save vectors: ${errorMessage(error)}`);
            return false;
        }
    }
}
