import { ObservationRecord, MemoryStats, QueryContext, RetrievalResult } from './memory_types';
import { AppendOptions, ObservationStore, ObservationStoreDependencies } from './ObservationStore';
import { ISummarizer, Summarizer } from './Summarizer';
import { IndexAvailability, SemanticIndex } from './SemanticIndex';
import { IVectorStore, JsonVectorStore, VectorStoreDependencies } from './VectorStore';
import { HybridRetriever } from './HybridRetriever';
import { MemoryQueryTools } from './MemoryQueryTools';
import { ContextQueryBuilder } from './contextQuery';
import { IEmbeddingClient, ILLMClient } from '../agents/ILLMClient';
import { PromptService } from '../services/PromptService';
import { MemoirConfig } from '../config';
import { dbg, errorMessage } from '../utils';

export interface MemoryServiceDependencies {
    /** Chat client used for summaries; null means summaries always use the truncation fallback. */
    llmClient: ILLMClient | null;
    /** Embedding client; null means the semantic index is unavailable. */
    embeddingClient: IEmbeddingClient | null;
    promptService?: PromptService;
    summarizer?: ISummarizer;
    vectorStore?: IVectorStore;
    storeDeps?: ObservationStoreDependencies;
    vectorStoreDeps?: VectorStoreDependencies;
    buildQuery?: ContextQueryBuilder;
}

export interface MemoryServiceStats extends MemoryStats {
    semanticIndex: IndexAvailability;
    indexedEntries: number;
}

/**
 * Wires the observation store, summarizer, semantic index, retriever and query tools
 * from one configuration, and keeps the index following the store.
 */
export class MemoryService {
    private readonly pendingIndexUpdates = new Set<Promise<void>>();

    /**
     * Opens the observation log and resolves semantic index availability.
     * @throws StoreIOError if the log cannot be loaded.
     */
    static async create(config: MemoirConfig, deps: MemoryServiceDependencies): Promise<MemoryService> {
        const summarizer = deps.summarizer ?? new Summarizer(deps.llmClient, deps.promptService ?? new PromptService(), {
            modelName: config.summaryModel,
            maxLength: config.summaryMaxLength,
            fallbackLength: config.summaryFallbackLength,
            timeoutMs: config.summaryTimeoutMs,
        });
        const store = await ObservationStore.open(
            {
                filePath: config.observationsFile,
                retention: { retentionDays: config.retentionDays, maxEntries: config.maxEntries },
                summarizer,
                fallbackLength: config.summaryFallbackLength,
            },
            deps.storeDeps
        );
        const vectorStore = deps.vectorStore
            ?? new JsonVectorStore(config.semanticIndexFile, config.embeddingModel, deps.vectorStoreDeps);
        const index = new SemanticIndex(deps.embeddingClient, vectorStore, config.semanticSearchEnabled, {
            addTimeoutMs: config.semanticTimeoutMs,
        });
        await index.initialize();

        const retriever = new HybridRetriever(store, index, {
            maxResults: config.maxPromptMemories,
            semanticTimeoutMs: config.semanticTimeoutMs,
            buildQuery: deps.buildQuery,
        });
        const tools = new MemoryQueryTools(store, index, { minRelevanceScore: config.minRelevanceScore });
        return new MemoryService(config, store, index, retriever, tools);
    }

    private constructor(
        readonly config: MemoirConfig,
        readonly store: ObservationStore,
        readonly index: SemanticIndex,
        readonly retriever: HybridRetriever,
        readonly tools: MemoryQueryTools
    ) {}

    /**
     * Appends an observation, then updates the semantic index in the background.
     * Only the append can fail the call.
     * @throws StoreIOError when the observation could not be persisted.
     */
    async recordObservation(content: string, sourceRef: string, options: AppendOptions = {}): Promise<ObservationRecord> {
        const record = await this.store.append(content, sourceRef, options);
        this.scheduleIndexUpdate(record);
        return record;
    }

    /** Waits for every background index update started so far. */
    async flushIndexUpdates(): Promise<void> {
        await Promise.all([...this.pendingIndexUpdates]);
    }

    /** Hybrid retrieval with the configured window sizes unless overridden. */
    async retrieve(
        queryContext?: QueryContext,
        recentCount: number = this.config.recentCount,
        semanticTopK: number = this.config.semanticTopK
    ): Promise<RetrievalResult[]> {
        return this.retriever.retrieve(recentCount, semanticTopK, queryContext);
    }

    /**
     * Re-embeds the observation log into the semantic index.
     * @returns the number of records embedded.
     * @throws IndexUnavailableError when semantic search is unavailable.
     */
    async rebuildIndex(force: boolean = false): Promise<number> {
        await this.flushIndexUpdates();
        return this.index.rebuild(this.store.all(), { force });
    }

    getStats(): MemoryServiceStats {
        return {
            ...this.store.stats(),
            semanticIndex: this.index.getAvailability(),
            indexedEntries: this.index.size,
        };
    }

    private scheduleIndexUpdate(record: ObservationRecord): void {
        const update = this.updateIndex(record).finally(() => {
            this.pendingIndexUpdates.delete(update);
        });
        this.pendingIndexUpdates.add(update);
    }

    private async updateIndex(record: ObservationRecord): Promise<void> {
        try {
            if (await this.index.add(record.id, record.summary || record.content)) {
                dbg(`MemoryService: indexed observation ${record.id}.`);
            }
            await this.index.retain(this.store.ids());
        } catch (error) {
            console.warn(`MemoryService: index update for observation ${record.id} failed: ${errorMessage(error)}`);
        }
    }
}
