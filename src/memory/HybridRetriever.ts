import { ObservationRecord, QueryContext, RetrievalResult, SemanticHit } from './memory_types';
import { ISemanticIndex } from './SemanticIndex';
import { ContextQueryBuilder, buildContextQuery } from './contextQuery';
import { dbg, errorMessage, withTimeout } from '../utils';
import { DEFAULT_SEMANTIC_TIMEOUT_MS } from '../config';

/** The read side of the observation store the retriever needs. */
export interface RecordLookup {
    recent(n: number): ObservationRecord[];
    get(id: number): ObservationRecord | undefined;
}

export interface HybridRetrieverOptions {
    /** Upper bound on the merged result; only semantic results are trimmed to honor it. */
    maxResults?: number;
    /** Applied to the whole semantic path (embedding plus search). */
    semanticTimeoutMs?: number;
    buildQuery?: ContextQueryBuilder;
}

/**
 * Resolves semantic hits to records, dropping ids in `excludeIds`, repeated ids and ids whose record
 * is gone (pruned after it was indexed). Ordered by descending score, ties to the higher id.
 */
export function resolveSemanticHits(
    hits: SemanticHit[],
    excludeIds: Set<number>,
    lookup: Pick<RecordLookup, 'get'>
): RetrievalResult[] {
    const seen = new Set(excludeIds);
    const results: RetrievalResult[] = [];
    for (const hit of hits) {
        if (seen.has(hit.recordId)) {
            continue;
        }
        const record = lookup.get(hit.recordId);
        if (!record) {
            dbg(`HybridRetriever: ignoring hit for missing record ${hit.recordId}.`);
            continue;
        }
        seen.add(hit.recordId);
        results.push({ record, rankSource: 'semantic', score: hit.score });
    }
    return results.sort((a, b) => (b.score ?? 0) - (a.score ?? 0) || b.record.id - a.record.id);
}

/**
 * Combines the guaranteed most-recent window with a best-effort similarity search.
 * Retrieval never fails: any problem on the semantic path leaves exactly the recency results.
 */
export class HybridRetriever {
    private readonly maxResults?: number;
    private readonly semanticTimeoutMs: number;
    private readonly buildQuery: ContextQueryBuilder;

    constructor(
        private readonly store: RecordLookup,
        private readonly index: ISemanticIndex | null,
        options: HybridRetrieverOptions = {}
    ) {
        this.maxResults = options.maxResults;
        this.semanticTimeoutMs = options.semanticTimeoutMs ?? DEFAULT_SEMANTIC_TIMEOUT_MS;
        this.buildQuery = options.buildQuery ?? buildContextQuery;
    }

    /**
     * @returns recency results (most recent first) followed by unique semantic results (best first).
     */
    async retrieve(recentCount: number, semanticTopK: number, queryContext?: QueryContext): Promise<RetrievalResult[]> {
        const recent: RetrievalResult[] = this.store
            .recent(recentCount)
            .map((record): RetrievalResult => ({ record, rankSource: 'recency' }));

        const semanticBudget = this.maxResults === undefined
            ? semanticTopK
            : Math.min(semanticTopK, this.maxResults - recent.length);
        if (!this.index || semanticBudget <= 0) {
            return recent;
        }

        let hits: SemanticHit[];
        try {
            if (!(await this.index.isAvailable())) {
                return recent;
            }
            const query = this.buildQuery(queryContext);
            dbg(`HybridRetriever: semantic query "${query}" (top ${semanticTopK}).`);
            hits = await withTimeout(this.index.query(query, semanticTopK), this.semanticTimeoutMs, 'Semantic search');
        } catch (error) {
            console.warn(`HybridRetriever: semantic search skipped, using recent memories only: ${errorMessage(error)}`);
            return recent;
        }

        const recentIds = new Set(recent.map(result => result.record.id));
        const semantic = resolveSemanticHits(hits, recentIds, this.store).slice(0, semanticBudget);
        dbg(`HybridRetriever: ${recent.length} recent, ${semantic.length} semantic memories.`);
        return [...recent, ...semantic];
    }
}
