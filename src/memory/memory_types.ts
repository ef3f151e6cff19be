/**
 * One stored observation. Created once by the ObservationStore and never mutated;
 * removed only by retention pruning.
 */
export interface ObservationRecord {
    /** Strictly increasing, never reused, even after pruning. */
    id: number;
    /** ISO-8601 UTC instant at which the observation was recorded. */
    timestamp: string;
    /** Full narrative text. */
    content: string;
    /** Short synopsis produced by the Summarizer, or a truncated fallback of `content`. */
    summary: string;
    /** Opaque reference to the originating artifact (e.g. an image identifier). */
    sourceRef: string;
}

/**
 * On-disk shape of an ObservationRecord inside the observation log.
 */
export interface SerializedObservation {
    id: number;
    timestamp: string;
    content: string;
    summary: string;
    source_ref: string;
}

/**
 * A vector computed from a record's summary. Weakly references the record.
 */
export interface EmbeddingEntry {
    recordId: number;
    vector: number[];
}

export interface SemanticHit {
    recordId: number;
    score: number;
}

/**
 * Why a record ended up in a retrieval result:
 * - recency: part of the guaranteed most-recent window
 * - semantic: returned by the semantic index (and not already in the recency window)
 * - keyword: matched by the substring fallback used when the index is unavailable
 */
export type RankSource = 'recency' | 'semantic' | 'keyword';

export interface RetrievalResult {
    record: ObservationRecord;
    rankSource: RankSource;
    /** Similarity score; present only for semantic results. */
    score?: number;
}

/**
 * Situational fields used to derive a semantic query. Owned by the caller;
 * `weather` may be a plain string or a nested provider payload.
 */
export type ContextFields = Record<string, unknown>;

export type QueryContext = string | ContextFields;

export interface RetentionPolicy {
    /** Records older than this many days are pruned. Null disables age pruning. */
    retentionDays: number | null;
    /** At most this many records are kept (oldest pruned first). Null disables the cap. */
    maxEntries: number | null;
}

export interface MemoryStats {
    totalEntries: number;
    oldestEntry: string | null;
    newestEntry: string | null;
    lastId: number;
}
