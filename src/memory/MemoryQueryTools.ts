import { z } from 'zod';
import { ObservationRecord, RetrievalResult } from './memory_types';
import { ISemanticIndex } from './SemanticIndex';
import { RecordLookup, resolveSemanticHits } from './HybridRetriever';
import { ToolExecutionError } from './errors';
import {
    CHECK_MEMORY_EXISTS_TOOL,
    CheckMemoryExistsArgsSchema,
    DEFAULT_TOOL_RESULTS,
    GET_RECENT_MEMORIES_TOOL,
    GetRecentMemoriesArgsSchema,
    MEMORY_TOOL_SCHEMAS,
    QUERY_MEMORIES_TOOL,
    QueryMemoriesArgsSchema,
} from './memoryToolSchemas';
import { ToolSchema } from '../agents/ILLMClient';
import {
    EXISTENCE_SNIPPET_LIMIT,
    formatObservationList,
    observationText,
    truncateText,
} from '../agents/agentUtils';
import { dbg, errorMessage } from '../utils';
import { DEFAULT_MIN_RELEVANCE_SCORE } from '../config';

export const KEYWORD_SCAN_LIMIT = 50;
const MIN_KEYWORD_LENGTH = 4;

export interface MemoryQueryToolsOptions {
    /** Minimum similarity for `checkMemoryExists` to count a semantic hit. */
    minRelevanceScore?: number;
    /** How many recent records the keyword fallback scans. */
    keywordScanLimit?: number;
}

/**
 * True when `text` contains the whole query, or any query word of four or more characters
 * (case-insensitive).
 */
export function matchesKeywords(text: string, query: string): boolean {
    const haystack = text.toLowerCase();
    const needle = query.trim().toLowerCase();
    if (needle === '') {
        return false;
    }
    if (haystack.includes(needle)) {
        return true;
    }
    return needle
        .split(/\s+/)
        .some(word => word.length >= MIN_KEYWORD_LENGTH && haystack.includes(word));
}

function parseArgs<T extends z.ZodTypeAny>(toolName: string, schema: T, raw: unknown): z.infer<T> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
            .join('; ');
        throw new ToolExecutionError(toolName, `Invalid arguments for ${toolName}: ${problems}`);
    }
    return parsed.data;
}

/**
 * The three read-only memory operations offered to the generation model as tools.
 * Lookups never fail: an unusable semantic index degrades to a keyword scan of recent records.
 */
export class MemoryQueryTools {
    private readonly minRelevanceScore: number;
    private readonly keywordScanLimit: number;

    constructor(
        private readonly store: RecordLookup,
        private readonly index: ISemanticIndex | null,
        options: MemoryQueryToolsOptions = {}
    ) {
        this.minRelevanceScore = options.minRelevanceScore ?? DEFAULT_MIN_RELEVANCE_SCORE;
        this.keywordScanLimit = options.keywordScanLimit ?? KEYWORD_SCAN_LIMIT;
    }

    getToolSchemas(): ToolSchema[] {
        return [...MEMORY_TOOL_SCHEMAS];
    }

    async queryMemories(query: string, topK: number = DEFAULT_TOOL_RESULTS): Promise<RetrievalResult[]> {
        if (topK <= 0) {
            return [];
        }
        if (this.index && (await this.index.isAvailable())) {
            try {
                const hits = await this.index.query(query, topK);
                return resolveSemanticHits(hits, new Set(), this.store).slice(0, topK);
            } catch (error) {
                console.warn(`MemoryQueryTools: semantic query failed, using keyword search: ${errorMessage(error)}`);
            }
        }
        return this.keywordSearch(query, topK);
    }

    async getRecentMemories(count: number = DEFAULT_TOOL_RESULTS): Promise<ObservationRecord[]> {
        return this.store.recent(count);
    }

    /**
     * @returns one matching memory, or null when nothing relevant exists.
     */
    async checkMemoryExists(topic: string): Promise<RetrievalResult | null> {
        if (this.index && (await this.index.isAvailable())) {
            try {
                const hits = (await this.index.query(topic, 1)).filter(hit => hit.score >= this.minRelevanceScore);
                const [best] = resolveSemanticHits(hits, new Set(), this.store);
                if (best) {
                    return best;
                }
            } catch (error) {
                console.warn(`MemoryQueryTools: semantic check failed, using keyword search: ${errorMessage(error)}`);
            }
        }
        const [match] = this.keywordSearch(topic, 1);
        return match ?? null;
    }

    /**
     * Dispatches a tool call requested by the model and renders its result as text.
     * @throws ToolExecutionError for an unknown tool or malformed/invalid arguments.
     */
    async executeTool(name: string, rawArguments: string): Promise<string> {
        const args = this.decodeArguments(name, rawArguments);
        dbg(`MemoryQueryTools: executing ${name} ${rawArguments}`);

        switch (name) {
            case QUERY_MEMORIES_TOOL: {
                const { query, top_k } = parseArgs(name, QueryMemoriesArgsSchema, args);
                const results = await this.queryMemories(query, top_k);
                if (results.length === 0) {
                    return `No memories found matching query: '${query}'`;
                }
                return formatObservationList(results.map(result => result.record));
            }
            case GET_RECENT_MEMORIES_TOOL: {
                const { count } = parseArgs(name, GetRecentMemoriesArgsSchema, args);
                const records = await this.getRecentMemories(count);
                if (records.length === 0) {
                    return 'No recent observations found.';
                }
                return formatObservationList(records);
            }
            case CHECK_MEMORY_EXISTS_TOOL: {
                const { topic } = parseArgs(name, CheckMemoryExistsArgsSchema, args);
                const match = await this.checkMemoryExists(topic);
                if (!match) {
                    return `No, I don't have any memories about '${topic}'.`;
                }
                const snippet = truncateText(observationText(match.record), EXISTENCE_SNIPPET_LIMIT);
                return `Yes, I have memories about '${topic}'. Example: Observation #${match.record.id}: ${snippet}`;
            }
            default:
                throw new ToolExecutionError(name, `Unknown tool: ${name}`);
        }
    }

    private keywordSearch(query: string, limit: number): RetrievalResult[] {
        const results: RetrievalResult[] = [];
        for (const record of this.store.recent(this.keywordScanLimit)) {
            if (matchesKeywords(observationText(record), query)) {
                results.push({ record, rankSource: 'keyword' });
                if (results.length >= limit) {
                    break;
                }
            }
        }
        return results;
    }

    private decodeArguments(name: string, rawArguments: string): unknown {
        if (rawArguments.trim() === '') {
            return {};
        }
        try {
            return JSON.parse(rawArguments);
        } catch (error) {
            throw new ToolExecutionError(name, `Malformed arguments for ${name}: ${errorMessage(error)}`);
        }
    }
}
