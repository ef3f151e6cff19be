import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_MODEL_NAME, DEFAULT_EMBEDDING_MODEL_NAME } from './agents/llmConstants';

// Default paths and constants
export const DEFAULT_MEMORY_DIR = './memory';
export const OBSERVATIONS_FILE_NAME = 'observations.json';
export const SEMANTIC_INDEX_FILE_NAME = 'semantic_index.json';

// Retention
export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_MAX_ENTRIES = 50;

// Summarization
export const DEFAULT_SUMMARY_MAX_LENGTH = 400;
export const DEFAULT_SUMMARY_FALLBACK_LENGTH = 200;
export const DEFAULT_SUMMARY_TIMEOUT_MS = 30_000;

// Retrieval
export const DEFAULT_RECENT_COUNT = 5;
export const DEFAULT_SEMANTIC_TOP_K = 5;
export const DEFAULT_MAX_PROMPT_MEMORIES = 10;
export const DEFAULT_SEMANTIC_TIMEOUT_MS = 10_000;
export const DEFAULT_MIN_RELEVANCE_SCORE = 0.3;

// Generation
export const DEFAULT_MAX_TOOL_ITERATIONS = 10;

export interface MemoirConfig {
    memoryDir: string;
    observationsFile: string;
    semanticIndexFile: string;
    retentionDays: number;
    maxEntries: number;
    summaryMaxLength: number;
    summaryFallbackLength: number;
    summaryTimeoutMs: number;
    recentCount: number;
    semanticTopK: number;
    maxPromptMemories: number;
    semanticTimeoutMs: number;
    minRelevanceScore: number;
    maxToolIterations: number;
    semanticSearchEnabled: boolean;
    chatModel: string;
    summaryModel: string;
    embeddingModel: string;
}

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
    MEMORY_DIR: z.string().min(1).default(DEFAULT_MEMORY_DIR),
    MEMORY_RETENTION_DAYS: positiveInt.default(DEFAULT_RETENTION_DAYS),
    MAX_MEMORY_ENTRIES: positiveInt.default(DEFAULT_MAX_ENTRIES),
    SUMMARY_MAX_LENGTH: positiveInt.default(DEFAULT_SUMMARY_MAX_LENGTH),
    SUMMARY_FALLBACK_LENGTH: positiveInt.default(DEFAULT_SUMMARY_FALLBACK_LENGTH),
    SUMMARY_TIMEOUT_MS: nonNegativeInt.default(DEFAULT_SUMMARY_TIMEOUT_MS),
    RECENT_MEMORY_COUNT: nonNegativeInt.default(DEFAULT_RECENT_COUNT),
    SEMANTIC_TOP_K: nonNegativeInt.default(DEFAULT_SEMANTIC_TOP_K),
    MAX_PROMPT_MEMORIES: positiveInt.default(DEFAULT_MAX_PROMPT_MEMORIES),
    SEMANTIC_TIMEOUT_MS: nonNegativeInt.default(DEFAULT_SEMANTIC_TIMEOUT_MS),
    MIN_RELEVANCE_SCORE: z.coerce.number().min(-1).max(1).default(DEFAULT_MIN_RELEVANCE_SCORE),
    MAX_TOOL_ITERATIONS: positiveInt.default(DEFAULT_MAX_TOOL_ITERATIONS),
    SEMANTIC_SEARCH_ENABLED: booleanFlag.default('true'),
    CHAT_MODEL: z.string().min(1).default(DEFAULT_MODEL_NAME),
    SUMMARY_MODEL: z.string().min(1).optional(),
    EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL_NAME),
});

/**
 * Builds the runtime configuration from environment variables (usually `process.env`
 * after dotenv has loaded `.env`). Empty variables count as unset.
 * @throws Error naming every invalid variable.
 */
export function loadMemoirConfig(env: NodeJS.ProcessEnv = process.env): MemoirConfig {
    const present: Record<string, string> = {};
    for (const key of Object.keys(EnvSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value.trim() !== '') {
            present[key] = value.trim();
        }
    }
    if (present.SEMANTIC_SEARCH_ENABLED !== undefined) {
        present.SEMANTIC_SEARCH_ENABLED = present.SEMANTIC_SEARCH_ENABLED.toLowerCase();
    }

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid memoir configuration: ${problems}`);
    }
    const vars = parsed.data;
    const memoryDir = path.resolve(vars.MEMORY_DIR);

    return {
        memoryDir,
        observationsFile: path.join(memoryDir, OBSERVATIONS_FILE_NAME),
        semanticIndexFile: path.join(memoryDir, SEMANTIC_INDEX_FILE_NAME),
        retentionDays: vars.MEMORY_RETENTION_DAYS,
        maxEntries: vars.MAX_MEMORY_ENTRIES,
        summaryMaxLength: vars.SUMMARY_MAX_LENGTH,
        summaryFallbackLength: vars.SUMMARY_FALLBACK_LENGTH,
        summaryTimeoutMs: vars.SUMMARY_TIMEOUT_MS,
        recentCount: vars.RECENT_MEMORY_COUNT,
        semanticTopK: vars.SEMANTIC_TOP_K,
        maxPromptMemories: vars.MAX_PROMPT_MEMORIES,
        semanticTimeoutMs: vars.SEMANTIC_TIMEOUT_MS,
        minRelevanceScore: vars.MIN_RELEVANCE_SCORE,
        maxToolIterations: vars.MAX_TOOL_ITERATIONS,
        semanticSearchEnabled: vars.SEMANTIC_SEARCH_ENABLED,
        chatModel: vars.CHAT_MODEL,
        summaryModel: vars.SUMMARY_MODEL ?? vars.CHAT_MODEL,
        embeddingModel: vars.EMBEDDING_MODEL,
    };
}

/**
 * Returns a copy of `config` rooted at another memory directory.
 */
export function withMemoryDir(config: MemoirConfig, memoryDir: string): MemoirConfig {
    const resolved = path.resolve(memoryDir);
    return {
        ...config,
        memoryDir: resolved,
        observationsFile: path.join(resolved, OBSERVATIONS_FILE_NAME),
        semanticIndexFile: path.join(resolved, SEMANTIC_INDEX_FILE_NAME),
    };
}
