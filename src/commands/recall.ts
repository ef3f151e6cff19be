import { MemoryService } from '../memory/MemoryService';
import { ContextFields, QueryContext, RetrievalResult } from '../memory/memory_types';
import { formatMemoriesForPrompt } from '../agents/agentUtils';
import { say } from '../utils';

export interface RecallOptions {
    recent?: number;
    topK?: number;
    context?: string;
    fields?: string[];
}

/**
 * Parses `key=value` pairs into context fields. Keys may be dotted (`weather.currently.summary=Fog`)
 * to build nested objects.
 *
 * @throws Error for a pair without `=` or with an empty key.
 */
export function parseContextFields(pairs: string[]): ContextFields {
    const fields: ContextFields = {};
    for (const pair of pairs) {
        const separator = pair.indexOf('=');
        const key = separator > 0 ? pair.slice(0, separator).trim() : '';
        if (!key) {
            throw new Error(`Invalid context field '${pair}', expected key=value`);
        }
        const value = pair.slice(separator + 1).trim();
        setPath(fields, key.split('.'), value);
    }
    return fields;
}

function setPath(target: ContextFields, keys: string[], value: string): void {
    const [head, ...rest] = keys;
    if (rest.length === 0) {
        target[head] = value;
        return;
    }
    const existing = target[head];
    const child: ContextFields = isContextFields(existing) ? existing : {};
    target[head] = child;
    setPath(child, rest, value);
}

function isContextFields(value: unknown): value is ContextFields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The query context from the CLI flags: key=value fields win over free text. */
export function resolveQueryContext(context?: string, fields: string[] = []): QueryContext | undefined {
    if (fields.length > 0) {
        return parseContextFields(fields);
    }
    return context;
}

/**
 * Handles the 'recall' command: runs hybrid retrieval and prints the result.
 */
export async function runRecall(options: RecallOptions, memoryService: MemoryService): Promise<RetrievalResult[]> {
    const results = await memoryService.retrieve(
        resolveQueryContext(options.context, options.fields),
        options.recent,
        options.topK
    );
    say(formatMemoriesForPrompt(results));
    return results;
}
