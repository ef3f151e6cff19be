import { z } from 'zod';
import { ToolSchema } from '../agents/ILLMClient';

export const QUERY_MEMORIES_TOOL = 'query_memories';
export const GET_RECENT_MEMORIES_TOOL = 'get_recent_memories';
export const CHECK_MEMORY_EXISTS_TOOL = 'check_memory_exists';

export type MemoryToolName =
    | typeof QUERY_MEMORIES_TOOL
    | typeof GET_RECENT_MEMORIES_TOOL
    | typeof CHECK_MEMORY_EXISTS_TOOL;

export const MAX_TOOL_RESULTS = 10;
export const DEFAULT_TOOL_RESULTS = 5;

const resultCount = z.number().int().min(1).max(MAX_TOOL_RESULTS).default(DEFAULT_TOOL_RESULTS);

export const QueryMemoriesArgsSchema = z.object({
    query: z.string().trim().min(1),
    top_k: resultCount,
});

export const GetRecentMemoriesArgsSchema = z.object({
    count: resultCount,
});

export const CheckMemoryExistsArgsSchema = z.object({
    topic: z.string().trim().min(1),
});

export type QueryMemoriesArgs = z.infer<typeof QueryMemoriesArgsSchema>;
export type GetRecentMemoriesArgs = z.infer<typeof GetRecentMemoriesArgsSchema>;
export type CheckMemoryExistsArgs = z.infer<typeof CheckMemoryExistsArgsSchema>;

/**
 * The tool declarations sent to the generation model (JSON Schema parameters).
 */
export const MEMORY_TOOL_SCHEMAS: readonly ToolSchema[] = [
    {
        name: QUERY_MEMORIES_TOOL,
        description:
            'Search your memory for past observations similar to a specific, concrete detail ' +
            '(an object, a group size, a time pattern, a notable event). Vary what you search for.',
        parameters: {
            type: 'object',
            properties: {
                query: {
                    type: 'string',
                    description: "Concrete detail to search for, e.g. 'people with umbrellas' or 'tuesday night'.",
                },
                top_k: {
                    type: 'integer',
                    description: `Number of memories to return (default: ${DEFAULT_TOOL_RESULTS}, max: ${MAX_TOOL_RESULTS})`,
                    default: DEFAULT_TOOL_RESULTS,
                    minimum: 1,
                    maximum: MAX_TOOL_RESULTS,
                },
            },
            required: ['query'],
        },
    },
    {
        name: GET_RECENT_MEMORIES_TOOL,
        description:
            'Get your most recent observations, for comparing the current one with earlier ones ' +
            '(morning against evening, day against day).',
        parameters: {
            type: 'object',
            properties: {
                count: {
                    type: 'integer',
                    description: `Number of recent memories to return (default: ${DEFAULT_TOOL_RESULTS}, max: ${MAX_TOOL_RESULTS})`,
                    default: DEFAULT_TOOL_RESULTS,
                    minimum: 1,
                    maximum: MAX_TOOL_RESULTS,
                },
            },
            required: [],
        },
    },
    {
        name: CHECK_MEMORY_EXISTS_TOOL,
        description: 'Check whether you have any memories about a topic. Answers yes or no, with one example when yes.',
        parameters: {
            type: 'object',
            properties: {
                topic: {
                    type: 'string',
                    description: "Topic to check, e.g. 'rain', 'crowds', 'holiday decorations'.",
                },
            },
            required: ['topic'],
        },
    },
];
