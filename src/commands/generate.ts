import { MemoryService } from '../memory/MemoryService';
import { ObservationRecord, QueryContext } from '../memory/memory_types';
import { ILLMClient } from '../agents/ILLMClient';
import { LoopResult, ToolCallLoop } from '../agents/ToolCallLoop';
import { formatMemoriesForPrompt } from '../agents/agentUtils';
import { PromptService } from '../services/PromptService';
import { dbg, say } from '../utils';

const GENERATION_AGENT = 'Generation';
const SYSTEM_PROMPT = 'system';

export interface GenerateOptions {
    /** Situational context for retrieval; defaults to the instruction itself. */
    queryContext?: QueryContext;
    /** Store the generated text as a new observation. */
    record?: boolean;
    sourceRef?: string;
}

export interface GenerateResult extends LoopResult {
    recorded: ObservationRecord | null;
}

/**
 * Renders the situational context for the system prompt.
 */
export function describeContext(context?: QueryContext): string {
    if (context === undefined) {
        return 'No additional context.';
    }
    if (typeof context === 'string') {
        return context.trim() || 'No additional context.';
    }
    const lines = Object.entries(context).map(([key, value]) =>
        `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`
    );
    return lines.length > 0 ? lines.join('\n') : 'No additional context.';
}

/**
 * Handles the 'generate' command: builds the system prompt from hybrid-retrieved memories,
 * lets the model consult its memory through tools, and prints the final text.
 *
 * @throws Error when no language model is configured, or when the model call fails.
 * @throws StoreIOError when `record` is set and the result could not be stored.
 */
export async function runGenerate(
    instruction: string,
    memoryService: MemoryService,
    llmClient: ILLMClient | null,
    promptService: PromptService,
    options: GenerateOptions = {}
): Promise<GenerateResult> {
    if (!llmClient) {
        throw new Error("The 'generate' command needs a language model; set OPENAI_API_KEY.");
    }
    if (!instruction.trim()) {
        throw new Error("No instruction provided for the 'generate' command.");
    }

    const queryContext = options.queryContext ?? instruction;
    const memories = await memoryService.retrieve(queryContext);
    const systemPrompt = await promptService.getFormattedPrompt(GENERATION_AGENT, SYSTEM_PROMPT, {
        context: describeContext(queryContext),
        memories: formatMemoriesForPrompt(memories),
    });
    dbg(`Generating with ${memories.length} retrieved memories.`);

    const loop = new ToolCallLoop(llmClient, memoryService.tools, {
        maxIterations: memoryService.config.maxToolIterations,
        modelName: memoryService.config.chatModel,
    });
    const result = await loop.run(instruction, systemPrompt);
    say(result.text);

    let recorded: ObservationRecord | null = null;
    if (options.record && result.text.trim() !== '') {
        recorded = await memoryService.recordObservation(
            result.text,
            options.sourceRef ?? `generated:${result.conversationId}`
        );
        say(`Recorded observation #${recorded.id}`);
        await memoryService.flushIndexUpdates();
    }
    return { ...result, recorded };
}
