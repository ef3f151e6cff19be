import { ChatMessage, CompletionOptions, ILLMClient, ToolCallRequest, ToolSchema } from './ILLMClient';
import { ToolExecutionError } from '../memory/errors';
import { dbg, errorMessage, newConversationId } from '../utils';
import { DEFAULT_MAX_TOOL_ITERATIONS } from '../config';

export type LoopState = 'GENERATING' | 'TOOL_REQUESTED' | 'TOOL_EXECUTED' | 'FINALIZED';

export const BUDGET_EXHAUSTED_NOTE =
    '[Note: the tool-call budget for this response was exhausted; it may be incomplete.]';

/** Anything that can describe and run the tools offered to the model. */
export interface ToolExecutor {
    getToolSchemas(): ToolSchema[];
    executeTool(name: string, rawArguments: string): Promise<string>;
}

export interface ConversationState {
    readonly conversationId: string;
    readonly state: LoopState;
    /** The system prompt and user instruction the conversation started from. */
    readonly instruction: ChatMessage[];
    /** Assistant and tool messages produced so far. */
    readonly turns: ChatMessage[];
    /** Completed tool rounds. */
    readonly iterationCount: number;
    readonly generationCalls: number;
    readonly pendingToolCalls: ToolCallRequest[];
    readonly finalText: string | null;
    readonly budgetExhausted: boolean;
}

export interface ToolCallLoopOptions extends Omit<CompletionOptions, 'systemPrompt'> {
    maxIterations?: number;
}

export interface LoopResult {
    conversationId: string;
    text: string;
    iterationCount: number;
    generationCalls: number;
    budgetExhausted: boolean;
    turns: ChatMessage[];
}

function lastAssistantText(turns: ChatMessage[]): string {
    for (let i = turns.length - 1; i >= 0; i--) {
        const turn = turns[i];
        if (turn.role === 'assistant' && turn.content.trim() !== '') {
            return turn.content.trim();
        }
    }
    return '';
}

/**
 * Drives a generation request through model-requested tool calls:
 * GENERATING -> (TOOL_REQUESTED -> TOOL_EXECUTED)* -> FINALIZED.
 *
 * The model is called at most `maxIterations` times. Once that many tool rounds have run,
 * the next GENERATING step finalizes with the text produced so far plus a budget note.
 * Tool failures become error results in the turn history; model failures propagate.
 */
export class ToolCallLoop {
    private readonly maxIterations: number;
    private readonly completionOptions: CompletionOptions;

    constructor(
        private readonly llmClient: ILLMClient,
        private readonly tools: ToolExecutor,
        options: ToolCallLoopOptions = {}
    ) {
        const { maxIterations, ...completionOptions } = options;
        this.maxIterations = Math.max(1, maxIterations ?? DEFAULT_MAX_TOOL_ITERATIONS);
        this.completionOptions = completionOptions;
    }

    createState(userInstruction: string, systemPrompt?: string): ConversationState {
        const instruction: ChatMessage[] = [];
        if (systemPrompt) {
            instruction.push({ role: 'system', content: systemPrompt });
        }
        instruction.push({ role: 'user', content: userInstruction });
        return {
            conversationId: newConversationId(),
            state: 'GENERATING',
            instruction,
            turns: [],
            iterationCount: 0,
            generationCalls: 0,
            pendingToolCalls: [],
            finalText: null,
            budgetExhausted: false,
        };
    }

    /**
     * Performs one transition and returns the next state. A FINALIZED state is returned unchanged.
     */
    async step(current: ConversationState): Promise<ConversationState> {
        switch (current.state) {
            case 'GENERATING':
                return this.generate(current);
            case 'TOOL_REQUESTED':
                return this.executeTools(current);
            case 'TOOL_EXECUTED':
                return { ...current, state: 'GENERATING', iterationCount: current.iterationCount + 1 };
            case 'FINALIZED':
                return current;
        }
    }

    async run(userInstruction: string, systemPrompt?: string): Promise<LoopResult> {
        let current = this.createState(userInstruction, systemPrompt);
        dbg(`ToolCallLoop: conversation ${current.conversationId} started.`);
        while (current.state !== 'FINALIZED') {
            current = await this.step(current);
        }
        dbg(`ToolCallLoop: conversation ${current.conversationId} finalized after ${current.generationCalls} generation calls.`);
        return {
            conversationId: current.conversationId,
            text: current.finalText ?? '',
            iterationCount: current.iterationCount,
            generationCalls: current.generationCalls,
            budgetExhausted: current.budgetExhausted,
            turns: current.turns,
        };
    }

    private async generate(current: ConversationState): Promise<ConversationState> {
        if (current.iterationCount >= this.maxIterations) {
            console.warn(`ToolCallLoop: iteration budget of ${this.maxIterations} exhausted, finalizing.`);
            const text = lastAssistantText(current.turns);
            return {
                ...current,
                state: 'FINALIZED',
                pendingToolCalls: [],
                finalText: text ? `${text}\n\n${BUDGET_EXHAUSTED_NOTE}` : BUDGET_EXHAUSTED_NOTE,
                budgetExhausted: true,
            };
        }

        const response = await this.llmClient.generateWithTools(
            [...current.instruction, ...current.turns],
            this.tools.getToolSchemas(),
            this.completionOptions
        );
        const assistantTurn: ChatMessage = response.toolCalls.length > 0
            ? { role: 'assistant', content: response.content, toolCalls: response.toolCalls }
            : { role: 'assistant', content: response.content };
        const turns = [...current.turns, assistantTurn];
        const generationCalls = current.generationCalls + 1;

        if (response.toolCalls.length > 0) {
            dbg(`ToolCallLoop: model requested ${response.toolCalls.map(call => call.name).join(', ')}.`);
            return { ...current, state: 'TOOL_REQUESTED', turns, generationCalls, pendingToolCalls: response.toolCalls };
        }
        return {
            ...current,
            state: 'FINALIZED',
            turns,
            generationCalls,
            pendingToolCalls: [],
            finalText: response.content.trim() || lastAssistantText(current.turns),
        };
    }

    private async executeTools(current: ConversationState): Promise<ConversationState> {
        const turns = [...current.turns];
        for (const call of current.pendingToolCalls) {
            let content: string;
            try {
                content = await this.tools.executeTool(call.name, call.arguments);
            } catch (error) {
                const kind = error instanceof ToolExecutionError ? 'Tool error' : 'Tool failure';
                console.warn(`ToolCallLoop: ${call.name} failed: ${errorMessage(error)}`);
                content = `${kind} (${call.name}): ${errorMessage(error)}`;
            }
            turns.push({ role: 'tool', content, toolCallId: call.id, toolName: call.name });
        }
        return { ...current, state: 'TOOL_EXECUTED', turns, pendingToolCalls: [] };
    }
}
