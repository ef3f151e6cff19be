/**
 * A structured request from the model to run one named tool.
 * `arguments` is the raw JSON text the model produced; it is validated by the tool, not here.
 */
export type ToolCallRequest = {
    id: string;
    name: string;
    arguments: string;
};

export type ChatMessage =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
    | { role: 'tool'; content: string; toolCallId: string; toolName: string };

/**
 * A tool declaration handed to the model: a name, a description and a JSON schema for its arguments.
 */
export type ToolSchema = {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
};

export type GenerationResponse = {
    /** Final or partial text; empty when the model only requested tools. */
    content: string;
    toolCalls: ToolCallRequest[];
};

export type CompletionOptions = {
    modelName?: string;
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
};

export interface ILLMClient {
    /**
     * Calls the underlying provider's chat completions API.
     *
     * @param history The conversation history.
     * @param prompt The specific user prompt for this turn.
     * @returns The content of the model's response.
     * @throws Error on API errors or an empty response.
     */
    chatCompletion(
        history: ChatMessage[],
        prompt: string,
        options?: CompletionOptions
    ): Promise<string>;

    /**
     * Runs one generation round with tools declared. The response carries either final
     * text, tool-call requests, or both.
     */
    generateWithTools(
        messages: ChatMessage[],
        tools: ToolSchema[],
        options?: CompletionOptions
    ): Promise<GenerationResponse>;
}

export interface IEmbeddingClient {
    /** Name of the embedding model; vectors from different models are not comparable. */
    readonly modelName: string;
    embed(text: string): Promise<number[]>;
}
