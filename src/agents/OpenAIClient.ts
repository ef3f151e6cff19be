import OpenAI from "openai";
import {
    ILLMClient,
    IEmbeddingClient,
    ChatMessage,
    CompletionOptions,
    GenerationResponse,
    ToolSchema,
} from "./ILLMClient";
import {
    OPENAI_API_KEY_ENV_VAR,
    BASE_URL_ENV_VAR,
    DEFAULT_MODEL_NAME,
    DEFAULT_EMBEDDING_MODEL_NAME,
    DEFAULT_TEMPERATURE,
    DEFAULT_MAX_TOKENS,
} from "./llmConstants";
import { dbg, errorMessage } from "../utils";

/**
 * The slice of the OpenAI SDK this module calls. The real `OpenAI` instance satisfies it;
 * tests hand in stubs.
 */
export interface OpenAIApi {
    chat: {
        completions: {
            create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
        };
    };
    embeddings: {
        create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
    };
}

export interface OpenAIClientOptions {
    apiKey?: string;
    baseURL?: string;
    /** Pre-built API object; when given, apiKey/baseURL are ignored. */
    api?: OpenAIApi;
}

/**
 * Builds the SDK instance from explicit options or the environment.
 * @throws Error if no API key is available.
 */
export function createOpenAIApi(options: OpenAIClientOptions = {}): OpenAIApi {
    if (options.api) {
        return options.api;
    }
    const apiKey = options.apiKey ?? process.env[OPENAI_API_KEY_ENV_VAR] ?? '';
    if (!apiKey) {
        const message = `OpenAI API key (${OPENAI_API_KEY_ENV_VAR}) is not set in environment variables.`;
        console.warn(message);
        throw new Error(message);
    }

    const baseURL = options.baseURL ?? process.env[BASE_URL_ENV_VAR] ?? '';
    if (!baseURL) {
        dbg(`${BASE_URL_ENV_VAR} is not set. Using default OpenAI URL.`);
        return new OpenAI({ apiKey });
    }
    console.log(`Using base URL: ${baseURL}`);
    return new OpenAI({ apiKey, baseURL });
}

/**
 * Maps internal chat messages onto the OpenAI wire format.
 */
export function toOpenAIMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (msg.role) {
            case 'system':
                return { role: 'system', content: msg.content };
            case 'user':
                return { role: 'user', content: msg.content };
            case 'tool':
                return { role: 'tool', content: msg.content, tool_call_id: msg.toolCallId };
            case 'assistant':
                if (msg.toolCalls && msg.toolCalls.length > 0) {
                    return {
                        role: 'assistant',
                        content: msg.content || null,
                        tool_calls: msg.toolCalls.map(call => ({
                            id: call.id,
                            type: 'function' as const,
                            function: { name: call.name, arguments: call.arguments },
                        })),
                    };
                }
                return { role: 'assistant', content: msg.content };
        }
    });
}

export function toOpenAITools(tools: ToolSchema[]): OpenAI.Chat.ChatCompletionTool[] {
    return tools.map(tool => ({
        type: 'function' as const,
        function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
        },
    }));
}

function effectiveModel(options?: CompletionOptions): string {
    return options?.modelName && options.modelName.trim() !== ''
        ? options.modelName
        : DEFAULT_MODEL_NAME;
}

/**
 * OpenAIClient implements the ILLMClient interface on top of OpenAI's chat completions API
 * (or any OpenAI-compatible endpoint configured through BASE_URL).
 */
export class OpenAIClient implements ILLMClient {
    private readonly api: OpenAIApi;

    /**
     * @throws Error if no API key is configured and no API object is injected.
     */
    constructor(options: OpenAIClientOptions = {}) {
        this.api = createOpenAIApi(options);
    }

    async chatCompletion(
        history: ChatMessage[],
        prompt: string,
        options?: CompletionOptions
    ): Promise<string> {
        const messages: ChatMessage[] = [
            ...(options?.systemPrompt ? [{ role: 'system' as const, content: options.systemPrompt }] : []),
            ...history,
            { role: 'user', content: prompt },
        ];
        const model = effectiveModel(options);

        try {
            dbg(`OpenAIClient: chat completion with model ${model}`);
            const completion = await this.api.chat.completions.create({
                model,
                messages: toOpenAIMessages(messages),
                temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
                max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
            });

            const responseContent = completion.choices[0]?.message?.content;
            if (!responseContent) {
                throw new Error("OpenAI API call returned successfully but contained no content.");
            }
            return responseContent;
        } catch (error) {
            console.error("Error calling OpenAI API via OpenAIClient:", errorMessage(error));
            throw new Error(`Failed to communicate with OpenAI (Model: ${model}): ${errorMessage(error)}`);
        }
    }

    async generateWithTools(
        messages: ChatMessage[],
        tools: ToolSchema[],
        options?: CompletionOptions
    ): Promise<GenerationResponse> {
        const model = effectiveModel(options);
        const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model,
            messages: toOpenAIMessages(messages),
            temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
            max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        };
        if (tools.length > 0) {
            body.tools = toOpenAITools(tools);
            body.tool_choice = 'auto';
        }

        try {
            dbg(`OpenAIClient: tool-enabled generation with model ${model} (${tools.length} tools)`);
            const completion = await this.api.chat.completions.create(body);
            const message = completion.choices[0]?.message;
            if (!message) {
                throw new Error("OpenAI API call returned no message.");
            }
            return {
                content: message.content ?? '',
                toolCalls: (message.tool_calls ?? []).map(call => ({
                    id: call.id,
                    name: call.function.name,
                    arguments: call.function.arguments,
                })),
            };
        } catch (error) {
            console.error("Error calling OpenAI API via OpenAIClient:", errorMessage(error));
            throw new Error(`Failed to communicate with OpenAI (Model: ${model}): ${errorMessage(error)}`);
        }
    }
}

/**
 * Embeddings through the OpenAI embeddings endpoint.
 */
export class OpenAIEmbeddingClient implements IEmbeddingClient {
    private readonly api: OpenAIApi;
    readonly modelName: string;

    constructor(modelName: string = DEFAULT_EMBEDDING_MODEL_NAME, options: OpenAIClientOptions = {}) {
        this.api = createOpenAIApi(options);
        this.modelName = modelName;
    }

    async embed(text: string): Promise<number[]> {
        const response = await this.api.embeddings.create({
            model: this.modelName,
            input: text.replace(/\n/g, ' '),
        });
        const vector = response.data[0]?.embedding;
        if (!vector || vector.length === 0) {
            throw new Error(`Embedding model ${this.modelName} returned no vector.`);
        }
        return vector;
    }
}
