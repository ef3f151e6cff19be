import * as dotenv from 'dotenv';
import { dbg, errorMessage } from "../utils";
import { OpenAIClient, OpenAIEmbeddingClient, OpenAIClientOptions } from './OpenAIClient';
import { ILLMClient, IEmbeddingClient } from './ILLMClient';

// Load environment variables
dotenv.config();

/**
 * Factory for the chat client. Returns null (after a warning) when the provider cannot be
 * configured, which every consumer treats as "collaborator unavailable".
 */
export function createLLMClient(options: OpenAIClientOptions = {}): ILLMClient | null {
    try {
        const client = new OpenAIClient(options);
        dbg('LLMUtils: OpenAI chat client initialized.');
        return client;
    } catch (error) {
        console.warn(`LLMUtils: chat client unavailable: ${errorMessage(error)}`);
        return null;
    }
}

/**
 * Factory for the embedding client, with the same null-on-misconfiguration contract.
 */
export function createEmbeddingClient(modelName: string, options: OpenAIClientOptions = {}): IEmbeddingClient | null {
    try {
        const client = new OpenAIEmbeddingClient(modelName, options);
        dbg(`LLMUtils: embedding client initialized (${modelName}).`);
        return client;
    } catch (error) {
        console.warn(`LLMUtils: embedding client unavailable: ${errorMessage(error)}`);
        return null;
    }
}
