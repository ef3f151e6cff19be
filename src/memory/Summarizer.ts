import { ILLMClient } from '../agents/ILLMClient';
import { PromptService } from '../services/PromptService';
import { dbg, errorMessage, withTimeout } from '../utils';
import {
    DEFAULT_SUMMARY_FALLBACK_LENGTH,
    DEFAULT_SUMMARY_MAX_LENGTH,
    DEFAULT_SUMMARY_TIMEOUT_MS,
} from '../config';

export const TRUNCATION_MARKER = '...';
export const EMPTY_OBSERVATION_SUMMARY = '(empty observation)';

const SUMMARIZER_AGENT = 'Summarizer';
const SUMMARIZE_PROMPT = 'summarize';

export interface ISummarizer {
    /** Never rejects; failures resolve to a deterministic fallback. */
    summarize(content: string): Promise<string>;
}

export interface SummarizerOptions {
    modelName?: string;
    maxLength?: number;
    fallbackLength?: number;
    timeoutMs?: number;
}

/**
 * Cuts `text` to at most `limit` code points, appending the truncation marker when anything was cut.
 * Slicing by code point keeps surrogate pairs (emoji, astral CJK) intact.
 */
export function truncateWithMarker(text: string, limit: number): string {
    const chars = Array.from(text);
    if (chars.length <= limit) {
        return text;
    }
    return chars.slice(0, limit).join('') + TRUNCATION_MARKER;
}

/**
 * The deterministic summary used whenever the model cannot produce one:
 * the first `limit` characters of the content plus a marker. Never empty.
 */
export function fallbackSummary(content: string, limit: number = DEFAULT_SUMMARY_FALLBACK_LENGTH): string {
    const trimmed = content.trim();
    if (trimmed === '') {
        return EMPTY_OBSERVATION_SUMMARY;
    }
    return truncateWithMarker(trimmed, limit);
}

/**
 * Distills an observation into a short synopsis through a language model.
 */
export class Summarizer implements ISummarizer {
    private readonly maxLength: number;
    private readonly fallbackLength: number;
    private readonly timeoutMs: number;
    private readonly modelName?: string;

    constructor(
        private readonly llmClient: ILLMClient | null,
        private readonly promptService: PromptService,
        options: SummarizerOptions = {}
    ) {
        this.maxLength = options.maxLength ?? DEFAULT_SUMMARY_MAX_LENGTH;
        this.fallbackLength = Math.min(options.fallbackLength ?? DEFAULT_SUMMARY_FALLBACK_LENGTH, this.maxLength);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_SUMMARY_TIMEOUT_MS;
        this.modelName = options.modelName;
    }

    async summarize(content: string): Promise<string> {
        if (!this.llmClient) {
            dbg('Summarizer: no language model configured, using truncation fallback.');
            return fallbackSummary(content, this.fallbackLength);
        }
        if (content.trim() === '') {
            return EMPTY_OBSERVATION_SUMMARY;
        }

        try {
            const prompt = await this.promptService.getFormattedPrompt(SUMMARIZER_AGENT, SUMMARIZE_PROMPT, {
                maxLength: this.maxLength,
                content,
            });
            const response = await withTimeout(
                this.llmClient.chatCompletion([], prompt, { modelName: this.modelName, temperature: 0.3 }),
                this.timeoutMs,
                'Summarization'
            );
            const summary = response.trim();
            if (summary === '') {
                throw new Error('model returned an empty summary');
            }
            return this.clamp(summary);
        } catch (error) {
            console.warn(`Summarizer: falling back to truncation: ${errorMessage(error)}`);
            return fallbackSummary(content, this.fallbackLength);
        }
    }

    private clamp(summary: string): string {
        if (Array.from(summary).length <= this.maxLength) {
            return summary;
        }
        return truncateWithMarker(summary, Math.max(1, this.maxLength - TRUNCATION_MARKER.length));
    }
}
