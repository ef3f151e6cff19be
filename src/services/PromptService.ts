import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { FullPromptsConfig, PromptContext } from './promptTypes';
import { errorMessage } from '../utils';

/** Bundled prompt templates: <project root>/prompts/<Agent>/<key>.txt (same from src/ and dist/). */
export const DEFAULT_PROMPTS_DIR = path.resolve(__dirname, '..', '..', 'prompts');

export interface PromptServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
    defaultPromptsDir?: string;
}

const PromptConfigEntrySchema = z.object({
    path: z.string().min(1),
    inputs: z.array(z.string()).default([]),
});

const PromptsConfigSchema = z.object({
    prompts: z.record(z.string(), z.record(z.string(), PromptConfigEntrySchema)),
});

// --- PromptService Class ---
export class PromptService {
    private loadedConfig?: FullPromptsConfig;
    private readonly configFilePath?: string;
    private readonly configDir?: string;

    // Store injected dependencies or defaults
    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;
    private readonly defaultPromptsDir: string;

    constructor(configFilePath?: string, deps?: PromptServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;
        this.defaultPromptsDir = deps?.defaultPromptsDir || DEFAULT_PROMPTS_DIR;

        if (configFilePath) {
            this.configFilePath = this.resolvePathFn(configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    private async _ensureConfigLoaded(): Promise<void> {
        if (this.configFilePath && !this.loadedConfig) {
            try {
                const fileContent = await this._readFile(this.configFilePath);
                this.loadedConfig = parsePromptsConfig(JSON.parse(fileContent));
            } catch (error) {
                throw new Error(`Failed to load or parse prompt configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
            }
        }
    }

    /**
     * Loads the template for `agentName`/`promptKey` (custom override first, bundled default otherwise)
     * and replaces every `{{key}}` with the matching context value.
     */
    public async getFormattedPrompt(
        agentName: string,
        promptKey: string,
        context: PromptContext
    ): Promise<string> {
        await this._ensureConfigLoaded();

        let promptText: string;

        const customPromptConfig = this.loadedConfig?.prompts?.[agentName]?.[promptKey];

        if (customPromptConfig) {
            const customPath = this._resolvePath(customPromptConfig.path);
            try {
                promptText = await this._readFile(customPath);
            } catch (error) {
                throw new Error(`Error loading custom prompt file ${customPath} for agent ${agentName}, prompt ${promptKey}. Original error: ${errorMessage(error)}`);
            }
        } else {
            const defaultPromptPath = this.resolvePathFn(this.defaultPromptsDir, agentName, `${promptKey}.txt`);
            try {
                promptText = await this._readFile(defaultPromptPath);
            } catch (error) {
                throw new Error(`Error loading default prompt file ${defaultPromptPath} for agent ${agentName}, prompt ${promptKey}. Original error: ${errorMessage(error)}`);
            }
        }

        if (!promptText) {
            throw new Error(`Failed to load prompt for agent ${agentName}, prompt ${promptKey}.`);
        }

        for (const key of Object.keys(context)) {
            const escapedKey = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
            const regex = new RegExp(`{{${escapedKey}}}`, 'g');
            const value = String(context[key]);
            promptText = promptText.replace(regex, () => value);
        }

        return promptText;
    }

    private async _readFile(filePath: string): Promise<string> {
        try {
            return await this.readFileFn(filePath, 'utf-8');
        } catch (error) {
            throw new Error(`Reading file ${filePath} failed: ${errorMessage(error)}`);
        }
    }

    private _resolvePath(promptPath: string): string {
        if (this.isAbsoluteFn(promptPath)) {
            return promptPath;
        }
        // Relative custom prompt paths are relative to the config file's directory.
        if (this.configDir) {
            return this.resolvePathFn(this.configDir, promptPath);
        }
        return this.resolvePathFn(promptPath);
    }
}

function parsePromptsConfig(raw: unknown): FullPromptsConfig {
    const parsed = PromptsConfigSchema.safeParse(raw);
    if (parsed.success) {
        return parsed.data;
    }
    const [issue] = parsed.error.issues;
    if (!issue || issue.path.length === 0 || (issue.path.length === 1 && issue.code === 'invalid_type' && issue.received === 'undefined')) {
        throw new Error('Prompt configuration must be an object with a "prompts" key.');
    }
    if (issue.path.length === 1) {
        throw new Error('"prompts" must be an object.');
    }
    throw new Error(`Invalid prompt configuration at ${issue.path.join('.')}: ${issue.message}`);
}
