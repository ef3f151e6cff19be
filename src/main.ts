#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { MemoirConfig, loadMemoirConfig, withMemoryDir } from './config';
import { MemoryService } from './memory/MemoryService';
import { StoreIOError } from './memory/errors';
import { ILLMClient } from './agents/ILLMClient';
import { createEmbeddingClient, createLLMClient } from './agents/LLMUtils';
import { PromptService } from './services/PromptService';
import { dbg, errorMessage } from './utils';
import { runObserve, ObserveOptions } from './commands/observe';
import { runRecent } from './commands/recent';
import { runRecall, RecallOptions, resolveQueryContext } from './commands/recall';
import { runGenerate } from './commands/generate';
import { runRebuildIndex } from './commands/rebuildIndex';
import { runStats } from './commands/stats';

const GENERAL_ERROR = 1;
const STORE_IO_ERROR = 2;
const GENERATION_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

type GlobalOptions = {
    memoryDir?: string;
    model?: string;
    embeddingModel?: string;
    promptsConfig?: string;
};

interface Session {
    config: MemoirConfig;
    memoryService: MemoryService;
    llmClient: ILLMClient | null;
    promptService: PromptService;
}

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function exitCodeFor(error: unknown, fallback: number): number {
    return error instanceof StoreIOError ? STORE_IO_ERROR : fallback;
}

/**
 * Resolves configuration (environment, then global flags) and opens the memory.
 */
async function openSession(globalOptions: GlobalOptions): Promise<Session> {
    let config = loadMemoirConfig();
    if (globalOptions.memoryDir) {
        config = withMemoryDir(config, globalOptions.memoryDir);
    }
    if (globalOptions.model) {
        config = { ...config, chatModel: globalOptions.model, summaryModel: globalOptions.model };
    }
    if (globalOptions.embeddingModel) {
        config = { ...config, embeddingModel: globalOptions.embeddingModel };
    }
    dbg(`Using memory directory: ${config.memoryDir}`);

    const promptService = new PromptService(globalOptions.promptsConfig);
    const llmClient = createLLMClient();
    const embeddingClient = config.semanticSearchEnabled ? createEmbeddingClient(config.embeddingModel) : null;
    const memoryService = await MemoryService.create(config, { llmClient, embeddingClient, promptService });
    return { config, memoryService, llmClient, promptService };
}

async function main() {
    const program = new Command();

    // --- Global Options ---
    program
        .name('memoir')
        .version('1.0.0')
        .description('Memoir - observation memory with hybrid recency and semantic recall')
        .option('-d, --memory-dir <path>', 'Directory holding the observation log and semantic index')
        .option('-m, --model <model_name>', 'Chat model used for summaries and generation')
        .option('--embedding-model <model_name>', 'Embedding model used by the semantic index')
        .option('--prompts-config <path>', 'Path to a JSON file for custom prompt configurations')
        .exitOverride();

    const withSession = async (failureCode: number, label: string, action: (session: Session) => Promise<void>) => {
        try {
            const session = await openSession(program.opts<GlobalOptions>());
            await action(session);
            await session.memoryService.flushIndexUpdates();
            dbg(`${label} command finished successfully.`);
        } catch (error) {
            console.error(`${label} command failed: ${errorMessage(error)}`);
            process.exit(exitCodeFor(error, failureCode));
        }
    };

    // --- Define Commands ---

    program
        .command('observe')
        .description('Record a new observation')
        .option('-c, --content <text>', 'Observation text')
        .option('-f, --file <path>', 'Read the observation text from a file')
        .option('-s, --source <ref>', 'Reference to the originating artifact')
        .option('--summary <text>', 'Precomputed summary (skips the summarizer)')
        .action(async (options: ObserveOptions) => {
            await withSession(GENERAL_ERROR, 'Observe', async ({ memoryService }) => {
                await runObserve(options, memoryService);
            });
        });

    program
        .command('recent')
        .description('Show the most recent observations')
        .option('-n, --count <count>', 'Number of observations to show', parseCount, 5)
        .action(async (options: { count: number }) => {
            await withSession(GENERAL_ERROR, 'Recent', async ({ memoryService }) => {
                runRecent(options.count, memoryService);
            });
        });

    program
        .command('recall')
        .description('Retrieve recent and semantically related memories for a context')
        .option('--recent <count>', 'Number of most recent observations to include', parseCount)
        .option('-k, --top-k <count>', 'Number of semantic matches to request', parseCount)
        .option('--context <text>', 'Free-text context to search for')
        .option('--field <key=value>', 'Context field (repeatable), e.g. weather=Fog or time_of_day=evening', collect, [])
        .action(async (options: { recent?: number; topK?: number; context?: string; field: string[] }) => {
            const recallOptions: RecallOptions = {
                recent: options.recent,
                topK: options.topK,
                context: options.context,
                fields: options.field,
            };
            await withSession(GENERAL_ERROR, 'Recall', async ({ memoryService }) => {
                await runRecall(recallOptions, memoryService);
            });
        });

    program
        .command('generate')
        .description('Generate a new entry informed by memory')
        .argument('<instruction...>', 'What to write')
        .option('--context <text>', 'Free-text context used for retrieval')
        .option('--field <key=value>', 'Context field (repeatable)', collect, [])
        .option('--record', 'Store the generated text as a new observation', false)
        .option('-s, --source <ref>', 'Source reference for the recorded observation')
        .action(async (instructionParts: string[], options: { context?: string; field: string[]; record: boolean; source?: string }) => {
            await withSession(GENERATION_ERROR, 'Generate', async ({ memoryService, llmClient, promptService }) => {
                await runGenerate(instructionParts.join(' '), memoryService, llmClient, promptService, {
                    queryContext: resolveQueryContext(options.context, options.field),
                    record: options.record,
                    sourceRef: options.source,
                });
            });
        });

    program
        .command('rebuild-index')
        .description('Re-embed the observation log into the semantic index')
        .option('--force', 'Re-embed every observation, not only missing ones', false)
        .action(async (options: { force: boolean }) => {
            await withSession(GENERAL_ERROR, 'Rebuild-index', async ({ memoryService }) => {
                await runRebuildIndex(options.force, memoryService);
            });
        });

    program
        .command('stats')
        .description('Show memory statistics')
        .action(async () => {
            await withSession(GENERAL_ERROR, 'Stats', async ({ memoryService }) => {
                runStats(memoryService);
            });
        });

    // --- Parse and Execute ---
    try {
        if (process.argv.length <= 2) {
            program.help();
        }
        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof CommanderError && error.exitCode === 0) {
            return; // --help or --version
        }
        dbg(`Error during command parsing: ${errorMessage(error)}`);
        process.exit(COMMAND_PARSING_ERROR);
    }
}

main().catch(error => {
    console.error(`Unhandled application error: ${errorMessage(error)}`);
    process.exit(UNHANDLED_ERROR);
});
