import { MemoryService } from '../memory/MemoryService';
import { say } from '../utils';

/**
 * Handles the 'rebuild-index' command: re-embeds the observation log into the semantic index.
 * @throws IndexUnavailableError when semantic search is unavailable.
 */
export async function runRebuildIndex(force: boolean, memoryService: MemoryService): Promise<number> {
    const embedded = await memoryService.rebuildIndex(force);
    say(`Semantic index rebuilt: ${embedded} observations embedded, ${memoryService.index.size} indexed.`);
    return embedded;
}
