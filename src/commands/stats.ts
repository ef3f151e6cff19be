import { MemoryService, MemoryServiceStats } from '../memory/MemoryService';
import { say } from '../utils';

export function runStats(memoryService: MemoryService): MemoryServiceStats {
    const stats = memoryService.getStats();
    say(`Observations: ${stats.totalEntries}`);
    say(`Oldest: ${stats.oldestEntry ?? '-'}`);
    say(`Newest: ${stats.newestEntry ?? '-'}`);
    say(`Last id: ${stats.lastId}`);
    say(`Semantic index: ${stats.semanticIndex} (${stats.indexedEntries} vectors)`);
    return stats;
}
