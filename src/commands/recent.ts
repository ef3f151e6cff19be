import { MemoryService } from '../memory/MemoryService';
import { ObservationRecord } from '../memory/memory_types';
import { formatObservationList } from '../agents/agentUtils';
import { say } from '../utils';

/**
 * Handles the 'recent' command: prints the `count` most recent observations, newest first.
 */
export function runRecent(count: number, memoryService: MemoryService): ObservationRecord[] {
    const records = memoryService.store.recent(count);
    say(records.length > 0 ? formatObservationList(records) : 'No recent observations found.');
    return records;
}
