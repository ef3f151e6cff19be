import { ObservationRecord, RetrievalResult } from '../memory/memory_types';

export const TOOL_TEXT_LIMIT = 300;
export const EXISTENCE_SNIPPET_LIMIT = 150;

const OBSERVATION_DATE_FORMAT = new Intl.DateTimeFormat('en-US', {
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    timeZone: 'UTC',
});

/**
 * Cuts `text` to `limit` characters, appending "..." only when something was cut.
 */
export function truncateText(text: string, limit: number): string {
    return text.length > limit ? text.substring(0, limit) + '...' : text;
}

/**
 * Formats an ISO timestamp as e.g. "March 05, 2025" (UTC).
 * Returns the input unchanged when it is not a parseable date.
 */
export function formatObservationDate(timestamp: string): string {
    const parsed = Date.parse(timestamp);
    if (Number.isNaN(parsed)) {
        return timestamp;
    }
    return OBSERVATION_DATE_FORMAT.format(new Date(parsed));
}

/** The text a record is presented by: its summary, or its content when the summary is empty. */
export function observationText(record: ObservationRecord): string {
    return record.summary || record.content;
}

/**
 * Renders a record for a tool result.
 *
 * Format: `Observation #<id> (<Month DD, YYYY>): <text>` with the text limited to `limit` characters.
 */
export function formatObservation(record: ObservationRecord, limit: number = TOOL_TEXT_LIMIT): string {
    return `Observation #${record.id} (${formatObservationDate(record.timestamp)}): ${truncateText(observationText(record), limit)}`;
}

/**
 * Renders several records, separated by blank lines.
 */
export function formatObservationList(records: ObservationRecord[]): string {
    return records.map(record => formatObservation(record)).join('\n\n');
}

/**
 * Renders retrieved memories for the generation system prompt, one bullet per memory,
 * tagged with why it was retrieved. Returns a placeholder line when there are none.
 *
 * @example
 * - [recent] Observation #12 (March 05, 2025): Fog over the harbor...
 * - [related 0.82] Observation #3 (February 11, 2025): First fog of the year...
 */
export function formatMemoriesForPrompt(results: RetrievalResult[]): string {
    if (results.length === 0) {
        return 'No previous observations.';
    }
    return results
        .map(result => {
            const tag = result.rankSource === 'semantic' && result.score !== undefined
                ? `related ${result.score.toFixed(2)}`
                : result.rankSource === 'recency' ? 'recent' : result.rankSource;
            return `- [${tag}] ${formatObservation(result.record)}`;
        })
        .join('\n');
}
