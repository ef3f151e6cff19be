import { ContextFields, QueryContext } from './memory_types';

export const DEFAULT_CONTEXT_QUERY = 'recent observations';

/** Turns the caller's situational context into the text sent to the semantic index. */
export type ContextQueryBuilder = (context: QueryContext | undefined) => string;

const MONTH_FORMAT = new Intl.DateTimeFormat('en-US', { month: 'long', timeZone: 'UTC' });

function weatherConditions(weather: unknown): string {
    if (typeof weather === 'string') {
        return weather.trim();
    }
    if (typeof weather === 'object' && weather !== null && 'currently' in weather) {
        const currently = weather.currently;
        if (typeof currently === 'object' && currently !== null && 'summary' in currently && typeof currently.summary === 'string') {
            return currently.summary.trim();
        }
    }
    return '';
}

function monthOf(date: unknown): string {
    if (typeof date !== 'string' || date.trim() === '') {
        return '';
    }
    const parsed = Date.parse(date);
    return Number.isNaN(parsed) ? '' : MONTH_FORMAT.format(new Date(parsed));
}

/**
 * Default strategy: `weather: <conditions> time: <time_of_day> month: <Month>` from whichever
 * fields are present. A string context is used as-is.
 */
export const buildContextQuery: ContextQueryBuilder = (context) => {
    if (typeof context === 'string') {
        return context.trim() || DEFAULT_CONTEXT_QUERY;
    }
    if (!context) {
        return DEFAULT_CONTEXT_QUERY;
    }

    const fields: ContextFields = context;
    const parts: string[] = [];

    const conditions = weatherConditions(fields.weather);
    if (conditions) {
        parts.push(`weather: ${conditions}`);
    }
    const timeOfDay = fields.time_of_day;
    if (typeof timeOfDay === 'string' && timeOfDay.trim() !== '') {
        parts.push(`time: ${timeOfDay.trim()}`);
    }
    const month = monthOf(fields.date);
    if (month) {
        parts.push(`month: ${month}`);
    }

    return parts.length > 0 ? parts.join(' ') : DEFAULT_CONTEXT_QUERY;
};
