import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
    formatMemoriesForPrompt,
    formatObservation,
    formatObservationDate,
    formatObservationList,
    truncateText,
} from '../src/agents/agentUtils';
import { makeRecord } from './helpers/fakes';

describe('agentUtils', () => {
    const fog = makeRecord(3, '2025-03-05T08:00:00.000Z', 'Fog rolled in over the harbor.');
    const rain = makeRecord(1, '2025-02-11T21:30:00.000Z', 'Steady rain, empty streets.');

    describe('truncateText', () => {
        it('should only add the marker when text was cut', () => {
            expect(truncateText('abcdef', 3)).to.equal('abc...');
            expect(truncateText('abc', 3)).to.equal('abc');
        });
    });

    describe('formatObservationDate', () => {
        it('should render a long month, two-digit day and year in UTC', () => {
            expect(formatObservationDate('2025-03-05T08:00:00.000Z')).to.equal('March 05, 2025');
        });

        it('should return an unparseable value unchanged', () => {
            expect(formatObservationDate('sometime')).to.equal('sometime');
        });
    });

    describe('formatObservation', () => {
        it('should render id, date and summary', () => {
            expect(formatObservation(fog)).to.equal('Observation #3 (March 05, 2025): Fog rolled in over the harbor.');
        });

        it('should use the content when the summary is empty', () => {
            const record = makeRecord(5, '2025-03-05T08:00:00.000Z', '', 'Only content here.');
            expect(formatObservation(record)).to.equal('Observation #5 (March 05, 2025): Only content here.');
        });

        it('should limit the text to 300 characters', () => {
            const record = makeRecord(6, '2025-03-05T08:00:00.000Z', 'a'.repeat(301));
            expect(formatObservation(record)).to.equal(`Observation #6 (March 05, 2025): ${'a'.repeat(300)}...`);
        });
    });

    describe('formatObservationList', () => {
        it('should separate observations with a blank line', () => {
            expect(formatObservationList([fog, rain])).to.equal(
                'Observation #3 (March 05, 2025): Fog rolled in over the harbor.\n\n' +
                'Observation #1 (February 11, 2025): Steady rain, empty streets.'
            );
        });
    });

    describe('formatMemoriesForPrompt', () => {
        it('should tag each memory with why it was retrieved', () => {
            const text = formatMemoriesForPrompt([
                { record: fog, rankSource: 'recency' },
                { record: rain, rankSource: 'semantic', score: 0.8234 },
            ]);
            expect(text).to.equal(
                '- [recent] Observation #3 (March 05, 2025): Fog rolled in over the harbor.\n' +
                '- [related 0.82] Observation #1 (February 11, 2025): Steady rain, empty streets.'
            );
        });

        it('should say so when there are no memories', () => {
            expect(formatMemoriesForPrompt([])).to.equal('No previous observations.');
        });
    });
});
