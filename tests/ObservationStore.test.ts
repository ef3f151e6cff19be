import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { ObservationStore, ObservationStoreOptions, applyRetention } from '../src/memory/ObservationStore';
import { StoreIOError } from '../src/memory/errors';
import { SerializedObservation } from '../src/memory/memory_types';
import { Summarizer, TRUNCATION_MARKER } from '../src/memory/Summarizer';
import { PromptService } from '../src/services/PromptService';
import { ILLMClient } from '../src/agents/ILLMClient';
import { FakeFileSystem, makeRecord, rejectionOf } from './helpers/fakes';

const LOG_PATH = '/mem/observations.json';
const META_PATH = '/mem/observations.meta.json';
const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

describe('ObservationStore', () => {
    let fakeFs: FakeFileSystem;
    let now: Date;

    const openStore = (options: Partial<ObservationStoreOptions> = {}) =>
        ObservationStore.open(
            { filePath: LOG_PATH, retention: { retentionDays: 30, maxEntries: 50 }, ...options },
            { ...fakeFs.deps(), nowFn: () => now }
        );

    beforeEach(() => {
        fakeFs = new FakeFileSystem();
        now = new Date('2025-03-05T12:00:00.000Z');
        sinon.stub(console, 'debug');
        sinon.stub(console, 'log');
        sinon.stub(console, 'warn');
        sinon.stub(console, 'error');
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('open', () => {
        it('should start empty when the log does not exist', async () => {
            const store = await openStore();
            expect(store.size).to.equal(0);
            expect(store.stats()).to.deep.equal({ totalEntries: 0, oldestEntry: null, newestEntry: null, lastId: 0 });
        });

        it('should load records from the log ordered by id', async () => {
            const records: SerializedObservation[] = [
                { id: 2, timestamp: '2025-03-02T08:00:00.000Z', content: 'second', summary: 's2', source_ref: 'img-2' },
                { id: 1, timestamp: '2025-03-01T08:00:00.000Z', content: 'first', summary: 's1', source_ref: 'img-1' },
            ];
            fakeFs.files.set(LOG_PATH, JSON.stringify(records));

            const store = await openStore();

            expect(store.all().map(r => r.id)).to.deep.equal([1, 2]);
            expect(store.get(1)).to.deep.equal({
                id: 1, timestamp: '2025-03-01T08:00:00.000Z', content: 'first', summary: 's1', sourceRef: 'img-1',
            });
            expect(store.lastAssignedId).to.equal(2);
        });

        it('should raise StoreIOError for a log that is not JSON', async () => {
            fakeFs.files.set(LOG_PATH, 'not json');
            const error = await rejectionOf(openStore());
            expect(error).to.be.instanceOf(StoreIOError);
        });

        it('should raise StoreIOError for records missing fields', async () => {
            fakeFs.files.set(LOG_PATH, JSON.stringify([{ id: 1, content: 'no timestamp' }]));
            const error = await rejectionOf(openStore());
            expect(error).to.be.instanceOf(StoreIOError);
            expect(error instanceof Error ? error.message : '').to.contain('corrupted');
        });

        it('should raise StoreIOError for duplicate ids', async () => {
            const record: SerializedObservation = {
                id: 1, timestamp: '2025-03-01T08:00:00.000Z', content: 'c', summary: 's', source_ref: 'r',
            };
            fakeFs.files.set(LOG_PATH, JSON.stringify([record, record]));
            const error = await rejectionOf(openStore());
            expect(error).to.be.instanceOf(StoreIOError);
        });

        it('should take the id high-water mark from the id file when it is higher', async () => {
            fakeFs.files.set(META_PATH, JSON.stringify({ last_id: 9 }));
            const store = await openStore();
            const record = await store.append('after restart', 'img', { summary: 'after restart' });
            expect(record.id).to.equal(10);
        });
    });

    describe('append', () => {
        it('should assign increasing ids and stamp the current time', async () => {
            const store = await openStore();
            const first = await store.append('Morning fog over the bay.', 'img-1', { summary: 'fog' });
            now = new Date(now.getTime() + HOUR);
            const second = await store.append('Sun breaks through.', 'img-2', { summary: 'sun' });

            expect(first.id).to.equal(1);
            expect(first.timestamp).to.equal('2025-03-05T12:00:00.000Z');
            expect(second.id).to.equal(2);
            expect(second.timestamp).to.equal('2025-03-05T13:00:00.000Z');
        });

        it('should persist the full record set and the id high-water mark', async () => {
            const store = await openStore();
            await store.append('one', 'img-1', { summary: 'first' });
            await store.append('two', 'img-2', { summary: 'second' });

            expect(fakeFs.readJson(LOG_PATH)).to.deep.equal([
                { id: 1, timestamp: '2025-03-05T12:00:00.000Z', content: 'one', summary: 'first', source_ref: 'img-1' },
                { id: 2, timestamp: '2025-03-05T12:00:00.000Z', content: 'two', summary: 'second', source_ref: 'img-2' },
            ]);
            expect(fakeFs.readJson(META_PATH)).to.deep.equal({ last_id: 2 });
        });

        it('should leave no temp files behind', async () => {
            const store = await openStore();
            await store.append('one', 'img-1', { summary: 'first' });
            expect([...fakeFs.files.keys()].sort()).to.deep.equal([META_PATH, LOG_PATH].sort());
        });

        it('should use the truncation fallback when no summarizer is configured', async () => {
            const store = await openStore({ fallbackLength: 5 });
            const record = await store.append('abcdefghij', 'img-1');
            expect(record.summary).to.equal(`abcde${TRUNCATION_MARKER}`);
        });

        it('should store a fallback summary and untouched content when summarization fails', async () => {
            const llmClient: ILLMClient = {
                chatCompletion: sinon.stub().rejects(new Error('quota exceeded')),
                generateWithTools: sinon.stub().rejects(new Error('unused')),
            };
            const promptService = new PromptService(undefined, {
                readFileFn: sinon.stub().resolves('Summarize: {{content}}'),
            });
            const summarizer = new Summarizer(llmClient, promptService, { maxLength: 400, fallbackLength: 200 });
            const content = 'x'.repeat(250);

            const store = await openStore({ summarizer });
            const record = await store.append(content, 'img-1');

            expect(record.summary).to.equal('x'.repeat(200) + TRUNCATION_MARKER);
            expect(record.content).to.equal(content);
        });

        it('should serialize concurrent appends', async () => {
            const store = await openStore();
            const records = await Promise.all([
                store.append('a', 'img-a', { summary: 'a' }),
                store.append('b', 'img-b', { summary: 'b' }),
                store.append('c', 'img-c', { summary: 'c' }),
            ]);

            expect(records.map(r => r.id)).to.deep.equal([1, 2, 3]);
            expect(fakeFs.readJson(LOG_PATH)).to.have.lengthOf(3);
        });

        it('should keep the previous file and state when the write fails, and allow a retry', async () => {
            const store = await openStore();
            await store.append('kept', 'img-1', { summary: 'kept' });
            const before = fakeFs.files.get(LOG_PATH);

            fakeFs.failWrites = path => path.includes('observations.json.');
            const error = await rejectionOf(store.append('lost?', 'img-2', { summary: 'retry me' }));

            expect(error).to.be.instanceOf(StoreIOError);
            expect(fakeFs.files.get(LOG_PATH)).to.equal(before);
            expect(store.size).to.equal(1);

            const pending = error instanceof StoreIOError ? error.record : undefined;
            expect(pending?.id).to.equal(2);
            expect(pending?.summary).to.equal('retry me');

            fakeFs.failWrites = null;
            if (pending) {
                await store.commit(pending);
            }
            expect(store.all().map(r => r.id)).to.deep.equal([1, 2]);
            expect(fakeFs.readJson(LOG_PATH)).to.have.lengthOf(2);
        });

        it('should keep a failed record\'s id reserved while later appends go ahead', async () => {
            const store = await openStore();
            await store.append('one', 'img-1', { summary: 'one' });

            fakeFs.failWrites = path => path.includes('observations.json.');
            const error = await rejectionOf(store.append('two', 'img-2', { summary: 'two' }));
            const pending = error instanceof StoreIOError ? error.record : undefined;
            fakeFs.failWrites = null;

            const three = await store.append('three', 'img-3', { summary: 'three' });
            expect(pending?.id).to.equal(2);
            expect(three.id).to.equal(3);

            if (pending) {
                await store.commit(pending);
            }
            expect(store.all().map(r => r.summary)).to.deep.equal(['one', 'two', 'three']);
            expect(store.recent(1)[0].id).to.equal(3);
            expect(store.lastAssignedId).to.equal(3);
            expect(fakeFs.readJson(META_PATH)).to.deep.equal({ last_id: 3 });
            expect(fakeFs.readJson(LOG_PATH)).to.have.lengthOf(3);

            const next = await store.append('four', 'img-4', { summary: 'four' });
            expect(next.id).to.equal(4);
        });

        it('should accept a reserved id only once', async () => {
            const store = await openStore();
            fakeFs.failWrites = path => path.includes('observations.json.');
            const error = await rejectionOf(store.append('one', 'img-1', { summary: 'one' }));
            const pending = error instanceof StoreIOError ? error.record : undefined;
            fakeFs.failWrites = null;
            expect(pending).to.not.be.undefined;
            if (!pending) {
                return;
            }

            await store.commit(pending);
            const second = await rejectionOf(store.commit(pending));

            expect(second).to.be.instanceOf(Error);
            expect(store.size).to.equal(1);
        });

        it('should reject committing a record whose id was already assigned', async () => {
            const store = await openStore();
            const record = await store.append('one', 'img-1', { summary: 'one' });
            const error = await rejectionOf(store.commit(record));
            expect(error).to.be.instanceOf(Error);
            expect(store.size).to.equal(1);
        });
    });

    describe('recent', () => {
        it('should return every record, most recent first, when fewer than n exist', async () => {
            const store = await openStore();
            for (const text of ['one', 'two', 'three']) {
                await store.append(text, 'img', { summary: text });
            }
            expect(store.recent(5).map(r => r.id)).to.deep.equal([3, 2, 1]);
        });

        it('should return only the n most recent records', async () => {
            const store = await openStore();
            for (const text of ['one', 'two', 'three']) {
                await store.append(text, 'img', { summary: text });
            }
            expect(store.recent(2).map(r => r.id)).to.deep.equal([3, 2]);
        });

        it('should return an empty list for a non-positive count', async () => {
            const store = await openStore();
            await store.append('one', 'img', { summary: 'one' });
            expect(store.recent(0)).to.deep.equal([]);
            expect(store.recent(-3)).to.deep.equal([]);
        });
    });

    describe('retention', () => {
        it('should never reuse ids after the count cap prunes records', async () => {
            const store = await openStore({ retention: { retentionDays: null, maxEntries: 2 } });
            for (const text of ['a', 'b', 'c', 'd']) {
                await store.append(text, 'img', { summary: text });
            }
            expect(store.all().map(r => r.id)).to.deep.equal([3, 4]);

            const reopened = await openStore({ retention: { retentionDays: null, maxEntries: 2 } });
            const next = await reopened.append('e', 'img', { summary: 'e' });
            expect(next.id).to.equal(5);
        });

        it('should keep the id high-water mark when every record has aged out', async () => {
            const store = await openStore({ retention: { retentionDays: 1, maxEntries: null } });
            await store.append('old', 'img', { summary: 'old' });
            now = new Date(now.getTime() + 2 * DAY);

            expect(await store.prune()).to.equal(1);
            expect(store.size).to.equal(0);

            const reopened = await openStore({ retention: { retentionDays: 1, maxEntries: null } });
            const next = await reopened.append('new', 'img', { summary: 'new' });
            expect(next.id).to.equal(2);
        });

        it('should prune the 5 records older than 30 days out of 40', async () => {
            const records: SerializedObservation[] = [];
            for (let id = 1; id <= 40; id++) {
                const age = id <= 5 ? 31 * DAY + id * HOUR : (40 - id) * HOUR;
                records.push({
                    id,
                    timestamp: new Date(now.getTime() - age).toISOString(),
                    content: `observation ${id}`,
                    summary: `summary ${id}`,
                    source_ref: `img-${id}`,
                });
            }
            fakeFs.files.set(LOG_PATH, JSON.stringify(records));

            const store = await openStore();
            const removed = await store.prune();

            expect(removed).to.equal(5);
            expect(store.size).to.equal(35);
            const cutoff = now.getTime() - 30 * DAY;
            expect(store.all().every(r => Date.parse(r.timestamp) >= cutoff)).to.be.true;
            expect(store.all()[0].id).to.equal(6);
        });

        it('should bound the store size after every append', async () => {
            const store = await openStore({ retention: { retentionDays: 30, maxEntries: 3 } });
            for (let i = 0; i < 6; i++) {
                await store.append(`entry ${i}`, 'img', { summary: `entry ${i}` });
                expect(store.size).to.be.at.most(3);
            }
            expect(store.stats().lastId).to.equal(6);
        });
    });

    describe('applyRetention', () => {
        it('should apply the age limit before the count cap', () => {
            const current = new Date('2025-03-05T00:00:00.000Z');
            const records = [
                makeRecord(1, '2025-01-01T00:00:00.000Z', 'ancient'),
                makeRecord(2, '2025-03-01T00:00:00.000Z', 'b'),
                makeRecord(3, '2025-03-02T00:00:00.000Z', 'c'),
                makeRecord(4, '2025-03-03T00:00:00.000Z', 'd'),
            ];

            const { kept, removed } = applyRetention(records, { retentionDays: 30, maxEntries: 2 }, current);

            expect(kept.map(r => r.id)).to.deep.equal([3, 4]);
            expect(removed.map(r => r.id)).to.deep.equal([1, 2]);
        });

        it('should keep a record exactly at the retention age', () => {
            const current = new Date('2025-03-31T00:00:00.000Z');
            const records = [makeRecord(1, '2025-03-01T00:00:00.000Z', 'edge')];
            const { kept } = applyRetention(records, { retentionDays: 30, maxEntries: null }, current);
            expect(kept).to.have.lengthOf(1);
        });
    });
});
