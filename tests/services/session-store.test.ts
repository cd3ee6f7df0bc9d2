import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InternalInvariantError, SessionExpiredError, SessionNotFoundError } from '../../src/services/errors';
import { InMemoryInvoiceIndex } from '../../src/services/index/invoice-index';
import { LocalHashingEmbedder } from '../../src/services/embedding/local-embedder';
import { SessionStore } from '../../src/services/session-store.service';
import { InvoiceRecord } from '../../src/models/invoice.model';
import { FakeClock, makeRecord, silentLogger } from '../helpers/fakes';

const TIMEOUT_MS = 60_000;

function indexFor(records: InvoiceRecord[]): InMemoryInvoiceIndex {
    return new InMemoryInvoiceIndex(records, records.map(() => [1, 0]), new LocalHashingEmbedder(8));
}

describe('SessionStore', () => {
    let clock: FakeClock;
    let store: SessionStore;
    const records = [makeRecord({ id: 'a' }), makeRecord({ id: 'b' })];

    beforeEach(() => {
        clock = new FakeClock();
        store = new SessionStore({ logger: silentLogger, timeoutMs: TIMEOUT_MS, sweepIntervalMs: 1000, now: clock.now });
    });

    it('creates sessions whose record count matches the index', () => {
        const sessionId = store.create(records, indexFor(records), 1);
        const session = store.get(sessionId);

        assert.equal(session.id, sessionId);
        assert.equal(session.status, 'active');
        assert.equal(session.records.length, session.index.size);
        assert.equal(session.revision, 0);
        assert.equal(session.filesProcessed, 1);
        assert.equal(session.expiresAt.getTime() - session.createdAt.getTime(), TIMEOUT_MS);
        assert.ok(Object.isFrozen(session.records));
        assert.equal(store.count(), 1);
    });

    it('refuses an index that does not match the records', () => {
        assert.throws(() => store.create(records, indexFor(records.slice(0, 1)), 1), InternalInvariantError);
        assert.equal(store.count(), 0);
    });

    it('reports unknown sessions as not found', () => {
        assert.throws(() => store.get('missing'), SessionNotFoundError);
    });

    it('reports an expired session once, then forgets it', () => {
        const sessionId = store.create(records, indexFor(records), 1);

        clock.advance(TIMEOUT_MS);
        assert.equal(store.get(sessionId).id, sessionId);

        clock.advance(1);
        assert.throws(() => store.get(sessionId), SessionExpiredError);
        assert.throws(() => store.get(sessionId), SessionNotFoundError);
        assert.equal(store.count(), 0);
    });

    it('keeps a fixed expiry unless sliding expiration is on', () => {
        const fixedId = store.create(records, indexFor(records), 1);
        clock.advance(TIMEOUT_MS - 1);
        store.get(fixedId);
        clock.advance(2);
        assert.throws(() => store.get(fixedId), SessionExpiredError);

        const sliding = new SessionStore({
            logger: silentLogger,
            timeoutMs: TIMEOUT_MS,
            sweepIntervalMs: 1000,
            slidingExpiration: true,
            now: clock.now,
        });
        const slidingId = sliding.create(records, indexFor(records), 1);
        clock.advance(TIMEOUT_MS - 1);
        sliding.get(slidingId);
        clock.advance(TIMEOUT_MS - 1);
        assert.equal(sliding.get(slidingId).id, slidingId);
    });

    it('sweeps expired sessions', () => {
        store.create(records, indexFor(records), 1);
        clock.advance(TIMEOUT_MS / 2);
        store.create(records, indexFor(records), 1);
        clock.advance(TIMEOUT_MS / 2 + 1);

        assert.equal(store.sweep(), 1);
        assert.equal(store.count(), 1);
    });

    it('still reports a swept session as expired once', () => {
        const early = store.create(records, indexFor(records), 1);
        clock.advance(TIMEOUT_MS + 1);
        store.create(records, indexFor(records), 1);

        assert.throws(() => store.get(early), SessionExpiredError);
        assert.throws(() => store.get(early), SessionNotFoundError);
    });

    it('replaces contents only at the expected revision', () => {
        const sessionId = store.create(records, indexFor(records), 1);
        const more = [...records, makeRecord({ id: 'c' })];

        assert.equal(store.replaceContents(sessionId, 0, more, indexFor(more), 1), true);
        assert.equal(store.replaceContents(sessionId, 0, more, indexFor(more), 1), false);

        const session = store.get(sessionId);
        assert.equal(session.revision, 1);
        assert.equal(session.records.length, 3);
        assert.equal(session.index.size, 3);
        assert.equal(session.filesProcessed, 2);
    });

    it('deletes and clears sessions', () => {
        const first = store.create(records, indexFor(records), 1);
        store.create(records, indexFor(records), 1);

        assert.equal(store.delete(first), true);
        assert.equal(store.delete(first), false);
        assert.equal(store.count(), 1);

        store.clear();
        assert.equal(store.count(), 0);
    });

    it('starts and stops the sweeper without keeping the process alive', () => {
        store.start();
        store.start();
        store.stop();
        store.stop();
    });
});
