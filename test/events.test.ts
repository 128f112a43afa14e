import './setup.js';

import assert from 'assert';
import { describe, it } from 'node:test';

import { MongoEventSink } from '../src/mongo.js';
import { EventDocument, EventLogger, EventSink } from '../src/utils/event-logger.js';
import { START } from './helpers.js';

class RecordingSink implements EventSink {
    readonly name = 'recording';
    readonly written: EventDocument[] = [];

    async write(event: EventDocument): Promise<void> {
        this.written.push(event);
    }
}

const flushMicrotasks = () => new Promise<void>(resolve => setImmediate(resolve));

describe('EventLogger', () => {
    it('stores committed events with serialized data', () => {
        const events = new EventLogger(10);
        const event = events.logEvent('swap', 'executed', 'bob', { amountIn: 100n, minAmountOut: undefined, poolId: 'ART_NATIVE' }, START, 'tx-1');

        assert.strictEqual(event.type, 'swap_executed');
        assert.strictEqual(event.timestamp, START);
        assert.strictEqual(event.transactionId, 'tx-1');
        assert.strictEqual(event._id.length, 24);
        assert.deepStrictEqual(event.data, { amountIn: '100', poolId: 'ART_NATIVE' });
        assert.deepStrictEqual(events.getEvents(), [event]);
    });

    it('gives every event its own id, even within one transaction', () => {
        const events = new EventLogger(10);
        const [first, second] = events.flush(
            [
                { category: 'pool', action: 'liquidity_removed', actor: 'alice', data: {} },
                { category: 'pool', action: 'liquidity_removed', actor: 'alice', data: {} },
            ],
            START,
            'tx-2'
        );
        assert.notStrictEqual(first._id, second._id);
    });

    it('filters by category and action and keeps only the newest entries', () => {
        const events = new EventLogger(3);
        events.logEvent('pool', 'created', 'alice', {}, START);
        events.logEvent('swap', 'executed', 'bob', {}, START + 1);
        events.logEvent('swap', 'executed', 'carol', {}, START + 2);
        events.logEvent('admin', 'paused', 'owner', {}, START + 3);

        assert.deepStrictEqual(
            events.getEvents().map(event => event.actor),
            ['bob', 'carol', 'owner']
        );
        assert.strictEqual(events.getEvents({ category: 'pool' }).length, 0);
        assert.strictEqual(events.getEvents({ category: 'swap', action: 'executed' }).length, 2);
        assert.strictEqual(events.getEvents({ action: 'paused' })[0].transactionId, undefined);
    });

    it('forwards events to sinks and survives a failing one', async () => {
        const events = new EventLogger(10);
        const recording = new RecordingSink();
        events.addSink({
            name: 'broken',
            write: async () => {
                throw new Error('disk full');
            },
        });
        events.addSink(recording);

        const event = events.logEvent('fees', 'collected', 'fee-treasury', { amount: 5n }, START);
        await flushMicrotasks();

        assert.deepStrictEqual(recording.written, [event]);
        assert.strictEqual(events.getEvents().length, 1);
    });
});

describe('MongoEventSink', () => {
    it('inserts each event into the store', async () => {
        const inserted: EventDocument[] = [];
        const sink = new MongoEventSink({
            insertOne: async (doc: EventDocument) => {
                inserted.push(doc);
                return { acknowledged: true };
            },
        });
        const events = new EventLogger(10);
        events.addSink(sink);

        const event = events.logEvent('breaker', 'reset', 'bob', { wasActive: true }, START);
        await flushMicrotasks();

        assert.strictEqual(sink.name, 'mongo-events');
        assert.deepStrictEqual(inserted, [event]);
    });
});
