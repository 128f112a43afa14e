import logger from '../logger.js';
import { JsonValue, serializeBigInts } from './bigint.js';
import { deterministicIdFrom } from './deterministic-id.js';

export type EventCategory = 'pool' | 'swap' | 'router' | 'fees' | 'breaker' | 'admin';

/**
 * Represents the structure of an event document to be stored.
 */
export interface EventDocument {
    _id: string;
    category: EventCategory;
    action: string; // Specific action: 'created', 'liquidity_added', 'executed', 'tripped', ...
    type: string; // category_action
    timestamp: number; // engine time, unix seconds
    actor: string;
    data: { [key: string]: JsonValue };
    transactionId?: string;
}

/**
 * Destination for committed events, e.g. a database collection.
 */
export interface EventSink {
    name: string;
    write(event: EventDocument): Promise<void>;
}

export interface PendingEvent {
    category: EventCategory;
    action: string;
    actor: string;
    data: Record<string, unknown>;
}

/**
 * Keeps a bounded journal of committed events and fans them out to sinks.
 */
export class EventLogger {
    private journal: EventDocument[] = [];
    private sinks: EventSink[] = [];
    private sequence = 0;

    constructor(private readonly journalLimit: number) {}

    addSink(sink: EventSink): void {
        this.sinks.push(sink);
        logger.debug(`[event-logger] Registered event sink ${sink.name}`);
    }

    /**
     * Logs a committed event, stores it in the journal and forwards it to every sink.
     *
     * @param category - High-level category: 'pool', 'swap', 'router', 'fees', 'breaker', 'admin'
     * @param action - Specific action within the category
     * @param actor - The caller that initiated the operation
     * @param eventData - The specific data associated with the event
     * @param timestamp - Engine time of the operation
     * @param transactionId - Optional: id of the operation that produced the event
     */
    logEvent(category: EventCategory, action: string, actor: string, eventData: Record<string, unknown>, timestamp: number, transactionId?: string): EventDocument {
        this.sequence += 1;
        const data: { [key: string]: JsonValue } = {};
        for (const [key, value] of Object.entries(eventData)) {
            if (value !== undefined) data[key] = serializeBigInts(value);
        }

        const eventDocument: EventDocument = {
            _id: deterministicIdFrom([category, action, actor || 'anon', transactionId || '', timestamp, this.sequence], 24),
            category,
            action,
            type: `${category}_${action}`,
            timestamp,
            actor,
            data,
        };
        if (transactionId) {
            eventDocument.transactionId = transactionId;
        }

        logger.info(`${category}:${action} by ${actor}: ${JSON.stringify(data)}`);
        this.journal.push(eventDocument);
        if (this.journal.length > this.journalLimit) {
            this.journal.splice(0, this.journal.length - this.journalLimit);
        }

        for (const sink of this.sinks) {
            void sink.write(eventDocument).catch(error => {
                // The event is already in the journal; a failing sink only loses its copy.
                logger.error(`[event-logger] Sink ${sink.name} failed to store event ${eventDocument._id}: ${error instanceof Error ? error.message : String(error)}`);
            });
        }
        return eventDocument;
    }

    flush(events: PendingEvent[], timestamp: number, transactionId?: string): EventDocument[] {
        return events.map(event => this.logEvent(event.category, event.action, event.actor, event.data, timestamp, transactionId));
    }

    getEvents(filter: { category?: EventCategory; action?: string } = {}): EventDocument[] {
        return this.journal.filter(
            event => (filter.category === undefined || event.category === filter.category) && (filter.action === undefined || event.action === filter.action)
        );
    }
}
