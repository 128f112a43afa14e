import { Db, MongoClient } from 'mongodb';

import logger from './logger.js';
import settings from './settings.js';
import { EventDocument, EventSink } from './utils/event-logger.js';

// The slice of a mongodb Collection the sink writes through.
export interface EventStore {
    insertOne(doc: EventDocument): Promise<unknown>;
}

/**
 * Persists committed engine events, one document per event, keyed by the event id.
 */
export class MongoEventSink implements EventSink {
    readonly name = 'mongo-events';

    constructor(private readonly store: EventStore) {}

    async write(event: EventDocument): Promise<void> {
        await this.store.insertOne(event);
        logger.trace(`[mongo] Stored event ${event._id} (${event.type})`);
    }
}

let client: MongoClient | null = null;

interface MongoConnection {
    db: Db | null;
    init(url?: string, dbName?: string): Promise<Db>;
    eventSink(): MongoEventSink;
    close(): Promise<void>;
}

export const mongo: MongoConnection = {
    db: null,

    init: async (url: string = settings.mongoUrl, dbName: string = settings.mongoDb): Promise<Db> => {
        client = new MongoClient(url, {});
        await client.connect();
        mongo.db = client.db(dbName);
        logger.info(`Connected to ${url}/${mongo.db.databaseName}`);
        await mongo.db.collection<EventDocument>('events').createIndex({ type: 1, timestamp: -1 });
        return mongo.db;
    },

    eventSink: (): MongoEventSink => {
        if (!mongo.db) {
            throw new Error('MongoDB is not initialized');
        }
        return new MongoEventSink(mongo.db.collection<EventDocument>('events'));
    },

    close: async (): Promise<void> => {
        if (client) {
            await client.close();
            logger.info('MongoDB connection closed');
        }
        client = null;
        mongo.db = null;
    },
};

export default mongo;
