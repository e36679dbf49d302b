export { DatabaseConnection, retryDelayFor } from './DatabaseConnection';
export type { ConnectionSettings } from './DatabaseConnection';
export { Collections, COUNSELING_RECORDS_COLLECTION } from './Collections';

import { ConnectionSettings, DatabaseConnection } from './DatabaseConnection';
import { Collections } from './Collections';
import { fromMongoCollection, RecordCollection } from '../storage/MongoRecordStore';

/**
 * Connects once, prepares the counseling_records collection and hands it to
 * the record store.
 */
export class DatabaseManager {
    private readonly connection: DatabaseConnection;
    private collections: Collections | null = null;

    constructor(settings: ConnectionSettings) {
        this.connection = new DatabaseConnection(settings);
    }

    async initialize(): Promise<Collections> {
        const collections = new Collections(await this.connection.connect());
        await collections.ensureCollectionsExist();
        await collections.initializeCollections();

        this.collections = collections;
        return collections;
    }

    recordCollection(): RecordCollection {
        if (!this.collections) {
            throw new Error('Database not initialized. Call initialize() first.');
        }
        return fromMongoCollection(this.collections.counselingRecords);
    }

    async disconnect(): Promise<void> {
        await this.connection.disconnect();
        this.collections = null;
    }
}
