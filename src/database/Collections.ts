import { Collection, Db } from 'mongodb';
import { CounselingRecordDocument } from '../models';
import { logger } from '../utils/logger';

export const COUNSELING_RECORDS_COLLECTION = 'counseling_records';

const log = logger.child('database');

export class Collections {
    private db: Db;

    public counselingRecords: Collection<CounselingRecordDocument>;

    constructor(db: Db) {
        this.db = db;
        this.counselingRecords = db.collection<CounselingRecordDocument>(COUNSELING_RECORDS_COLLECTION);
    }

    async initializeCollections(): Promise<void> {
        log.info('Initializing MongoDB collections and indexes...');

        await this.counselingRecords.createIndex({ record_id: 1 }, { unique: true });
        await this.counselingRecords.createIndex({ last_updated: -1 });

        log.info('Successfully initialized collections and indexes');
    }

    async ensureCollectionsExist(): Promise<void> {
        const existingCollections = await this.db.listCollections({ name: COUNSELING_RECORDS_COLLECTION }).toArray();
        if (existingCollections.length === 0) {
            await this.db.createCollection(COUNSELING_RECORDS_COLLECTION);
            log.info(`Created collection: ${COUNSELING_RECORDS_COLLECTION}`);
        }
    }
}
