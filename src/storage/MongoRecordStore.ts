import { Collection } from 'mongodb';
import { CounselingRecordDocument, PersistedCounselingRecord } from '../models';
import { InvalidInputError, RecordNotFoundError } from '../models/errors';
import { isValidRecordId } from '../models/utils';
import { deserializeRecord, serializeState } from '../models/validation';
import { CounselingState, RecordSummary } from '../types/CounselingState';
import { errorMeta, logger } from '../utils/logger';
import { byMostRecent, RecordStore, summarize } from './RecordStore';

const log = logger.child('mongo-store');

/** The operations the store needs from the counseling_records collection. */
export interface RecordCollection {
    findByRecordId(recordId: string): Promise<CounselingRecordDocument | null>;
    replaceByRecordId(recordId: string, record: PersistedCounselingRecord): Promise<void>;
    findAll(): Promise<CounselingRecordDocument[]>;
}

export const fromMongoCollection = (collection: Collection<CounselingRecordDocument>): RecordCollection => ({
    findByRecordId: recordId => collection.findOne({ record_id: recordId }, { projection: { _id: 0 } }),
    replaceByRecordId: async (recordId, record) => {
        await collection.replaceOne({ record_id: recordId }, record, { upsert: true });
    },
    findAll: () => collection.find({}, { projection: { _id: 0 } }).toArray()
});

export class MongoRecordStore implements RecordStore {
    constructor(private readonly collection: RecordCollection) {}

    async save(state: CounselingState): Promise<void> {
        this.assertRecordId(state.recordId);
        await this.collection.replaceByRecordId(state.recordId, serializeState(state));
        log.debug('Record upserted', { recordId: state.recordId });
    }

    async load(recordId: string): Promise<CounselingState> {
        this.assertRecordId(recordId);
        const document = await this.collection.findByRecordId(recordId);
        if (!document) {
            throw new RecordNotFoundError(recordId);
        }
        return deserializeRecord(document);
    }

    async list(): Promise<RecordSummary[]> {
        const summaries: RecordSummary[] = [];
        for (const document of await this.collection.findAll()) {
            try {
                summaries.push(summarize(deserializeRecord(document)));
            } catch (error) {
                log.warn('Skipping invalid record document', { recordId: document.record_id, ...errorMeta(error) });
            }
        }
        return summaries.sort(byMostRecent);
    }

    private assertRecordId(recordId: string): void {
        if (!isValidRecordId(recordId)) {
            throw new InvalidInputError(`Invalid record id: ${recordId}`);
        }
    }
}
