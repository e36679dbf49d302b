import { PersistedCounselingRecord } from '../models';
import { RecordNotFoundError } from '../models/errors';
import { deserializeRecord, serializeState } from '../models/validation';
import { CounselingState, RecordSummary } from '../types/CounselingState';
import { byMostRecent, RecordStore, summarize } from './RecordStore';

/**
 * Keeps serialized records in a map. Records pass through the same
 * serialize/validate path as the durable stores.
 */
export class InMemoryRecordStore implements RecordStore {
    private readonly records = new Map<string, PersistedCounselingRecord>();

    async save(state: CounselingState): Promise<void> {
        this.records.set(state.recordId, serializeState(state));
    }

    async load(recordId: string): Promise<CounselingState> {
        const record = this.records.get(recordId);
        if (!record) {
            throw new RecordNotFoundError(recordId);
        }
        return deserializeRecord(record);
    }

    async list(): Promise<RecordSummary[]> {
        return [...this.records.values()].map(record => summarize(deserializeRecord(record))).sort(byMostRecent);
    }

    // Raw persisted form, as a durable store would hold it
    snapshot(recordId: string): PersistedCounselingRecord | undefined {
        return this.records.get(recordId);
    }
}
