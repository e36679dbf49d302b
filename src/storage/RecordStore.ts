import { CounselingState, RecordSummary } from '../types/CounselingState';

/**
 * Durable home of counseling records. `save` replaces the whole record
 * atomically; `load` validates what it reads and throws RecordNotFoundError
 * or RecordValidationError.
 */
export interface RecordStore {
    save(state: CounselingState): Promise<void>;
    load(recordId: string): Promise<CounselingState>;
    list(): Promise<RecordSummary[]>;
}

export const summarize = (state: CounselingState): RecordSummary => ({
    recordId: state.recordId,
    currentTherapy: state.currentTherapy,
    sessionCount: state.allSessions.length,
    lastUpdated: state.updatedAt
});

export const byMostRecent = (a: RecordSummary, b: RecordSummary): number => b.lastUpdated.getTime() - a.lastUpdated.getTime();
