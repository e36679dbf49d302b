import { SessionRecord } from './SessionRecord';

export interface CounselingState {
    readonly recordId: string;
    readonly allSessions: readonly SessionRecord[];
    readonly currentTherapy: string;
    readonly createdAt: Date;
    readonly updatedAt: Date;
}

export interface RecordSummary {
    recordId: string;
    currentTherapy: string;
    sessionCount: number;
    lastUpdated: Date;
}
