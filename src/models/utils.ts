// Utility functions for ID generation and record operations
import { v4 as uuidv4 } from 'uuid';
import { DialogueTurn } from '../types/DialogueTurn';
import { SessionRecord } from '../types/SessionRecord';

export const RECORD_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const generateRecordId = (now: Date = new Date()): string => {
    const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    return `counseling_${stamp}_${uuidv4().slice(0, 8)}`;
};

export const isValidRecordId = (recordId: string): boolean => RECORD_ID_PATTERN.test(recordId);

export const createEmptySession = (index: number, therapy: string, therapyReason = '', now: Date = new Date()): SessionRecord => ({
    index,
    therapy,
    therapyReason,
    dialogue: [],
    isEnded: false,
    phaseHistory: [],
    turnAnalyses: [],
    createdAt: now
});

export const getOpenSession = (sessions: readonly SessionRecord[]): SessionRecord | undefined => {
    const last = sessions[sessions.length - 1];
    return last && !last.isEnded ? last : undefined;
};

export const getClosedSessions = (sessions: readonly SessionRecord[]): SessionRecord[] => {
    return sessions.filter(session => session.isEnded);
};

export interface DialogueLabels {
    patient: string;
    counselor: string;
}

export const DEFAULT_DIALOGUE_LABELS: DialogueLabels = {
    patient: 'Patient',
    counselor: 'Therapist'
};

export const formatDialogue = (dialogue: readonly DialogueTurn[], labels: DialogueLabels = DEFAULT_DIALOGUE_LABELS): string => {
    return dialogue
        .map(turn => `${turn.role === 'patient' ? labels.patient : labels.counselor}: ${turn.content}`)
        .join('\n');
};

/**
 * Renders several sessions as "Session N:" blocks separated by blank lines.
 * Sessions without dialogue are skipped.
 */
export const formatSessionHistory = (sessions: readonly SessionRecord[], labels: DialogueLabels = DEFAULT_DIALOGUE_LABELS): string => {
    return sessions
        .filter(session => session.dialogue.length > 0)
        .map(session => `Session ${session.index}:\n${formatDialogue(session.dialogue, labels)}`)
        .join('\n\n');
};
