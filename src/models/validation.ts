// Validation and conversion between in-memory state and persisted records
import { CounselingState } from '../types/CounselingState';
import { DialogueTurn } from '../types/DialogueTurn';
import {
    EMOTION_LABELS,
    EmotionLabel,
    PHASE_LABELS,
    PhaseLabel,
    STRATEGY_LABELS,
    StrategyLabel
} from '../types/Labels';
import { SessionEvaluation, SessionRecord } from '../types/SessionRecord';
import { TurnAnalysisEntry } from '../types/TurnAnalysis';
import { RecordValidationError } from './errors';
import {
    PersistedCounselingRecord,
    PersistedDialogueTurn,
    PersistedSessionRecord,
    PersistedTurnAnalysis
} from './index';
import { isValidRecordId } from './utils';

const normalizeLabel = (value: string): string => {
    return value
        .trim()
        .replace(/^["'`*\s]+|["'`*.\s]+$/g, '')
        .replace(/\s+/g, ' ')
        .toLowerCase();
};

/**
 * Map raw text onto a member of a label domain, ignoring case, surrounding
 * quotes and trailing punctuation. Returns undefined when nothing matches.
 */
export const matchLabel = <T extends string>(domain: readonly T[], raw: string): T | undefined => {
    const normalized = normalizeLabel(raw);
    return domain.find(label => label.toLowerCase() === normalized);
};

export const isEmotionLabel = (value: unknown): value is EmotionLabel => {
    return EMOTION_LABELS.some(label => label === value);
};

export const isPhaseLabel = (value: unknown): value is PhaseLabel => {
    return PHASE_LABELS.some(label => label === value);
};

export const isStrategyLabel = (value: unknown): value is StrategyLabel => {
    return STRATEGY_LABELS.some(label => label === value);
};

export const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

// Serialization

const serializeTurn = (turn: DialogueTurn): PersistedDialogueTurn => ({
    role: turn.role,
    content: turn.content,
    timestamp: turn.timestamp.toISOString(),
    ...(turn.model !== undefined ? { model: turn.model } : {})
});

const serializeAnalysis = (entry: TurnAnalysisEntry): PersistedTurnAnalysis => ({
    turn: entry.turn,
    emotion_label: entry.emotionLabel,
    emotion_intensity: entry.emotionIntensity,
    resistance: entry.resistance,
    phase: entry.phase,
    retrieved_memory: entry.retrievedMemory,
    strategy: entry.strategy,
    strategy_text: entry.strategyText,
    models: { ...entry.models }
});

const serializeSession = (session: SessionRecord): PersistedSessionRecord => ({
    index: session.index,
    therapy: session.therapy,
    therapy_reason: session.therapyReason,
    dialogue: session.dialogue.map(serializeTurn),
    is_ended: session.isEnded,
    phase_history: [...session.phaseHistory],
    turn_analyses: session.turnAnalyses.map(serializeAnalysis),
    created_at: session.createdAt.toISOString(),
    ...(session.endedAt ? { ended_at: session.endedAt.toISOString() } : {}),
    ...(session.evaluation
        ? {
            evaluation: {
                therapeutic_alliance: session.evaluation.therapeuticAlliance,
                interaction: session.evaluation.interaction,
                evaluated_at: session.evaluation.evaluatedAt.toISOString()
            }
        }
        : {})
});

export const serializeState = (state: CounselingState): PersistedCounselingRecord => ({
    record_id: state.recordId,
    current_therapy: state.currentTherapy,
    created_at: state.createdAt.toISOString(),
    last_updated: state.updatedAt.toISOString(),
    all_sessions: state.allSessions.map(serializeSession)
});

// Deserialization with validation

const fail = (path: string, expectation: string): never => {
    throw new RecordValidationError(`Invalid counseling record: ${path} must be ${expectation}`);
};

const readString = (source: Record<string, unknown>, key: string, path: string): string => {
    const value = source[key];
    return typeof value === 'string' ? value : fail(`${path}.${key}`, 'a string');
};

const readBoolean = (source: Record<string, unknown>, key: string, path: string): boolean => {
    const value = source[key];
    return typeof value === 'boolean' ? value : fail(`${path}.${key}`, 'a boolean');
};

const readNumber = (source: Record<string, unknown>, key: string, path: string): number => {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fail(`${path}.${key}`, 'a finite number');
};

const readDate = (source: Record<string, unknown>, key: string, path: string): Date => {
    const raw = readString(source, key, path);
    const date = new Date(raw);
    return Number.isNaN(date.getTime()) ? fail(`${path}.${key}`, 'an ISO-8601 timestamp') : date;
};

const readArray = (source: Record<string, unknown>, key: string, path: string): unknown[] => {
    const value = source[key];
    return Array.isArray(value) ? value : fail(`${path}.${key}`, 'an array');
};

const asRecord = (value: unknown, path: string): Record<string, unknown> => {
    return isRecord(value) ? value : fail(path, 'an object');
};

const readStringMap = (source: Record<string, unknown>, key: string, path: string): Record<string, string> => {
    const value = asRecord(source[key], `${path}.${key}`);
    const result: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
        result[name] = typeof entry === 'string' ? entry : fail(`${path}.${key}.${name}`, 'a string');
    }
    return result;
};

const parseTurn = (raw: unknown, path: string): DialogueTurn => {
    const source = asRecord(raw, path);
    const role = source.role;
    if (role !== 'patient' && role !== 'counselor') {
        return fail(`${path}.role`, '"patient" or "counselor"');
    }
    const model = source.model;
    if (model !== undefined && typeof model !== 'string') {
        return fail(`${path}.model`, 'a string when present');
    }
    return {
        role,
        content: readString(source, 'content', path),
        timestamp: readDate(source, 'timestamp', path),
        ...(model !== undefined ? { model } : {})
    };
};

const parseAnalysis = (raw: unknown, path: string): TurnAnalysisEntry => {
    const source = asRecord(raw, path);
    const emotionLabel = source.emotion_label;
    const phase = source.phase;
    const strategy = source.strategy;
    const intensity = readNumber(source, 'emotion_intensity', path);

    if (!isEmotionLabel(emotionLabel)) {
        return fail(`${path}.emotion_label`, `one of ${EMOTION_LABELS.join(', ')}`);
    }
    if (!isPhaseLabel(phase)) {
        return fail(`${path}.phase`, `one of ${PHASE_LABELS.join(', ')}`);
    }
    if (!isStrategyLabel(strategy)) {
        return fail(`${path}.strategy`, `one of ${STRATEGY_LABELS.join(', ')}`);
    }
    if (intensity < 0 || intensity > 1) {
        return fail(`${path}.emotion_intensity`, 'between 0 and 1');
    }

    return {
        turn: readNumber(source, 'turn', path),
        emotionLabel,
        emotionIntensity: intensity,
        resistance: readBoolean(source, 'resistance', path),
        phase,
        retrievedMemory: readString(source, 'retrieved_memory', path),
        strategy,
        strategyText: readString(source, 'strategy_text', path),
        models: readStringMap(source, 'models', path)
    };
};

const parseEvaluation = (raw: unknown, path: string): SessionEvaluation => {
    const source = asRecord(raw, path);
    return {
        therapeuticAlliance: readNumber(source, 'therapeutic_alliance', path),
        interaction: readNumber(source, 'interaction', path),
        evaluatedAt: readDate(source, 'evaluated_at', path)
    };
};

const parseSession = (raw: unknown, path: string): SessionRecord => {
    const source = asRecord(raw, path);
    const index = readNumber(source, 'index', path);
    if (!Number.isInteger(index) || index < 1) {
        return fail(`${path}.index`, 'a positive integer');
    }

    const phaseHistory = readArray(source, 'phase_history', path).map((phase, position) => {
        return isPhaseLabel(phase) ? phase : fail(`${path}.phase_history[${position}]`, `one of ${PHASE_LABELS.join(', ')}`);
    });

    const isEnded = readBoolean(source, 'is_ended', path);
    const endedAt = source.ended_at === undefined ? undefined : readDate(source, 'ended_at', path);
    if (endedAt && !isEnded) {
        return fail(`${path}.ended_at`, 'absent while the session is open');
    }

    return {
        index,
        therapy: readString(source, 'therapy', path),
        therapyReason: readString(source, 'therapy_reason', path),
        dialogue: readArray(source, 'dialogue', path).map((turn, position) => parseTurn(turn, `${path}.dialogue[${position}]`)),
        isEnded,
        phaseHistory,
        turnAnalyses: readArray(source, 'turn_analyses', path).map((entry, position) => parseAnalysis(entry, `${path}.turn_analyses[${position}]`)),
        createdAt: readDate(source, 'created_at', path),
        ...(endedAt ? { endedAt } : {}),
        ...(source.evaluation !== undefined ? { evaluation: parseEvaluation(source.evaluation, `${path}.evaluation`) } : {})
    };
};

/**
 * Validate an untrusted persisted record and convert it into state. Only the
 * last session may be open, and session indexes must be consecutive.
 */
export const deserializeRecord = (raw: unknown): CounselingState => {
    const source = asRecord(raw, 'record');
    const recordId = readString(source, 'record_id', 'record');
    if (!isValidRecordId(recordId)) {
        fail('record.record_id', 'made of letters, digits, "_" or "-"');
    }

    const sessions = readArray(source, 'all_sessions', 'record').map((session, position) => parseSession(session, `record.all_sessions[${position}]`));

    sessions.forEach((session, position) => {
        if (position > 0 && session.index !== sessions[position - 1].index + 1) {
            fail(`record.all_sessions[${position}].index`, 'consecutive');
        }
        if (!session.isEnded && position !== sessions.length - 1) {
            fail(`record.all_sessions[${position}].is_ended`, 'true for every session but the last');
        }
    });

    return {
        recordId,
        currentTherapy: readString(source, 'current_therapy', 'record'),
        createdAt: readDate(source, 'created_at', 'record'),
        updatedAt: readDate(source, 'last_updated', 'record'),
        allSessions: sessions
    };
};
