// Persisted record shapes. Timestamps are ISO-8601 strings so the same
// document round-trips through a JSON file and a MongoDB collection.

export interface PersistedDialogueTurn {
    role: 'patient' | 'counselor';
    content: string;
    timestamp: string;
    model?: string;
}

export interface PersistedTurnAnalysis {
    turn: number;
    emotion_label: string;
    emotion_intensity: number;
    resistance: boolean;
    phase: string;
    retrieved_memory: string;
    strategy: string;
    strategy_text: string;
    models: Record<string, string>;
}

export interface PersistedSessionEvaluation {
    therapeutic_alliance: number;
    interaction: number;
    evaluated_at: string;
}

export interface PersistedSessionRecord {
    index: number;
    therapy: string;
    therapy_reason: string;
    dialogue: PersistedDialogueTurn[];
    is_ended: boolean;
    phase_history: string[];
    turn_analyses: PersistedTurnAnalysis[];
    created_at: string;
    ended_at?: string;
    evaluation?: PersistedSessionEvaluation;
}

export interface PersistedCounselingRecord {
    record_id: string;
    current_therapy: string;
    created_at: string;
    last_updated: string;
    all_sessions: PersistedSessionRecord[];
}

// Database document interface (for MongoDB operations)
export interface CounselingRecordDocument extends PersistedCounselingRecord {
    _id?: string;
}

export * from './errors';
export * from './utils';
export * from './validation';
