import { EmotionLabel, PhaseLabel, StrategyLabel } from './Labels';

export interface TurnAnalysis {
    emotionLabel: EmotionLabel;
    emotionIntensity: number;
    resistance: boolean;
    phase: PhaseLabel;
    retrievedMemory: string;
    strategy: StrategyLabel;
    strategyText: string;
    counselorResponse: string;
    sessionEnded: boolean;
    memoryDegraded: boolean;
    endDetectionFailed: boolean;
}

/**
 * Per-turn entry kept on the session record. Mirrors TurnAnalysis minus the
 * counselor text (already in the dialogue) plus the model behind each step.
 */
export interface TurnAnalysisEntry {
    turn: number;
    emotionLabel: EmotionLabel;
    emotionIntensity: number;
    resistance: boolean;
    phase: PhaseLabel;
    retrievedMemory: string;
    strategy: StrategyLabel;
    strategyText: string;
    models: Record<string, string>;
}
