import { DialogueTurn } from '../types/DialogueTurn';
import { EmotionLabel, PhaseLabel, StrategyLabel } from '../types/Labels';
import { SessionRecord } from '../types/SessionRecord';
import { StepOptions } from './ModelBackedStep';

// Contracts the orchestrator depends on. `model` names whatever produced the
// result and ends up in the per-turn analysis log.

export interface Reaction {
    emotionLabel: EmotionLabel;
    emotionIntensity: number;
}

export interface ReactionInput {
    utterance: string;
    dialogue: readonly DialogueTurn[];
}

export interface ReactionClassifier {
    readonly model?: string;
    classify(input: ReactionInput, options?: StepOptions): Promise<Reaction>;
}

export interface ResistanceDetector {
    readonly model?: string;
    detect(input: ReactionInput, options?: StepOptions): Promise<boolean>;
}

export interface MemoryInput {
    utterance: string;
    closedSessions: readonly SessionRecord[];
}

export interface MemoryRetriever {
    readonly model?: string;
    retrieve(input: MemoryInput, options?: StepOptions): Promise<string>;
}

export interface PhaseInput {
    utterance: string;
    dialogue: readonly DialogueTurn[];
    therapy: string;
}

export interface PhaseSelector {
    readonly model?: string;
    select(input: PhaseInput, options?: StepOptions): Promise<PhaseLabel>;
}

export interface StrategyInput {
    utterance: string;
    emotionLabel: EmotionLabel;
    emotionIntensity: number;
    resistance: boolean;
    phase: PhaseLabel;
    therapy: string;
    usedStrategies: readonly StrategyLabel[];
}

export interface Strategy {
    strategy: StrategyLabel;
    strategyText: string;
}

export interface StrategySelector {
    readonly model?: string;
    select(input: StrategyInput, options?: StepOptions): Promise<Strategy>;
}

export interface CounselorInput {
    utterance: string;
    dialogue: readonly DialogueTurn[];
    memory: string;
    emotionLabel: EmotionLabel;
    emotionIntensity: number;
    therapy: string;
    phase: PhaseLabel;
    strategy: StrategyLabel;
    strategyText: string;
}

export interface CounselorResponder {
    readonly model?: string;
    respond(input: CounselorInput, options?: StepOptions): Promise<string>;
}

export interface EndDetectionInput {
    dialogue: readonly DialogueTurn[];
}

export interface EndOfSessionDetector {
    readonly model?: string;
    detect(input: EndDetectionInput, options?: StepOptions): Promise<boolean>;
}

export interface TherapyInput {
    closedSession: SessionRecord;
    allSessions: readonly SessionRecord[];
    currentTherapy: string;
}

export interface TherapyDecision {
    therapy: string;
    reason: string;
}

export interface TherapySelector {
    readonly model?: string;
    select(input: TherapyInput, options?: StepOptions): Promise<TherapyDecision>;
}

export interface FirstTherapySelector {
    readonly model?: string;
    select(input: { intakeRecord: string }, options?: StepOptions): Promise<TherapyDecision>;
}

export interface SessionScores {
    therapeuticAlliance: number;
    interaction: number;
}

export interface SessionEvaluator {
    readonly model?: string;
    evaluate(input: { session: SessionRecord }, options?: StepOptions): Promise<SessionScores>;
}
