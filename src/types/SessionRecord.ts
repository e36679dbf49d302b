import { DialogueTurn } from './DialogueTurn';
import { PhaseLabel } from './Labels';
import { TurnAnalysisEntry } from './TurnAnalysis';

export interface SessionEvaluation {
    therapeuticAlliance: number; // 0-3
    interaction: number; // 0-3
    evaluatedAt: Date;
}

export interface SessionRecord {
    readonly index: number;
    readonly therapy: string;
    readonly therapyReason: string;
    readonly dialogue: readonly DialogueTurn[];
    readonly isEnded: boolean;
    readonly phaseHistory: readonly PhaseLabel[];
    readonly turnAnalyses: readonly TurnAnalysisEntry[];
    readonly createdAt: Date;
    readonly endedAt?: Date;
    readonly evaluation?: SessionEvaluation;
}
