// Label domains the analysis steps must map their output into

export const EMOTION_LABELS = [
    'anxiety',
    'sadness',
    'anger',
    'fear',
    'joy',
    'shame',
    'guilt',
    'frustration',
    'hopelessness',
    'confusion',
    'relief',
    'neutral'
] as const;

export type EmotionLabel = typeof EMOTION_LABELS[number];

export const PHASE_LABELS = [
    'assessment',
    'exploration',
    'intervention',
    'consolidation',
    'closure'
] as const;

export type PhaseLabel = typeof PHASE_LABELS[number];

export const STRATEGY_LABELS = [
    'Question',
    'Restatement or Paraphrasing',
    'Reflection of Feelings',
    'Self-disclosure',
    'Affirmation and Reassurance',
    'Providing Suggestions',
    'Information',
    'Challenge',
    'Interpretation',
    'Others'
] as const;

export type StrategyLabel = typeof STRATEGY_LABELS[number];
