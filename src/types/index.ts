export * from './DialogueTurn';
export * from './Labels';
export * from './TurnAnalysis';
export * from './SessionRecord';
export * from './CounselingState';
