// Export all manager components
export * from './CounselingOrchestrator';
export * from './SessionManager';
export * from './turnControl';
