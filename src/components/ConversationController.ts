import { CounselingOrchestrator } from '../managers/CounselingOrchestrator';
import { SessionBoundaryResult } from '../managers/SessionManager';
import { isCounselingError, ModelFailure, PersistenceFailure } from '../models/errors';
import { getOpenSession } from '../models/utils';
import { CounselingState } from '../types/CounselingState';
import { TurnAnalysis } from '../types/TurnAnalysis';
import { errorMeta, logger } from '../utils/logger';

export type OrchestratorFactory = () => CounselingOrchestrator;

const log = logger.child('conversation');

const RECORD_LIST_LIMIT = 20;

export const HELP_LINES = [
    'Commands:',
    '/start [therapy] - Start a new counseling record',
    '/load <recordId> - Continue a saved record',
    '/records - List saved records',
    '/status - Show the current record and session',
    '/end - End the current session and plan the next one',
    '/save - Retry saving the current record',
    '/debug - Toggle per-turn analysis output',
    '/help - Show this message',
    'Any other message is treated as what you want to say in the session.'
];

export const formatAnalysis = (analysis: TurnAnalysis): string => {
    const lines = [
        `Emotion: ${analysis.emotionLabel} (${analysis.emotionIntensity})`,
        `Resistance: ${analysis.resistance ? 'yes' : 'no'}`,
        `Phase: ${analysis.phase}`,
        `Strategy: ${analysis.strategy}`,
        `Memory: ${analysis.retrievedMemory || '(none)'}`,
        `Session ended: ${analysis.sessionEnded ? 'yes' : 'no'}`
    ];
    if (analysis.memoryDegraded) {
        lines.push('Memory retrieval failed for this turn.');
    }
    if (analysis.endDetectionFailed) {
        lines.push('End detection failed; the session was kept open.');
    }
    return lines.join('\n');
};

export const formatBoundary = (boundary: SessionBoundaryResult): string => {
    const lines = [`Session ${boundary.closedSessionIndex} has ended.`];
    if (boundary.selectionFailed) {
        lines.push(`Therapy selection failed; session ${boundary.closedSessionIndex + 1} continues with ${boundary.therapy}.`);
    } else if (boundary.therapyChanged) {
        lines.push(`Next session therapy: ${boundary.therapy}`);
    } else {
        lines.push(`Next session continues with ${boundary.therapy}.`);
    }
    if (boundary.reason && !boundary.selectionFailed) {
        lines.push(`Reason: ${boundary.reason}`);
    }
    return lines.join('\n');
};

const UNSAVED_WARNING = 'Warning: this change was not saved. Use /save to retry.';

/**
 * Chat-facing command handling, one orchestrator per chat. Every handler
 * returns the replies to send, in order.
 */
export class ConversationController {
    private readonly orchestrators = new Map<number, CounselingOrchestrator>();
    private readonly debugChats = new Set<number>();

    constructor(private readonly createOrchestrator: OrchestratorFactory) {}

    async start(chatId: number, therapy: string): Promise<string[]> {
        const orchestrator = this.createOrchestrator();
        const state = await this.install(chatId, orchestrator, () => orchestrator.initialize(therapy ? { initialTherapy: therapy } : {}));

        return [
            [
                `Started counseling record ${state.recordId}.`,
                `Therapy: ${state.currentTherapy}`,
                'Send a message to begin session 1.'
            ].join('\n')
        ];
    }

    async load(chatId: number, recordId: string): Promise<string[]> {
        if (!recordId) {
            return ['Usage: /load <recordId>'];
        }

        const orchestrator = this.createOrchestrator();
        try {
            const state = await this.install(chatId, orchestrator, () => orchestrator.load(recordId));
            const open = getOpenSession(state.allSessions);
            return [
                [
                    `Loaded record ${state.recordId}.`,
                    `Session ${open?.index ?? state.allSessions.length} with ${state.currentTherapy}.`
                ].join('\n')
            ];
        } catch (error) {
            return [this.describeError(error)];
        }
    }

    async listRecords(): Promise<string[]> {
        const records = await this.createOrchestrator().listRecords();
        if (records.length === 0) {
            return ['No saved records.'];
        }

        const lines = records
            .slice(0, RECORD_LIST_LIMIT)
            .map(record => `${record.recordId} - ${record.sessionCount} session(s) - ${record.currentTherapy}`);
        return [[`Saved records (${records.length}):`, ...lines].join('\n')];
    }

    status(chatId: number): string[] {
        const state = this.orchestrators.get(chatId)?.getState();
        if (!state) {
            return ['No active record. Use /start or /load <recordId>.'];
        }

        const open = getOpenSession(state.allSessions);
        const lastPhase = open?.phaseHistory[open.phaseHistory.length - 1];
        return [
            [
                `Record: ${state.recordId}`,
                `Session: ${open?.index ?? '-'}`,
                `Therapy: ${state.currentTherapy}`,
                `Turns this session: ${open?.turnAnalyses.length ?? 0}`,
                `Current phase: ${lastPhase ?? '-'}`,
                `Debug: ${this.debugChats.has(chatId) ? 'on' : 'off'}`
            ].join('\n')
        ];
    }

    async endSession(chatId: number): Promise<string[]> {
        const orchestrator = this.orchestrators.get(chatId);
        if (!orchestrator) {
            return ['No active record. Use /start or /load <recordId>.'];
        }

        try {
            const result = await orchestrator.endSession();
            const replies = [formatBoundary(result.boundary)];
            if (!result.persisted) {
                replies.push(UNSAVED_WARNING);
            }
            return replies;
        } catch (error) {
            return [this.describeError(error)];
        }
    }

    async save(chatId: number): Promise<string[]> {
        const orchestrator = this.orchestrators.get(chatId);
        if (!orchestrator) {
            return ['No active record. Use /start or /load <recordId>.'];
        }

        try {
            await orchestrator.saveState();
            return ['Record saved.'];
        } catch (error) {
            return [this.describeError(error)];
        }
    }

    toggleDebug(chatId: number): string[] {
        if (this.debugChats.delete(chatId)) {
            return ['Debug output off.'];
        }
        this.debugChats.add(chatId);
        return ['Debug output on.'];
    }

    /** A plain message is one patient turn. Starts a record on first use. */
    async handleUtterance(chatId: number, text: string): Promise<string[]> {
        let orchestrator = this.orchestrators.get(chatId);
        let started: Promise<CounselingState> | undefined;
        if (!orchestrator) {
            const created = this.createOrchestrator();
            started = this.install(chatId, created, () => created.initialize());
            orchestrator = created;
        }

        // Queued behind initialization, ahead of later messages for this chat
        const [initialized, turn] = await Promise.allSettled([started, orchestrator.processTurn(text)]);

        const replies: string[] = [];
        if (initialized.status === 'rejected') {
            return [this.describeError(initialized.reason)];
        }
        if (initialized.value) {
            replies.push(`Started counseling record ${initialized.value.recordId} with ${initialized.value.currentTherapy}.`);
        }
        if (turn.status === 'rejected') {
            return [...replies, this.describeError(turn.reason)];
        }

        const result = turn.value;
        replies.push(result.analysis.counselorResponse);
        if (this.debugChats.has(chatId)) {
            replies.push(formatAnalysis(result.analysis));
        }
        if (result.boundary) {
            replies.push(formatBoundary(result.boundary));
        }
        if (!result.persisted) {
            replies.push(UNSAVED_WARNING);
        }
        return replies;
    }

    /**
     * Registers the orchestrator before it is set up so messages arriving
     * meanwhile queue on it. A failed setup restores the previous one.
     */
    private async install<T>(chatId: number, orchestrator: CounselingOrchestrator, setup: () => Promise<T>): Promise<T> {
        const previous = this.orchestrators.get(chatId);
        this.orchestrators.set(chatId, orchestrator);
        try {
            return await setup();
        } catch (error) {
            if (this.orchestrators.get(chatId) === orchestrator) {
                if (previous) {
                    this.orchestrators.set(chatId, previous);
                } else {
                    this.orchestrators.delete(chatId);
                }
            }
            throw error;
        }
    }

    private describeError(error: unknown): string {
        if (error instanceof ModelFailure) {
            log.warn('Turn failed', errorMeta(error));
            return error.reason === 'timeout'
                ? 'That took too long and nothing was changed. Please send your message again.'
                : 'I could not process that message and nothing was changed. Please send it again.';
        }
        if (error instanceof PersistenceFailure) {
            return `${error.message}. Use /save to retry.`;
        }
        if (isCounselingError(error)) {
            return error.message;
        }
        throw error;
    }
}
