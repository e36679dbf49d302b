import { SessionEvaluator, TherapySelector } from '../analysis/types';
import { createEmptySession, getOpenSession } from '../models/utils';
import { CounselingState } from '../types/CounselingState';
import { SessionEvaluation, SessionRecord } from '../types/SessionRecord';
import { errorMeta, logger } from '../utils/logger';
import { throwIfAborted } from './turnControl';

export interface SessionBoundaryResult {
    closedSessionIndex: number;
    previousTherapy: string;
    therapy: string;
    reason: string;
    therapyChanged: boolean;
    selectionFailed: boolean;
    evaluation?: SessionEvaluation;
}

export interface SessionManagerDependencies {
    therapySelector: TherapySelector;
    sessionEvaluator?: SessionEvaluator;
    now?: () => Date;
}

const log = logger.child('sessions');

export const openSessionOf = (state: CounselingState): SessionRecord => {
    const open = getOpenSession(state.allSessions);
    if (!open) {
        throw new Error(`Counseling record ${state.recordId} has no open session`);
    }
    return open;
};

export const replaceOpenSession = (state: CounselingState, session: SessionRecord, updatedAt: Date): CounselingState => ({
    ...state,
    allSessions: [...state.allSessions.slice(0, -1), session],
    updatedAt
});

/**
 * Guarantee the last session is open: restored records may end on a closed
 * session or have none at all.
 */
export const ensureOpenSession = (state: CounselingState, now: Date): CounselingState => {
    const last = state.allSessions[state.allSessions.length - 1];
    if (last && !last.isEnded) {
        return state;
    }
    const index = last ? last.index + 1 : 1;
    return {
        ...state,
        allSessions: [...state.allSessions, createEmptySession(index, state.currentTherapy, '', now)]
    };
};

/**
 * Cross-session loop: closes the open session, scores it, picks the next
 * plan and opens the following session. Works on copies; the caller commits.
 */
export class SessionManager {
    private therapySelector: TherapySelector;
    private sessionEvaluator?: SessionEvaluator;
    private now: () => Date;

    constructor(dependencies: SessionManagerDependencies) {
        this.therapySelector = dependencies.therapySelector;
        this.sessionEvaluator = dependencies.sessionEvaluator;
        this.now = dependencies.now ?? (() => new Date());
    }

    async closeAndAdvanceSession(state: CounselingState, signal?: AbortSignal): Promise<{ state: CounselingState; boundary: SessionBoundaryResult }> {
        const open = openSessionOf(state);
        const closed = await this.evaluate({ ...open, isEnded: true, endedAt: this.now() }, signal);
        const history = [...state.allSessions.slice(0, -1), closed];
        const previousTherapy = state.currentTherapy;

        let therapy = previousTherapy;
        let reason: string;
        let selectionFailed = false;
        try {
            const decision = await this.therapySelector.select(
                { closedSession: closed, allSessions: history, currentTherapy: previousTherapy },
                { signal }
            );
            therapy = decision.therapy;
            reason = decision.reason;
        } catch (error) {
            throwIfAborted(signal);
            selectionFailed = true;
            reason = `Therapy selection failed; continuing with ${previousTherapy}`;
            log.warn('Therapy selection failed, keeping current plan', { recordId: state.recordId, session: closed.index, ...errorMeta(error) });
        }

        const therapyChanged = therapy !== previousTherapy;
        if (therapyChanged) {
            log.info('Therapy plan changed', { recordId: state.recordId, from: previousTherapy, to: therapy });
        }

        const updatedAt = this.now();
        const next = createEmptySession(closed.index + 1, therapy, reason, updatedAt);

        return {
            state: {
                ...state,
                allSessions: [...history, next],
                currentTherapy: therapy,
                updatedAt
            },
            boundary: {
                closedSessionIndex: closed.index,
                previousTherapy,
                therapy,
                reason,
                therapyChanged,
                selectionFailed,
                ...(closed.evaluation ? { evaluation: closed.evaluation } : {})
            }
        };
    }

    private async evaluate(session: SessionRecord, signal?: AbortSignal): Promise<SessionRecord> {
        if (!this.sessionEvaluator || session.dialogue.length === 0) {
            return session;
        }

        try {
            const scores = await this.sessionEvaluator.evaluate({ session }, { signal });
            return { ...session, evaluation: { ...scores, evaluatedAt: this.now() } };
        } catch (error) {
            throwIfAborted(signal);
            log.warn('Session evaluation failed', { session: session.index, ...errorMeta(error) });
            return session;
        }
    }
}
