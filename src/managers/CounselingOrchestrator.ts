import { CounselingSteps } from '../analysis';
import {
    InvalidInputError,
    PersistenceFailure,
    UninitializedStateError
} from '../models/errors';
import { createEmptySession, generateRecordId, getClosedSessions } from '../models/utils';
import { RecordStore } from '../storage/RecordStore';
import { CounselingState, RecordSummary } from '../types/CounselingState';
import { DialogueTurn } from '../types/DialogueTurn';
import { StrategyLabel } from '../types/Labels';
import { TurnAnalysis, TurnAnalysisEntry } from '../types/TurnAnalysis';
import { errorMeta, logger } from '../utils/logger';
import {
    ensureOpenSession,
    openSessionOf,
    replaceOpenSession,
    SessionBoundaryResult,
    SessionManager
} from './SessionManager';
import { runBounded, TaskQueue, throwIfAborted } from './turnControl';

export interface OrchestratorSettings {
    initialTherapy: string;
    turnTimeoutMs: number;
    endDetectionRetries: number;
}

export interface OrchestratorDependencies {
    steps: CounselingSteps;
    store: RecordStore;
    settings: OrchestratorSettings;
    now?: () => Date;
}

export interface InitializeOptions {
    initialTherapy?: string;
    intakeRecord?: string;
}

export interface TurnOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface PersistOutcome {
    persisted: boolean;
    persistenceError?: PersistenceFailure;
}

export interface TurnResult extends PersistOutcome {
    analysis: TurnAnalysis;
    state: CounselingState;
    boundary?: SessionBoundaryResult;
}

export interface EndSessionResult extends PersistOutcome {
    state: CounselingState;
    boundary: SessionBoundaryResult;
}

interface TurnOutcome {
    analysis: TurnAnalysis;
    state: CounselingState;
    boundary?: SessionBoundaryResult;
}

const log = logger.child('orchestrator');

const definedModels = (entries: Record<string, string | undefined>): Record<string, string> => {
    const models: Record<string, string> = {};
    for (const [step, model] of Object.entries(entries)) {
        if (model) {
            models[step] = model;
        }
    }
    return models;
};

/**
 * Owns one counseling record and runs both control loops over it: the
 * per-turn analysis pipeline and the session boundary. Public operations are
 * serialized; each turn is computed on a copy and committed only when every
 * required step succeeded.
 */
export class CounselingOrchestrator {
    private readonly steps: CounselingSteps;
    private readonly store: RecordStore;
    private readonly settings: OrchestratorSettings;
    private readonly now: () => Date;
    private readonly sessions: SessionManager;
    private readonly queue = new TaskQueue();
    private state?: CounselingState;

    constructor(dependencies: OrchestratorDependencies) {
        this.steps = dependencies.steps;
        this.store = dependencies.store;
        this.settings = dependencies.settings;
        this.now = dependencies.now ?? (() => new Date());
        this.sessions = new SessionManager({
            therapySelector: dependencies.steps.therapySelector,
            sessionEvaluator: dependencies.steps.sessionEvaluator,
            now: this.now
        });
    }

    /**
     * Start a fresh record. The first plan comes from `initialTherapy`, else
     * from the intake record when a first-therapy selector is bound, else
     * from the configured default.
     */
    initialize(options: InitializeOptions = {}): Promise<CounselingState> {
        return this.queue.run(async () => {
            const { therapy, reason } = await this.chooseFirstTherapy(options);
            const now = this.now();
            const state: CounselingState = {
                recordId: generateRecordId(now),
                allSessions: [createEmptySession(1, therapy, reason, now)],
                currentTherapy: therapy,
                createdAt: now,
                updatedAt: now
            };

            this.state = state;
            log.info('Counseling record initialized', { recordId: state.recordId, therapy });
            return state;
        });
    }

    load(recordId: string): Promise<CounselingState> {
        return this.queue.run(async () => {
            const restored = await this.store.load(recordId);
            const state = ensureOpenSession(restored, this.now());

            this.state = state;
            log.info('Counseling record loaded', {
                recordId,
                sessions: state.allSessions.length,
                therapy: state.currentTherapy
            });
            return state;
        });
    }

    processTurn(patientUtterance: string, options: TurnOptions = {}): Promise<TurnResult> {
        const utterance = patientUtterance.trim();

        return this.queue.run(async () => {
            if (!utterance) {
                throw new InvalidInputError('Patient utterance must not be empty');
            }
            const base = this.requireState('processTurn');
            const startTime = Date.now();

            let outcome: TurnOutcome;
            try {
                outcome = await runBounded(signal => this.runTurn(base, utterance, signal), {
                    timeoutMs: options.timeoutMs ?? this.settings.turnTimeoutMs,
                    signal: options.signal
                });
            } catch (error) {
                log.warn('Turn aborted, state unchanged', { recordId: base.recordId, elapsedMs: Date.now() - startTime, ...errorMeta(error) });
                throw error;
            }

            this.state = outcome.state;
            const persistence = await this.persist(outcome.state);

            log.info('Turn processed', {
                recordId: base.recordId,
                session: openSessionOf(base).index,
                phase: outcome.analysis.phase,
                strategy: outcome.analysis.strategy,
                sessionEnded: outcome.analysis.sessionEnded,
                persisted: persistence.persisted,
                elapsedMs: Date.now() - startTime
            });

            return { ...outcome, ...persistence };
        });
    }

    /** Close the open session on operator request and advance to the next. */
    endSession(options: TurnOptions = {}): Promise<EndSessionResult> {
        return this.queue.run(async () => {
            const base = this.requireState('endSession');
            if (openSessionOf(base).dialogue.length === 0) {
                throw new InvalidInputError('The current session has no dialogue to end');
            }

            const { state, boundary } = await runBounded(signal => this.sessions.closeAndAdvanceSession(base, signal), {
                timeoutMs: options.timeoutMs ?? this.settings.turnTimeoutMs,
                signal: options.signal
            });

            this.state = state;
            return { state, boundary, ...(await this.persist(state)) };
        });
    }

    /** Retry persistence of the committed state. */
    saveState(): Promise<void> {
        return this.queue.run(async () => {
            const state = this.requireState('saveState');
            try {
                await this.store.save(state);
            } catch (error) {
                throw new PersistenceFailure(state.recordId, error);
            }
        });
    }

    getState(): CounselingState | undefined {
        return this.state;
    }

    listRecords(): Promise<RecordSummary[]> {
        return this.store.list();
    }

    private requireState(operation: string): CounselingState {
        if (!this.state) {
            throw new UninitializedStateError(operation);
        }
        return this.state;
    }

    private async chooseFirstTherapy(options: InitializeOptions): Promise<{ therapy: string; reason: string }> {
        const explicit = options.initialTherapy?.trim();
        if (explicit) {
            return { therapy: explicit, reason: '' };
        }

        const intakeRecord = options.intakeRecord?.trim();
        const selector = this.steps.firstTherapySelector;
        if (intakeRecord && selector) {
            return selector.select({ intakeRecord });
        }
        if (intakeRecord) {
            log.warn('Intake record given but no first-therapy selector is bound; using the default plan');
        }
        return { therapy: this.settings.initialTherapy, reason: '' };
    }

    private async runTurn(base: CounselingState, utterance: string, signal: AbortSignal): Promise<TurnOutcome> {
        const { steps } = this;
        const open = openSessionOf(base);
        const options = { signal };

        const patientTurn: DialogueTurn = { role: 'patient', content: utterance, timestamp: this.now() };
        const dialogue = [...open.dialogue, patientTurn];

        const [reaction, resistance] = await Promise.all([
            steps.reactionClassifier.classify({ utterance, dialogue }, options),
            steps.resistanceDetector.detect({ utterance, dialogue }, options)
        ]);
        throwIfAborted(signal);

        const { memory, memoryDegraded } = await this.retrieveMemory(base, utterance, signal);

        const phase = await steps.phaseSelector.select({ utterance, dialogue, therapy: base.currentTherapy }, options);
        throwIfAborted(signal);

        const usedStrategies = [...new Set<StrategyLabel>(open.turnAnalyses.map(entry => entry.strategy))];
        const { strategy, strategyText } = await steps.strategySelector.select(
            {
                utterance,
                emotionLabel: reaction.emotionLabel,
                emotionIntensity: reaction.emotionIntensity,
                resistance,
                phase,
                therapy: base.currentTherapy,
                usedStrategies
            },
            options
        );
        throwIfAborted(signal);

        const counselorResponse = await steps.counselorResponder.respond(
            {
                utterance,
                dialogue,
                memory,
                emotionLabel: reaction.emotionLabel,
                emotionIntensity: reaction.emotionIntensity,
                therapy: base.currentTherapy,
                phase,
                strategy,
                strategyText
            },
            options
        );
        throwIfAborted(signal);

        const counselorTurn: DialogueTurn = {
            role: 'counselor',
            content: counselorResponse,
            timestamp: this.now(),
            ...(steps.counselorResponder.model ? { model: steps.counselorResponder.model } : {})
        };
        const updatedDialogue = [...dialogue, counselorTurn];

        const { ended, failed } = await this.detectEnd(updatedDialogue, signal);

        const entry: TurnAnalysisEntry = {
            turn: open.turnAnalyses.length + 1,
            emotionLabel: reaction.emotionLabel,
            emotionIntensity: reaction.emotionIntensity,
            resistance,
            phase,
            retrievedMemory: memory,
            strategy,
            strategyText,
            models: definedModels({
                reaction_classifier: steps.reactionClassifier.model,
                resistance_detection: steps.resistanceDetector.model,
                memory_retrieve: steps.memoryRetriever.model,
                phase_selection: steps.phaseSelector.model,
                strategy_selection: steps.strategySelector.model,
                counselor: steps.counselorResponder.model,
                end_detection: steps.endDetector.model
            })
        };

        let state = replaceOpenSession(
            base,
            {
                ...open,
                dialogue: updatedDialogue,
                phaseHistory: [...open.phaseHistory, phase],
                turnAnalyses: [...open.turnAnalyses, entry]
            },
            this.now()
        );

        let boundary: SessionBoundaryResult | undefined;
        if (ended) {
            const advanced = await this.sessions.closeAndAdvanceSession(state, signal);
            state = advanced.state;
            boundary = advanced.boundary;
        }

        return {
            state,
            boundary,
            analysis: {
                emotionLabel: reaction.emotionLabel,
                emotionIntensity: reaction.emotionIntensity,
                resistance,
                phase,
                retrievedMemory: memory,
                strategy,
                strategyText,
                counselorResponse,
                sessionEnded: ended,
                memoryDegraded,
                endDetectionFailed: failed
            }
        };
    }

    // Memory is advisory: any failure other than an abort degrades to ''
    private async retrieveMemory(base: CounselingState, utterance: string, signal: AbortSignal): Promise<{ memory: string; memoryDegraded: boolean }> {
        const closedSessions = getClosedSessions(base.allSessions).filter(session => session.dialogue.length > 0);
        if (closedSessions.length === 0) {
            return { memory: '', memoryDegraded: false };
        }

        try {
            const memory = await this.steps.memoryRetriever.retrieve({ utterance, closedSessions }, { signal });
            throwIfAborted(signal);
            return { memory, memoryDegraded: false };
        } catch (error) {
            throwIfAborted(signal);
            log.warn('Memory retrieval failed, continuing without memory', { recordId: base.recordId, ...errorMeta(error) });
            return { memory: '', memoryDegraded: true };
        }
    }

    private async detectEnd(dialogue: readonly DialogueTurn[], signal: AbortSignal): Promise<{ ended: boolean; failed: boolean }> {
        const attempts = 1 + Math.max(0, this.settings.endDetectionRetries);

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                const ended = await this.steps.endDetector.detect({ dialogue }, { signal });
                throwIfAborted(signal);
                return { ended, failed: false };
            } catch (error) {
                throwIfAborted(signal);
                log.warn(`End detection attempt ${attempt}/${attempts} failed`, errorMeta(error));
            }
        }

        log.warn('End detection unavailable, assuming the session continues');
        return { ended: false, failed: true };
    }

    private async persist(state: CounselingState): Promise<PersistOutcome> {
        try {
            await this.store.save(state);
            return { persisted: true };
        } catch (error) {
            const persistenceError = new PersistenceFailure(state.recordId, error);
            log.error('Failed to persist counseling record', { recordId: state.recordId, ...errorMeta(error) });
            return { persisted: false, persistenceError };
        }
    }
}
