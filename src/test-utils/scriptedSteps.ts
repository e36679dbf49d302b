import { CounselingSteps, StepOptions } from '../analysis';
import {
    CounselorInput,
    EndDetectionInput,
    MemoryInput,
    PhaseInput,
    Reaction,
    ReactionInput,
    SessionScores,
    Strategy,
    StrategyInput,
    TherapyDecision,
    TherapyInput
} from '../analysis/types';
import { InvokeOptions, ModelInvoker } from '../llm/ModelInvoker';
import { ModuleBinding } from '../config/ModelConfig';
import { PhaseLabel } from '../types/Labels';
import { SessionRecord } from '../types/SessionRecord';

export const DEFAULT_REPLY = 'What feels most pressing for you right now?';
export const NEXT_THERAPY = 'Acceptance and Commitment Therapy (ACT)';

/** Step doubles with sensible defaults; tests override single calls. */
export const createStepMocks = () => {
    const mocks = {
        classify: jest.fn<Promise<Reaction>, [ReactionInput, StepOptions?]>(async () => ({ emotionLabel: 'anxiety', emotionIntensity: 0.6 })),
        detectResistance: jest.fn<Promise<boolean>, [ReactionInput, StepOptions?]>(async () => false),
        retrieve: jest.fn<Promise<string>, [MemoryInput, StepOptions?]>(async () => ''),
        selectPhase: jest.fn<Promise<PhaseLabel>, [PhaseInput, StepOptions?]>(async () => 'exploration'),
        selectStrategy: jest.fn<Promise<Strategy>, [StrategyInput, StepOptions?]>(async () => ({ strategy: 'Question', strategyText: 'Ask an open question' })),
        respond: jest.fn<Promise<string>, [CounselorInput, StepOptions?]>(async () => DEFAULT_REPLY),
        detectEnd: jest.fn<Promise<boolean>, [EndDetectionInput, StepOptions?]>(async () => false),
        selectTherapy: jest.fn<Promise<TherapyDecision>, [TherapyInput, StepOptions?]>(async () => ({ therapy: NEXT_THERAPY, reason: 'Avoidance dominated the session' })),
        selectFirstTherapy: jest.fn<Promise<TherapyDecision>, [{ intakeRecord: string }, StepOptions?]>(async () => ({ therapy: 'Dialectical Behavior Therapy (DBT)', reason: 'Intake notes' })),
        evaluate: jest.fn<Promise<SessionScores>, [{ session: SessionRecord }, StepOptions?]>(async () => ({ therapeuticAlliance: 2, interaction: 3 }))
    };

    const steps: CounselingSteps = {
        reactionClassifier: { model: 'reaction-model', classify: mocks.classify },
        resistanceDetector: { model: 'resistance-model', detect: mocks.detectResistance },
        memoryRetriever: { model: 'memory-model', retrieve: mocks.retrieve },
        phaseSelector: { model: 'phase-model', select: mocks.selectPhase },
        strategySelector: { model: 'strategy-model', select: mocks.selectStrategy },
        counselorResponder: { model: 'counselor-model', respond: mocks.respond },
        endDetector: { model: 'end-model', detect: mocks.detectEnd },
        therapySelector: { model: 'therapy-model', select: mocks.selectTherapy }
    };

    return { mocks, steps };
};

/** Model invoker that answers from a script and records every prompt. */
export class ScriptedInvoker implements ModelInvoker {
    readonly calls: Array<{ role: string; prompt: string; options?: InvokeOptions }> = [];
    private readonly replies: Array<string | Error>;

    constructor(...replies: Array<string | Error>) {
        this.replies = replies;
    }

    async invoke(role: string, renderedPrompt: string, options?: InvokeOptions): Promise<string> {
        this.calls.push({ role, prompt: renderedPrompt, options });
        const reply = this.replies.shift();
        if (reply === undefined) {
            throw new Error(`No scripted reply left for ${role}`);
        }
        if (reply instanceof Error) {
            throw reply;
        }
        return reply;
    }
}

export const binding = (template: string, model: string = 'test-model'): ModuleBinding => ({
    model,
    promptPath: '/prompts/test.txt',
    template
});
