import { ModelConfig } from '../config/ModelConfig';
import { ModelInvoker } from '../llm/ModelInvoker';
import { ModelCounselorResponder } from './ModelCounselorResponder';
import { ModelEndOfSessionDetector } from './ModelEndOfSessionDetector';
import { ModelMemoryRetriever } from './ModelMemoryRetriever';
import { ModelPhaseSelector } from './ModelPhaseSelector';
import { ModelReactionClassifier } from './ModelReactionClassifier';
import { ModelResistanceDetector } from './ModelResistanceDetector';
import { ModelSessionEvaluator } from './ModelSessionEvaluator';
import { ModelStrategySelector } from './ModelStrategySelector';
import { ModelFirstTherapySelector, ModelTherapySelector } from './ModelTherapySelector';
import {
    CounselorResponder,
    EndOfSessionDetector,
    FirstTherapySelector,
    MemoryRetriever,
    PhaseSelector,
    ReactionClassifier,
    ResistanceDetector,
    SessionEvaluator,
    StrategySelector,
    TherapySelector
} from './types';

export interface CounselingSteps {
    reactionClassifier: ReactionClassifier;
    resistanceDetector: ResistanceDetector;
    memoryRetriever: MemoryRetriever;
    phaseSelector: PhaseSelector;
    strategySelector: StrategySelector;
    counselorResponder: CounselorResponder;
    endDetector: EndOfSessionDetector;
    therapySelector: TherapySelector;
    firstTherapySelector?: FirstTherapySelector;
    sessionEvaluator?: SessionEvaluator;
}

/** Bind one model-backed step per configured module. */
export const createModelSteps = (invoker: ModelInvoker, config: ModelConfig, memoryMaxChars: number): CounselingSteps => {
    const { bindings, dialogueLabels: labels } = config;
    const firstTherapy = bindings.first_therapy_selection;
    const evaluation = bindings.post_session_evaluation;

    return {
        reactionClassifier: new ModelReactionClassifier({ invoker, labels, binding: bindings.reaction_classifier }),
        resistanceDetector: new ModelResistanceDetector({ invoker, labels, binding: bindings.resistance_detection }),
        memoryRetriever: new ModelMemoryRetriever({ invoker, labels, binding: bindings.memory_retrieve, maxChars: memoryMaxChars }),
        phaseSelector: new ModelPhaseSelector({ invoker, labels, binding: bindings.phase_selection }),
        strategySelector: new ModelStrategySelector({ invoker, labels, binding: bindings.strategy_selection }),
        counselorResponder: new ModelCounselorResponder({ invoker, labels, binding: bindings.counselor }),
        endDetector: new ModelEndOfSessionDetector({ invoker, labels, binding: bindings.end_detection }),
        therapySelector: new ModelTherapySelector({ invoker, labels, binding: bindings.therapy_selection }),
        ...(firstTherapy ? { firstTherapySelector: new ModelFirstTherapySelector({ invoker, labels, binding: firstTherapy }) } : {}),
        ...(evaluation ? { sessionEvaluator: new ModelSessionEvaluator({ invoker, labels, binding: evaluation }) } : {})
    };
};

export * from './types';
export { ModelBackedStep } from './ModelBackedStep';
export type { StepOptions, ModelStepDependencies } from './ModelBackedStep';
