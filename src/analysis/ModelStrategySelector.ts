import { parseJsonObject, readStringField } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { matchLabel } from '../models/validation';
import { STRATEGY_LABELS } from '../types/Labels';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { Strategy, StrategyInput, StrategySelector } from './types';

export class ModelStrategySelector extends ModelBackedStep implements StrategySelector {
    constructor(dependencies: ModelStepDependencies) {
        super('strategy_selection', dependencies);
    }

    async select(input: StrategyInput, options?: StepOptions): Promise<Strategy> {
        const output = await this.complete(
            {
                patient_input: input.utterance,
                primary_emotion: input.emotionLabel,
                emotional_intensity: String(input.emotionIntensity),
                is_rejecting: input.resistance ? 'Yes' : 'No',
                current_stage: input.phase,
                current_therapy: input.therapy,
                session_strategy_memory: input.usedStrategies.join(', ')
            },
            options,
            'patient_input'
        );

        const parsed = parseJsonObject(output);
        if (!parsed) {
            throw new InvalidClassification(this.role, output, 'expected a JSON object');
        }

        const rawStrategy = readStringField(parsed, 'strategy');
        const strategy = rawStrategy ? matchLabel(STRATEGY_LABELS, rawStrategy) : undefined;
        if (!strategy) {
            throw new InvalidClassification(this.role, output, `unknown strategy "${rawStrategy ?? ''}"`);
        }

        const strategyText = readStringField(parsed, 'strategy_text', 'explanation') ?? '';
        this.log.debug('Strategy selected', { strategy, resistance: input.resistance });
        return { strategy, strategyText };
    }
}
