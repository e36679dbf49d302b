import { parseBooleanAnswer } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { formatDialogue } from '../models/utils';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { ReactionInput, ResistanceDetector } from './types';

export class ModelResistanceDetector extends ModelBackedStep implements ResistanceDetector {
    constructor(dependencies: ModelStepDependencies) {
        super('resistance_detection', dependencies);
    }

    async detect(input: ReactionInput, options?: StepOptions): Promise<boolean> {
        const output = await this.complete(
            {
                patient_input: input.utterance,
                session_memory: formatDialogue(input.dialogue, this.labels)
            },
            options,
            'patient_input'
        );

        // Any whole-word "true" counts as resistance
        const resistance = parseBooleanAnswer(output, 'prefer-true');
        if (resistance === undefined) {
            throw new InvalidClassification(this.role, output, 'expected true or false');
        }
        return resistance;
    }
}
