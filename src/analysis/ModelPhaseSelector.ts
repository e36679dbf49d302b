import { parseJsonObject, readStringField } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { formatDialogue } from '../models/utils';
import { matchLabel } from '../models/validation';
import { PHASE_LABELS, PhaseLabel } from '../types/Labels';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { PhaseInput, PhaseSelector } from './types';

/**
 * Find the phase a free-text answer names. Returns undefined unless exactly
 * one distinct phase appears as a whole word.
 */
export const findPhaseMention = (text: string): PhaseLabel | undefined => {
    const lower = text.toLowerCase();
    const mentioned = PHASE_LABELS.filter(phase => new RegExp(`\\b${phase}\\b`).test(lower));
    return mentioned.length === 1 ? mentioned[0] : undefined;
};

export class ModelPhaseSelector extends ModelBackedStep implements PhaseSelector {
    constructor(dependencies: ModelStepDependencies) {
        super('phase_selection', dependencies);
    }

    async select(input: PhaseInput, options?: StepOptions): Promise<PhaseLabel> {
        const output = await this.complete(
            {
                patient_input: input.utterance,
                current_therapy: input.therapy,
                session_memory: formatDialogue(input.dialogue, this.labels)
            },
            options,
            'patient_input'
        );

        const parsed = parseJsonObject(output);
        const raw = parsed ? readStringField(parsed, 'phase', 'current_stage', 'stage') : output;
        const phase = raw ? matchLabel(PHASE_LABELS, raw) ?? findPhaseMention(raw) : undefined;
        if (!phase) {
            throw new InvalidClassification(this.role, output, 'no single known phase named');
        }

        this.log.debug('Phase selected', { phase });
        return phase;
    }
}
