import { parseJsonObject, readStringField } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { formatDialogue, formatSessionHistory } from '../models/utils';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { FirstTherapySelector, TherapyDecision, TherapyInput, TherapySelector } from './types';

const readDecision = (role: string, output: string): TherapyDecision => {
    const parsed = parseJsonObject(output);
    if (!parsed) {
        throw new InvalidClassification(role, output, 'expected a JSON object');
    }

    const therapy = readStringField(parsed, 'new_therapy', 'therapy');
    if (!therapy) {
        throw new InvalidClassification(role, output, '"new_therapy" is empty');
    }
    return { therapy, reason: readStringField(parsed, 'reason') ?? '' };
};

/**
 * Chooses the plan for the next session from the session that just closed
 * and the full history.
 */
export class ModelTherapySelector extends ModelBackedStep implements TherapySelector {
    constructor(dependencies: ModelStepDependencies) {
        super('therapy_selection', dependencies);
    }

    async select(input: TherapyInput, options?: StepOptions): Promise<TherapyDecision> {
        const output = await this.complete(
            {
                last_dialogs: formatDialogue(input.closedSession.dialogue, this.labels),
                last_therapy: input.currentTherapy,
                all_dialogs: formatSessionHistory(input.allSessions, this.labels)
            },
            options
        );

        const decision = readDecision(this.role, output);
        this.log.debug('Therapy selected', { therapy: decision.therapy, previous: input.currentTherapy });
        return decision;
    }
}

/** Picks the opening plan from an intake or medical record. */
export class ModelFirstTherapySelector extends ModelBackedStep implements FirstTherapySelector {
    constructor(dependencies: ModelStepDependencies) {
        super('first_therapy_selection', dependencies);
    }

    async select(input: { intakeRecord: string }, options?: StepOptions): Promise<TherapyDecision> {
        const output = await this.complete({ medical_record: input.intakeRecord }, options);
        return readDecision(this.role, output);
    }
}
