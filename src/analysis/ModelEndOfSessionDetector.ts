import { parseBooleanAnswer } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { formatDialogue } from '../models/utils';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { EndDetectionInput, EndOfSessionDetector } from './types';

export class ModelEndOfSessionDetector extends ModelBackedStep implements EndOfSessionDetector {
    constructor(dependencies: ModelStepDependencies) {
        super('end_detection', dependencies);
    }

    async detect(input: EndDetectionInput, options?: StepOptions): Promise<boolean> {
        const patientTurns = input.dialogue.filter(turn => turn.role === 'patient');
        const lastPatientTurn = patientTurns[patientTurns.length - 1];

        const output = await this.complete(
            {
                patient_input: lastPatientTurn?.content ?? '',
                session_memory: formatDialogue(input.dialogue, this.labels)
            },
            options
        );

        const ended = parseBooleanAnswer(output, 'last-occurrence');
        if (ended === undefined) {
            throw new InvalidClassification(this.role, output, 'expected true or false');
        }
        return ended;
    }
}
