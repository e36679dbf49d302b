import { parseJsonObject } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { formatDialogue } from '../models/utils';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { SessionEvaluator, SessionScores } from './types';
import { SessionRecord } from '../types/SessionRecord';

const readScore = (value: unknown): number | undefined => {
    const score = typeof value === 'string' ? Number(value.trim()) : value;
    return typeof score === 'number' && Number.isInteger(score) && score >= 0 && score <= 3 ? score : undefined;
};

export class ModelSessionEvaluator extends ModelBackedStep implements SessionEvaluator {
    constructor(dependencies: ModelStepDependencies) {
        super('post_session_evaluation', dependencies);
    }

    async evaluate(input: { session: SessionRecord }, options?: StepOptions): Promise<SessionScores> {
        const output = await this.complete(
            {
                session_name: `Session ${input.session.index}`,
                session_dialogs: formatDialogue(input.session.dialogue, this.labels)
            },
            options
        );

        const parsed = parseJsonObject(output);
        if (!parsed) {
            throw new InvalidClassification(this.role, output, 'expected a JSON object');
        }

        const therapeuticAlliance = readScore(parsed['Therapeutic Alliance Assessment']);
        const interaction = readScore(parsed['Interaction Assessment']);
        if (therapeuticAlliance === undefined || interaction === undefined) {
            throw new InvalidClassification(this.role, output, 'scores must be integers from 0 to 3');
        }
        return { therapeuticAlliance, interaction };
    }
}
