import { parseJsonObject, readStringField } from '../llm/responseParsing';
import { ModelFailure } from '../models/errors';
import { formatDialogue } from '../models/utils';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { CounselorInput, CounselorResponder } from './types';

export class ModelCounselorResponder extends ModelBackedStep implements CounselorResponder {
    constructor(dependencies: ModelStepDependencies) {
        super('counselor', dependencies);
    }

    async respond(input: CounselorInput, options?: StepOptions): Promise<string> {
        const output = await this.complete(
            {
                patient_input: input.utterance,
                memory_result: input.memory,
                primary_emotion: input.emotionLabel,
                emotional_intensity: String(input.emotionIntensity),
                current_therapy: input.therapy,
                current_stage: input.phase,
                current_strategy: input.strategy,
                current_strategy_text: input.strategyText,
                session_memory: formatDialogue(input.dialogue, this.labels)
            },
            options,
            'patient_input'
        );

        // Either {"counselor_response": "..."} or the reply as plain text
        const parsed = parseJsonObject(output);
        const response = parsed ? readStringField(parsed, 'counselor_response', 'response') : output;
        if (!response) {
            throw new ModelFailure(`${this.role} returned no response text`, this.role, 'empty_output');
        }
        return response;
    }
}
