import { parseJsonObject, readStringField } from '../llm/responseParsing';
import { InvalidClassification } from '../models/errors';
import { formatDialogue } from '../models/utils';
import { matchLabel } from '../models/validation';
import { EMOTION_LABELS } from '../types/Labels';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { Reaction, ReactionClassifier, ReactionInput } from './types';

const NAMED_INTENSITIES: Record<string, number> = {
    low: 0.3,
    medium: 0.6,
    moderate: 0.6,
    high: 0.9
};

/**
 * Read an intensity given as a number, a numeric string or a named level.
 * Values outside [0, 1] are rejected rather than clamped.
 */
export const parseIntensity = (raw: unknown): number | undefined => {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) && raw >= 0 && raw <= 1 ? raw : undefined;
    }
    if (typeof raw !== 'string') {
        return undefined;
    }

    const text = raw.trim().toLowerCase();
    if (text in NAMED_INTENSITIES) {
        return NAMED_INTENSITIES[text];
    }
    if (!/^-?\d+(\.\d+)?$/.test(text)) {
        return undefined;
    }
    return parseIntensity(Number(text));
};

export class ModelReactionClassifier extends ModelBackedStep implements ReactionClassifier {
    constructor(dependencies: ModelStepDependencies) {
        super('reaction_classifier', dependencies);
    }

    async classify(input: ReactionInput, options?: StepOptions): Promise<Reaction> {
        const output = await this.complete(
            {
                patient_input: input.utterance,
                session_memory: formatDialogue(input.dialogue, this.labels)
            },
            options,
            'patient_input'
        );

        const parsed = parseJsonObject(output);
        if (!parsed) {
            throw new InvalidClassification(this.role, output, 'expected a JSON object');
        }

        const rawEmotion = readStringField(parsed, 'primary_emotion', 'emotion', 'emotion_label');
        const emotionLabel = rawEmotion ? matchLabel(EMOTION_LABELS, rawEmotion) : undefined;
        if (!emotionLabel) {
            throw new InvalidClassification(this.role, output, `unknown emotion "${rawEmotion ?? ''}"`);
        }

        const emotionIntensity = parseIntensity(parsed.emotional_intensity ?? parsed.intensity);
        if (emotionIntensity === undefined) {
            throw new InvalidClassification(this.role, output, 'emotional intensity must be within [0, 1]');
        }

        this.log.debug('Reaction classified', { emotionLabel, emotionIntensity });
        return { emotionLabel, emotionIntensity };
    }
}
