import { formatSessionHistory } from '../models/utils';
import { ModelBackedStep, ModelStepDependencies, StepOptions } from './ModelBackedStep';
import { MemoryInput, MemoryRetriever } from './types';

const NO_MEMORY = [/^none\.?$/i, /^no need to consider/i, /^n\/a$/i];

/** Cut to at most `maxChars` UTF-16 units without splitting a surrogate pair. */
export const truncateMemory = (text: string, maxChars: number): string => {
    if (text.length <= maxChars) {
        return text;
    }
    const lastKept = text.charCodeAt(maxChars - 1);
    const end = lastKept >= 0xd800 && lastKept <= 0xdbff ? maxChars - 1 : maxChars;
    return text.slice(0, end);
};

export interface MemoryRetrieverOptions extends ModelStepDependencies {
    maxChars: number;
}

export class ModelMemoryRetriever extends ModelBackedStep implements MemoryRetriever {
    private readonly maxChars: number;

    constructor(options: MemoryRetrieverOptions) {
        super('memory_retrieve', options);
        this.maxChars = options.maxChars;
    }

    async retrieve(input: MemoryInput, options?: StepOptions): Promise<string> {
        const history = formatSessionHistory(input.closedSessions.filter(session => session.isEnded), this.labels);
        if (!history) {
            return '';
        }

        const output = await this.complete(
            {
                patient_input: input.utterance,
                all_dialogs: history
            },
            options,
            'patient_input'
        );

        if (NO_MEMORY.some(pattern => pattern.test(output))) {
            return '';
        }
        return truncateMemory(output, this.maxChars);
    }
}
