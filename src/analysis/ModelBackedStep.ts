import { ModuleBinding, ModuleName } from '../config/ModelConfig';
import { ModelInvoker } from '../llm/ModelInvoker';
import { PromptVariables, renderPrompt } from '../llm/prompt';
import { ModelFailure, ServiceError } from '../models/errors';
import { DEFAULT_DIALOGUE_LABELS, DialogueLabels } from '../models/utils';
import { errorMeta, logger, Logger } from '../utils/logger';

export interface StepOptions {
    signal?: AbortSignal;
}

export interface ModelStepDependencies {
    invoker: ModelInvoker;
    binding: ModuleBinding;
    labels?: DialogueLabels;
}

/**
 * Shared plumbing for every model-backed analysis step: render the bound
 * template, call the invoker and turn transport errors into ModelFailure.
 */
export abstract class ModelBackedStep {
    protected readonly invoker: ModelInvoker;
    protected readonly binding: ModuleBinding;
    protected readonly labels: DialogueLabels;
    protected readonly log: Logger;

    constructor(protected readonly role: ModuleName, dependencies: ModelStepDependencies) {
        this.invoker = dependencies.invoker;
        this.binding = dependencies.binding;
        this.labels = dependencies.labels ?? DEFAULT_DIALOGUE_LABELS;
        this.log = logger.child(role);
    }

    get model(): string {
        return this.binding.model;
    }

    protected async complete(variables: PromptVariables, options: StepOptions = {}, appendWhenMissing?: string): Promise<string> {
        const prompt = renderPrompt(this.binding.template, variables, appendWhenMissing);

        let output: string;
        try {
            output = await this.invoker.invoke(this.role, prompt, { signal: options.signal });
        } catch (error) {
            throw this.toModelFailure(error, options.signal);
        }

        if (options.signal?.aborted) {
            throw new ModelFailure(`${this.role} was aborted`, this.role, 'aborted');
        }

        const trimmed = output.trim();
        if (!trimmed) {
            throw new ModelFailure(`${this.role} returned empty output`, this.role, 'empty_output');
        }
        return trimmed;
    }

    private toModelFailure(error: unknown, signal?: AbortSignal): ModelFailure {
        if (error instanceof ModelFailure) {
            return error;
        }
        if (signal?.aborted) {
            return new ModelFailure(`${this.role} was aborted`, this.role, 'aborted', error);
        }

        this.log.warn('Model call failed', errorMeta(error));
        if (error instanceof ServiceError) {
            return new ModelFailure(error.message, this.role, error.timedOut ? 'timeout' : 'service', error);
        }
        const message = error instanceof Error ? error.message : String(error);
        return new ModelFailure(`${this.role} failed: ${message}`, this.role, 'service', error);
    }
}
