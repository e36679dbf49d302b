// Error taxonomy for the counseling orchestrator

export type CounselingErrorKind =
    | 'uninitialized_state'
    | 'invalid_input'
    | 'model_failure'
    | 'invalid_classification'
    | 'persistence_failure'
    | 'configuration'
    | 'service_error'
    | 'record_validation'
    | 'record_not_found';

export abstract class CounselingError extends Error {
    abstract readonly kind: CounselingErrorKind;
    abstract readonly retryable: boolean;

    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = new.target.name;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

export class UninitializedStateError extends CounselingError {
    readonly kind = 'uninitialized_state';
    readonly retryable = false;

    constructor(operation: string) {
        super(`Counseling state is not initialized. Call initialize() or load() before ${operation}().`);
    }
}

export class InvalidInputError extends CounselingError {
    readonly kind = 'invalid_input';
    readonly retryable = false;
}

/**
 * Raised by the model invoker when a completion request fails. Steps wrap it
 * into a ModelFailure so callers see one retryable kind per step.
 */
export class ServiceError extends CounselingError {
    readonly kind = 'service_error';
    readonly retryable = true;

    constructor(
        message: string,
        public readonly role: string,
        public readonly status?: number,
        public readonly timedOut: boolean = false,
        cause?: unknown
    ) {
        super(message, cause);
    }
}

export type ModelFailureReason = 'service' | 'empty_output' | 'invalid_output' | 'timeout' | 'aborted';

export class ModelFailure extends CounselingError {
    readonly kind: 'model_failure' | 'invalid_classification' = 'model_failure';
    readonly retryable = true;

    constructor(
        message: string,
        public readonly step: string,
        public readonly reason: ModelFailureReason = 'service',
        cause?: unknown
    ) {
        super(message, cause);
    }
}

/**
 * Model output that cannot be mapped into the step's label domain. Treated
 * exactly like a ModelFailure by the orchestrator.
 */
export class InvalidClassification extends ModelFailure {
    override readonly kind = 'invalid_classification';

    constructor(step: string, public readonly rawOutput: string, detail: string) {
        super(`${step} returned output outside its label domain: ${detail}`, step, 'invalid_output');
    }
}

export class PersistenceFailure extends CounselingError {
    readonly kind = 'persistence_failure';
    readonly retryable = true;

    constructor(public readonly recordId: string, cause?: unknown) {
        const detail = cause instanceof Error ? `: ${cause.message}` : '';
        super(`Failed to persist counseling record ${recordId}${detail}`, cause);
    }
}

export class ConfigurationError extends CounselingError {
    readonly kind = 'configuration';
    readonly retryable = false;
}

export class RecordValidationError extends CounselingError {
    readonly kind = 'record_validation';
    readonly retryable = false;
}

export class RecordNotFoundError extends CounselingError {
    readonly kind = 'record_not_found';
    readonly retryable = false;

    constructor(public readonly recordId: string) {
        super(`Counseling record not found: ${recordId}`);
    }
}

export const isCounselingError = (error: unknown): error is CounselingError => {
    return error instanceof CounselingError;
};
