import { ModelFailure } from '../models/errors';

export const TURN_STEP = 'turn';

/** The failure a bounded operation reports once its signal has fired. */
export const abortFailure = (signal: AbortSignal): ModelFailure => {
    const reason: unknown = signal.reason;
    if (reason instanceof ModelFailure) {
        return reason;
    }
    return new ModelFailure('Operation was aborted', TURN_STEP, 'aborted', reason);
};

export const throwIfAborted = (signal?: AbortSignal): void => {
    if (signal?.aborted) {
        throw abortFailure(signal);
    }
};

/**
 * Settle with `work`, or reject as soon as `signal` fires. Work that keeps
 * running after an abort is left to finish on a detached copy of the state.
 */
export const raceAbort = <T>(work: Promise<T>, signal: AbortSignal): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(abortFailure(signal));
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }

        work.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            error => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
};

export interface BoundOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Run `task` under a deadline and an optional caller signal. The task gets a
 * signal that fires on either; the result rejects with ModelFailure
 * ('timeout' or 'aborted') when it does.
 */
export const runBounded = async <T>(task: (signal: AbortSignal) => Promise<T>, options: BoundOptions): Promise<T> => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
        controller.abort(new ModelFailure(`Turn exceeded ${options.timeoutMs}ms`, TURN_STEP, 'timeout'));
    }, options.timeoutMs);

    const callerSignal = options.signal;
    const onCallerAbort = (): void => {
        controller.abort(new ModelFailure('Turn was cancelled by the caller', TURN_STEP, 'aborted', callerSignal?.reason));
    };
    if (callerSignal?.aborted) {
        onCallerAbort();
    } else {
        callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
        throwIfAborted(controller.signal);
        return await raceAbort(task(controller.signal), controller.signal);
    } finally {
        clearTimeout(timer);
        callerSignal?.removeEventListener('abort', onCallerAbort);
    }
};

/**
 * Runs tasks one at a time in submission order. A failed task does not stop
 * the ones queued behind it.
 */
export class TaskQueue {
    private tail: Promise<void> = Promise.resolve();

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
