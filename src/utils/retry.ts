// src/utils/retry.ts

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Operation timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export class CancelledError extends Error {
    constructor(message = 'Operation was cancelled by the caller') {
        super(message);
        this.name = 'CancelledError';
    }
}

export type RetryOptions = {
    /** Total attempts, first call included. */
    attempts?: number;
    baseDelayMs?: number;
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

export async function executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    opts: RetryOptions = {},
): Promise<T> {
    const attempts = Math.max(1, opts.attempts ?? 2);
    const baseDelay = opts.baseDelayMs ?? 250;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            lastError = error;
            if (attempt === attempts) break;
            if (opts.shouldRetry && !opts.shouldRetry(error, attempt)) break;
            const backoff = baseDelay * Math.pow(2, attempt - 1);
            opts.onRetry?.(error, attempt, backoff);
            await sleep(backoff);
        }
    }

    throw lastError;
}

/**
 * Runs an operation with its own AbortSignal and settles after at most
 * `timeoutMs`. An operation that ignores the signal is abandoned: whatever it
 * settles with later is discarded. An abort of `parentSignal` rejects with
 * CancelledError.
 */
export function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    parentSignal?: AbortSignal,
): Promise<T> {
    if (parentSignal?.aborted) {
        return Promise.reject(new CancelledError());
    }

    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        const onParentAbort = () => {
            cleanup();
            controller.abort();
            reject(new CancelledError());
        };
        const timer = setTimeout(() => {
            cleanup();
            controller.abort();
            reject(new TimeoutError(timeoutMs));
        }, timeoutMs);
        const cleanup = () => {
            clearTimeout(timer);
            parentSignal?.removeEventListener('abort', onParentAbort);
        };

        parentSignal?.addEventListener('abort', onParentAbort, { once: true });

        let pending: Promise<T>;
        try {
            pending = operation(controller.signal);
        } catch (error) {
            cleanup();
            reject(error);
            return;
        }
        pending.then(
            (value) => {
                cleanup();
                resolve(value);
            },
            (error: unknown) => {
                cleanup();
                reject(error);
            },
        );
    });
}
