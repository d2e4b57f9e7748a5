import logger from './logger';
import { describeError } from './errors';
import { MAX_BACKOFF_MS } from './constants';

/** Milliseconds to wait after the given failed attempt (1-based). */
export type Backoff = (attempt: number) => number;
export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export function exponentialBackoff(baseMs: number, maxMs: number = MAX_BACKOFF_MS): Backoff {
    return (attempt) => Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

export interface RetryOptions {
    /** Retries after the first attempt. */
    retries: number;
    backoff: Backoff;
    shouldRetry?: (error: unknown) => boolean;
    sleep?: Sleeper;
}

export class RetryExhaustedError extends Error {
    constructor(readonly attempts: number, readonly lastError: unknown) {
        super(describeError(lastError), { cause: lastError });
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Runs `operation` until it resolves or the retry budget is spent.
 * Errors rejected by `shouldRetry` are rethrown untouched; exhausting the
 * budget throws a `RetryExhaustedError` carrying the attempt count.
 */
export async function retryOperation<T>(
    operation: (attempt: number) => Promise<T>,
    name: string,
    options: RetryOptions
): Promise<T> {
    const wait = options.sleep ?? sleep;
    const maxAttempts = Math.max(1, options.retries + 1);

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (options.shouldRetry && !options.shouldRetry(error)) throw error;
            if (attempt >= maxAttempts) throw new RetryExhaustedError(attempt, error);

            const delay = options.backoff(attempt);
            logger.warn(`Failed to ${name}, retrying in ${delay / 1000}s... (${attempt}/${maxAttempts}): ${describeError(error)}`);
            await wait(delay);
        }
    }
}
