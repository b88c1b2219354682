/**
 * Retry with exponential backoff.
 * Shared by per-node retry policies and the language-model collaborator.
 */

export interface RetryOptions {
    /** Total attempts including the first (default: 3) */
    attempts?: number;
    /** Delay before the second attempt in ms (default: 1000) */
    delayMs?: number;
    /** Multiplier applied to the delay after every failed attempt (default: 2) */
    factor?: number;
    /** Return false to stop retrying and rethrow immediately */
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    /** Called before sleeping for the next attempt */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    /** Stops waiting between attempts when aborted */
    signal?: AbortSignal;
}

/**
 * Delay for the given attempt (1-based): delayMs * factor^(attempt - 1).
 */
export function backoffDelay(attempt: number, delayMs: number, factor: number): number {
    return delayMs * Math.pow(factor, attempt - 1);
}

/**
 * Sleep that resolves early (without throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
        return Promise.resolve();
    }

    return new Promise<void>(resolve => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Run `fn` until it resolves or the attempt budget is spent.
 * The last error is rethrown.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const { attempts = 3, delayMs = 1000, factor = 2, shouldRetry, onRetry, signal } = options;
    const maxAttempts = Math.max(1, attempts);

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;

            if (attempt >= maxAttempts || signal?.aborted) {
                break;
            }
            if (shouldRetry && !shouldRetry(error, attempt)) {
                break;
            }

            const delay = backoffDelay(attempt, delayMs, factor);
            onRetry?.(error, attempt, delay);
            await sleep(delay, signal);
        }
    }

    throw lastError;
}
