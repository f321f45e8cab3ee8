/**
 * Retry wrapper with exponential backoff for store writes.
 */

export interface RetryOptions {
    /** Total attempts including the first (default: 3) */
    attempts?: number;
    /** Delay before the second attempt, doubled after each failure (default: 2000) */
    delayMs?: number;
    /** Called before each retry */
    onRetry?: (attempt: number, error: unknown) => void;
    sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS = {
    attempts: 3,
    delayMs: 2000,
};

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (1-based).
 */
export function computeDelay(attempt: number, delayMs: number): number {
    return delayMs * 2 ** (attempt - 1);
}

/**
 * Executes an async function, retrying on any error until the attempts run out.
 * The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const attempts = Math.max(1, options.attempts ?? DEFAULT_OPTIONS.attempts);
    const delayMs = options.delayMs ?? DEFAULT_OPTIONS.delayMs;
    const wait = options.sleep ?? sleep;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
            return await fn();
        } catch (err) {
            lastError = err;
            if (attempt === attempts) break;

            options.onRetry?.(attempt, err);
            await wait(computeDelay(attempt, delayMs));
        }
    }

    throw lastError;
}
