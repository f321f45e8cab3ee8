/**
 * Raised when a load fails and there is no previous value to fall back on.
 * The loader's error is kept as `cause`.
 */
export class CacheMissError extends Error {
    readonly key: string;

    constructor(key: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to load "${key}" and no cached value exists: ${reason}`, { cause });
        this.name = 'CacheMissError';
        this.key = key;
    }
}
