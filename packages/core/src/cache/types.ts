/**
 * Types for the read-through cache.
 */

/**
 * Sink for failures the cache absorbs. Core never logs on its own.
 */
export interface CacheLogger {
    warn(message: string): void;
}

export interface CacheOptions {
    /** Entry lifetime; an entry older than this is stale. Default 60s. */
    ttlMs?: number;
    /** Clock in epoch milliseconds. Default Date.now. */
    now?: () => number;
    /** Loader calls taking longer than this count as failures. */
    loadTimeoutMs?: number;
    logger?: CacheLogger;
}

export type CacheEntryState = 'empty' | 'loading' | 'fresh' | 'stale';

/**
 * Counters since construction.
 */
export interface CacheStats {
    /** Served from a fresh entry */
    hits: number;
    /** Loader calls started */
    loads: number;
    /** Callers that joined an in-flight load */
    coalesced: number;
    /** Failed loads answered with the previous value */
    fallbacks: number;
    /** Failed loads, absorbed or not */
    failures: number;
}
