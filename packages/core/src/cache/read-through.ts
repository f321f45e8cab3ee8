/**
 * Read-through cache with per-key coalescing.
 *
 * Per key: empty -> loading -> fresh -> stale -> loading -> fresh ...
 *
 * - A fresh entry is served without calling the loader.
 * - Empty or stale: the loader runs once and every concurrent caller for
 *   that key waits on the same promise.
 * - invalidate() makes the key empty. A load that started before the
 *   invalidation still answers the callers already waiting on it but does
 *   not populate the entry, and later callers start a new load.
 * - A failed load answers with the previous value when there is one (the
 *   entry stays stale and the failure goes to the logger); otherwise it
 *   rejects with CacheMissError. Nothing is retried here.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures go to options.logger.
 */

import { CACHE_DEFAULTS } from '../types/index.js';
import { CacheMissError } from './errors.js';
import type { CacheEntryState, CacheLogger, CacheOptions, CacheStats } from './types.js';

interface Entry<V> {
    value: V;
    fetchedAt: number;
}

interface InFlight<V> {
    promise: Promise<V>;
    generation: number;
}

export class ReadThroughCache<V> {
    private readonly entries = new Map<string, Entry<V>>();
    private readonly inFlight = new Map<string, InFlight<V>>();
    private readonly keyGenerations = new Map<string, number>();
    private globalGeneration = 0;

    private readonly ttlMs: number;
    private readonly now: () => number;
    private readonly loadTimeoutMs: number | undefined;
    private readonly logger: CacheLogger | undefined;

    private readonly stats: CacheStats = {
        hits: 0,
        loads: 0,
        coalesced: 0,
        fallbacks: 0,
        failures: 0,
    };

    constructor(options: CacheOptions = {}) {
        this.ttlMs = options.ttlMs ?? CACHE_DEFAULTS.TTL_MS;
        this.now = options.now ?? Date.now;
        this.loadTimeoutMs = options.loadTimeoutMs;
        this.logger = options.logger;
    }

    /**
     * Value for key, loading it when the entry is empty or stale.
     *
     * @param key - Logical query signature, e.g. "all"
     * @param loader - Reads the backing store
     */
    get(key: string, loader: () => Promise<V>): Promise<V> {
        const entry = this.entries.get(key);
        if (entry && !this.isStale(entry)) {
            this.stats.hits++;
            return Promise.resolve(entry.value);
        }

        const pending = this.inFlight.get(key);
        if (pending && pending.generation === this.generationOf(key)) {
            this.stats.coalesced++;
            return pending.promise;
        }

        return this.load(key, loader);
    }

    /**
     * Force a key (or, without a key, every key) back to empty.
     * Writers call this after a successful write.
     */
    invalidate(key?: string): void {
        if (key === undefined) {
            this.entries.clear();
            this.globalGeneration++;
            return;
        }
        this.entries.delete(key);
        this.keyGenerations.set(key, (this.keyGenerations.get(key) ?? 0) + 1);
    }

    state(key: string): CacheEntryState {
        const pending = this.inFlight.get(key);
        if (pending && pending.generation === this.generationOf(key)) {
            return 'loading';
        }
        const entry = this.entries.get(key);
        if (!entry) return 'empty';
        return this.isStale(entry) ? 'stale' : 'fresh';
    }

    getStats(): CacheStats {
        return { ...this.stats };
    }

    private load(key: string, loader: () => Promise<V>): Promise<V> {
        const generation = this.generationOf(key);
        this.stats.loads++;

        const promise: Promise<V> = this.runLoader(loader)
            .then(
                (value) => {
                    if (generation === this.generationOf(key)) {
                        this.entries.set(key, { value, fetchedAt: this.now() });
                    }
                    return value;
                },
                (error: unknown) => this.recover(key, error)
            )
            .finally(() => {
                if (this.inFlight.get(key)?.promise === promise) {
                    this.inFlight.delete(key);
                }
            });

        this.inFlight.set(key, { promise, generation });
        return promise;
    }

    private recover(key: string, error: unknown): V {
        this.stats.failures++;
        const entry = this.entries.get(key);
        const reason = error instanceof Error ? error.message : String(error);

        if (!entry) {
            throw new CacheMissError(key, error);
        }

        this.stats.fallbacks++;
        const ageSeconds = Math.round((this.now() - entry.fetchedAt) / 1000);
        this.logger?.warn(
            `Refreshing "${key}" failed, serving value from ${ageSeconds}s ago: ${reason}`
        );
        return entry.value;
    }

    private runLoader(loader: () => Promise<V>): Promise<V> {
        const timeoutMs = this.loadTimeoutMs;
        const result = new Promise<V>((resolve) => resolve(loader()));
        if (timeoutMs === undefined) {
            return result;
        }

        return new Promise<V>((resolve, reject) => {
            const timer = setTimeout(() => {
                reject(new Error(`Load timed out after ${timeoutMs}ms`));
            }, timeoutMs);
            result.then(
                (value) => {
                    clearTimeout(timer);
                    resolve(value);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
    }

    private isStale(entry: Entry<V>): boolean {
        return this.now() - entry.fetchedAt > this.ttlMs;
    }

    private generationOf(key: string): number {
        return this.globalGeneration + (this.keyGenerations.get(key) ?? 0);
    }
}
