/**
 * Cache module: read-through cache in front of the rate-limited store.
 */

export { ReadThroughCache } from './read-through.js';
export { CacheMissError } from './errors.js';
export { periodKey } from './keys.js';
export type { CacheLogger, CacheOptions, CacheEntryState, CacheStats } from './types.js';
