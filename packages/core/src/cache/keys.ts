import { ALL_TRANSACTIONS_KEY } from '../types/index.js';
import type { Period } from '../types/index.js';

/**
 * Cache key for a period-filtered read, or the all-transactions key.
 */
export function periodKey(period?: Period): string {
    if (!period) return ALL_TRANSACTIONS_KEY;
    return `period:${period.start}..${period.end}`;
}
