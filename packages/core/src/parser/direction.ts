/**
 * Direction inference: income vs expense.
 *
 * ARCHITECTURAL NOTE: No console.* calls.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { findKeyword } from '../categorizer/match.js';
import type { Direction, KeywordTable } from '../types/index.js';

/**
 * Income when any income fragment (gaji, bonus, transfer, ...) occurs in the
 * description, expense otherwise. Never unresolved.
 */
export function detectDirection(description: string, table: KeywordTable): Direction {
    return findKeyword(normalizeDescription(description), table.income) === null
        ? 'expense'
        : 'income';
}
