/**
 * Keyword fragment validation.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { EXPENSE_CATEGORY_PRIORITY } from '../types/index.js';
import type { KeywordTable, KeywordValidationResult } from '../types/index.js';
import type { KeywordGroup } from './types.js';

export const MIN_FRAGMENT_LENGTH = 2;

/**
 * Validate a fragment before adding it to a keyword group.
 *
 * - Empty or shorter than MIN_FRAGMENT_LENGTH = rejected
 * - Already present in the group = rejected
 * - Overlaps (substring either way) a fragment of another group = warning,
 *   since priority order will decide between them
 *
 * @param fragment - Candidate fragment
 * @param group - "income" or an expense category
 * @param table - Current keyword table
 */
export function validateKeywordFragment(
    fragment: string,
    group: KeywordGroup,
    table: KeywordTable
): KeywordValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const normalized = normalizeDescription(fragment);

    if (!normalized) {
        errors.push('Keyword cannot be empty');
        return { valid: false, errors, warnings };
    }

    if (normalized.length < MIN_FRAGMENT_LENGTH) {
        errors.push(
            `Keyword must be at least ${MIN_FRAGMENT_LENGTH} characters (got ${normalized.length})`
        );
        return { valid: false, errors, warnings };
    }

    if (groupFragments(table, group).some((f) => normalizeDescription(f) === normalized)) {
        errors.push(`Keyword "${normalized}" already exists in ${group}`);
        return { valid: false, errors, warnings };
    }

    for (const other of keywordGroups()) {
        if (other === group) continue;
        for (const existing of groupFragments(table, other)) {
            const normalizedExisting = normalizeDescription(existing);
            if (normalized.includes(normalizedExisting) || normalizedExisting.includes(normalized)) {
                warnings.push(`Keyword "${normalized}" overlaps "${normalizedExisting}" (${other})`);
            }
        }
    }

    return { valid: true, errors, warnings };
}

/**
 * List fragments that appear in more than one group of a table.
 * Such fragments are decided by priority order alone.
 */
export function findDuplicateKeywords(table: KeywordTable): string[] {
    const seen = new Map<string, KeywordGroup>();
    const warnings: string[] = [];

    for (const group of keywordGroups()) {
        for (const fragment of groupFragments(table, group)) {
            const normalized = normalizeDescription(fragment);
            const owner = seen.get(normalized);
            if (owner === undefined) {
                seen.set(normalized, group);
            } else if (owner !== group) {
                warnings.push(`Keyword "${normalized}" is listed under both ${owner} and ${group}`);
            }
        }
    }

    return warnings;
}

function keywordGroups(): KeywordGroup[] {
    return ['income', ...EXPENSE_CATEGORY_PRIORITY];
}

function groupFragments(table: KeywordTable, group: KeywordGroup): string[] {
    return group === 'income' ? table.income : table.categories[group];
}
