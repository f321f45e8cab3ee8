/**
 * Keyword fragment matching.
 *
 * ARCHITECTURAL NOTE: No console.* calls.
 */

import { normalizeDescription } from '../utils/normalize.js';

/**
 * Substring match of a fragment against an already normalized description.
 * The fragment is normalized the same way before comparison.
 *
 * @param normalizedDesc - Output of normalizeDescription
 * @param fragment - Keyword fragment from the table
 */
export function matchesKeyword(normalizedDesc: string, fragment: string): boolean {
    const normalizedFragment = normalizeDescription(fragment);
    if (!normalizedFragment) return false;
    return normalizedDesc.includes(normalizedFragment);
}

/**
 * First fragment (in list order) found in the description, or null.
 */
export function findKeyword(normalizedDesc: string, fragments: readonly string[]): string | null {
    for (const fragment of fragments) {
        if (matchesKeyword(normalizedDesc, fragment)) {
            return fragment;
        }
    }
    return null;
}
