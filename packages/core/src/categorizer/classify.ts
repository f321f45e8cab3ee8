/**
 * Keyword-based expense categorization.
 *
 * Categories are tried in EXPENSE_CATEGORY_PRIORITY order
 * (Makan, Transport, Belanja, Tagihan, Hiburan, Kesehatan) and the first
 * category with any fragment in the description wins. "beli kopi" is Makan,
 * not Belanja, even though "beli" comes first in the text.
 * No match falls back to Lainnya.
 *
 * ARCHITECTURAL NOTE: No console.* calls.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { findKeyword } from './match.js';
import { EXPENSE_CATEGORY_PRIORITY, FALLBACK_CATEGORY } from '../types/index.js';
import type { Category, KeywordTable } from '../types/index.js';
import type { Classification } from './types.js';

/**
 * Classify a description into one of the closed categories.
 *
 * @param description - Text to classify (amount already removed)
 * @param table - Keyword table
 */
export function classify(description: string, table: KeywordTable): Category {
    return classifyDetailed(description, table).category;
}

/**
 * Like classify, but also reports which fragment decided the category.
 */
export function classifyDetailed(description: string, table: KeywordTable): Classification {
    const desc = normalizeDescription(description);

    for (const category of EXPENSE_CATEGORY_PRIORITY) {
        const keyword = findKeyword(desc, table.categories[category]);
        if (keyword !== null) {
            return { category, keyword };
        }
    }

    return { category: FALLBACK_CATEGORY, keyword: null };
}
