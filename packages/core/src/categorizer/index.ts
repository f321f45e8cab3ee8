/**
 * Categorizer module: keyword-based transaction categorization.
 */

export { classify, classifyDetailed } from './classify.js';
export { validateKeywordFragment, findDuplicateKeywords, MIN_FRAGMENT_LENGTH } from './validate.js';
export { matchesKeyword, findKeyword } from './match.js';
export type { Classification, KeywordGroup } from './types.js';
