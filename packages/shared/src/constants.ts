/**
 * Constants for Dompet.
 */

/**
 * Expense categories in classification priority order.
 * When a description carries keywords of two categories, the one listed
 * first wins, regardless of where the keywords occur in the text.
 */
export const EXPENSE_CATEGORY_PRIORITY = [
    'Makan',
    'Transport',
    'Belanja',
    'Tagihan',
    'Hiburan',
    'Kesehatan',
] as const;

/**
 * Category given to every income transaction.
 */
export const INCOME_CATEGORY = 'Pemasukan';

/**
 * Category for expenses no keyword matched.
 */
export const FALLBACK_CATEGORY = 'Lainnya';

/**
 * The closed category set.
 */
export const CATEGORIES = [...EXPENSE_CATEGORY_PRIORITY, INCOME_CATEGORY, FALLBACK_CATEGORY] as const;

/**
 * Shorthand multiplier suffixes, matched case-insensitively.
 */
export const MULTIPLIER_TOKENS = ['k', 'rb', 'ribu', 'ceban', 'jt', 'juta'] as const;

/**
 * Factor per multiplier suffix. "ceban" is the colloquial ten-thousand.
 */
export const MULTIPLIERS: Record<(typeof MULTIPLIER_TOKENS)[number], number> = {
    k: 1_000,
    rb: 1_000,
    ribu: 1_000,
    ceban: 10_000,
    jt: 1_000_000,
    juta: 1_000_000,
};

/**
 * Bare numeral policy (no multiplier suffix).
 * Fewer digits than MIN_BARE_DIGITS is too ambiguous to be money;
 * more than MAX_BARE_DIGITS looks like a phone or account number.
 */
export const AMOUNT_POLICY = {
    MIN_BARE_DIGITS: 3,
    MAX_BARE_DIGITS: 9,
} as const;

/**
 * Read-through cache defaults.
 * The spreadsheet API allows roughly 100 requests per 100 seconds.
 */
export const CACHE_DEFAULTS = {
    TTL_MS: 60_000,
} as const;

/**
 * Cache key for the unfiltered transaction list.
 */
export const ALL_TRANSACTIONS_KEY = 'all';

/**
 * Transaction ID configuration.
 */
export const TXN_ID = {
    LENGTH: 16,
} as const;

/**
 * Spreadsheet store defaults.
 */
export const STORE_DEFAULTS = {
    LEDGER_FILE: 'ledger.xlsx',
    TIMEOUT_MS: 10_000,
    RETRY_ATTEMPTS: 3,
    RETRY_DELAY_MS: 2_000,
} as const;

/**
 * Western Indonesian Time (UTC+7).
 */
export const DEFAULT_UTC_OFFSET_MINUTES = 420;

/**
 * User-facing parse failure messages.
 */
export const PARSE_ERROR_MESSAGES = {
    no_amount: 'could not find an amount',
    empty_description: 'missing description',
} as const;
