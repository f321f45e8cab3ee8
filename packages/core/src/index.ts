// Types (re-exported from shared)
export type {
    ExpenseCategory,
    Category,
    Direction,
    RawMessage,
    Transaction,
    MultiplierToken,
    AmountExpression,
    AmountPolicy,
    KeywordTable,
    KeywordValidationResult,
    ParseErrorKind,
    ParseError,
    MessageParseResult,
    Period,
    Totals,
    CategoryBreakdown,
    TrendPoint,
    MonthlyTotals,
} from './types/index.js';

export {
    TransactionSchema,
    KeywordTableSchema,
    EXPENSE_CATEGORY_PRIORITY,
    INCOME_CATEGORY,
    FALLBACK_CATEGORY,
    MULTIPLIERS,
    ALL_TRANSACTIONS_KEY,
    PARSE_ERROR_MESSAGES,
} from './types/index.js';

// Utils
export { normalizeDescription, generateTxnId } from './utils/index.js';
export {
    formatIsoDate,
    toLocalDate,
    toLocalTime,
    parseIsoDate,
    parseDmyDate,
    formatDmyDate,
    shiftIsoDate,
} from './utils/index.js';

// Parser
export { extractAmount, removeSpan, normalizeNumeral, DEFAULT_AMOUNT_POLICY } from './parser/index.js';
export { detectDirection, parseMessage } from './parser/index.js';
export type { ParseOptions } from './parser/index.js';

// Categorizer
export {
    classify,
    classifyDetailed,
    validateKeywordFragment,
    findDuplicateKeywords,
    MIN_FRAGMENT_LENGTH,
} from './categorizer/index.js';
export type { Classification, KeywordGroup } from './categorizer/index.js';

// Cache
export { ReadThroughCache, CacheMissError, periodKey } from './cache/index.js';
export type { CacheLogger, CacheOptions, CacheEntryState, CacheStats } from './cache/index.js';

// Ledger
export { Ledger, MemoryStore } from './ledger/index.js';
export type { AppendResult, TransactionStore } from './ledger/index.js';

// Reports
export {
    monthPeriod,
    lastDaysPeriod,
    inPeriod,
    filterByPeriod,
    computeTotals,
    currentBalance,
    categoryBreakdown,
    dailyTrend,
    monthlyComparison,
    recentTransactions,
} from './report/index.js';
