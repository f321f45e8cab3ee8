/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@dompet/shared';

export {
    TransactionSchema,
    KeywordTableSchema,
    EXPENSE_CATEGORY_PRIORITY,
    INCOME_CATEGORY,
    FALLBACK_CATEGORY,
    MULTIPLIER_TOKENS,
    MULTIPLIERS,
    AMOUNT_POLICY,
    CACHE_DEFAULTS,
    ALL_TRANSACTIONS_KEY,
    TXN_ID,
    PARSE_ERROR_MESSAGES,
} from '@dompet/shared';
