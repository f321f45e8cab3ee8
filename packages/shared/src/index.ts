// Schemas
export {
    MonthSchema,
    ExpenseCategorySchema,
    CategorySchema,
    DirectionSchema,
    RawMessageSchema,
    TransactionSchema,
    MultiplierTokenSchema,
    AmountExpressionSchema,
    AmountPolicySchema,
    KeywordTableSchema,
    KeywordValidationResultSchema,
    ParseErrorKindSchema,
    ParseErrorSchema,
    MessageParseResultSchema,
    PeriodSchema,
    TotalsSchema,
    CategoryBreakdownSchema,
    TrendPointSchema,
    MonthlyTotalsSchema,
    SettingsSchema,
} from './schemas.js';

// Types
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
    Settings,
} from './schemas.js';

// Constants
export {
    EXPENSE_CATEGORY_PRIORITY,
    INCOME_CATEGORY,
    FALLBACK_CATEGORY,
    CATEGORIES,
    MULTIPLIER_TOKENS,
    MULTIPLIERS,
    AMOUNT_POLICY,
    CACHE_DEFAULTS,
    ALL_TRANSACTIONS_KEY,
    TXN_ID,
    STORE_DEFAULTS,
    DEFAULT_UTC_OFFSET_MINUTES,
    PARSE_ERROR_MESSAGES,
} from './constants.js';
