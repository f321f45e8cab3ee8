/**
 * Zod schemas for Dompet data structures.
 *
 * Money is always an integer amount of rupiah. Fractions only exist
 * while a shorthand expression like "1,5jt" is being resolved.
 */

import { z } from 'zod';
import {
    EXPENSE_CATEGORY_PRIORITY,
    CATEGORIES,
    MULTIPLIER_TOKENS,
    TXN_ID,
    STORE_DEFAULTS,
    CACHE_DEFAULTS,
    AMOUNT_POLICY,
    DEFAULT_UTC_OFFSET_MINUTES,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Month string format: YYYY-MM
 */
export const MonthSchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Must be YYYY-MM format');

/**
 * Transaction ID: 16-char hex.
 */
const txnId = z.string().regex(
    new RegExp(`^[0-9a-f]{${TXN_ID.LENGTH}}$`),
    `Must be ${TXN_ID.LENGTH}-char hex`
);

// ============================================================================
// Categories & Direction
// ============================================================================

export const ExpenseCategorySchema = z.enum(EXPENSE_CATEGORY_PRIORITY);

export type ExpenseCategory = z.infer<typeof ExpenseCategorySchema>;

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

export const DirectionSchema = z.enum(['income', 'expense']);

export type Direction = z.infer<typeof DirectionSchema>;

// ============================================================================
// Message & Transaction Schemas
// ============================================================================

/**
 * A chat message as delivered by the transport. Consumed once by the parser.
 */
export const RawMessageSchema = z.object({
    text: z.string(),
    sender: z.string().min(1),
    received_at: z.date(),
});

export type RawMessage = z.infer<typeof RawMessageSchema>;

/**
 * The persisted record. Immutable once created; corrections are new records.
 */
export const TransactionSchema = z.object({
    txn_id: txnId,
    txn_date: isoDateString,
    created_at: z.string().datetime(),
    amount: z.number().int().positive(),
    direction: DirectionSchema,
    category: CategorySchema,
    description: z.string().min(1),
    memo: z.string().min(1),
    source: z.string().min(1),
});

export type Transaction = z.infer<typeof TransactionSchema>;

// ============================================================================
// Amount Schemas
// ============================================================================

export const MultiplierTokenSchema = z.enum(MULTIPLIER_TOKENS);

export type MultiplierToken = z.infer<typeof MultiplierTokenSchema>;

/**
 * An amount found in a message.
 * [start, end) is the span in the original text.
 */
export const AmountExpressionSchema = z.object({
    text: z.string(),
    start: z.number().int().min(0),
    end: z.number().int().min(0),
    numeral: z.string().regex(/^\d+(\.\d+)?$/),
    multiplier: MultiplierTokenSchema.nullable(),
    value: z.number().int().positive(),
});

export type AmountExpression = z.infer<typeof AmountExpressionSchema>;

export const AmountPolicySchema = z.object({
    minBareDigits: z.number().int().min(1).default(AMOUNT_POLICY.MIN_BARE_DIGITS),
    maxBareDigits: z.number().int().min(1).default(AMOUNT_POLICY.MAX_BARE_DIGITS),
});

export type AmountPolicy = z.infer<typeof AmountPolicySchema>;

// ============================================================================
// Keyword Schemas
// ============================================================================

const keywordList = z.array(z.string().min(1));

/**
 * Keyword fragments used for direction and category detection.
 * Every expense category must be listed; order of evaluation is
 * EXPENSE_CATEGORY_PRIORITY, not the order in the file.
 */
export const KeywordTableSchema = z.object({
    income: keywordList,
    categories: z.object({
        Makan: keywordList,
        Transport: keywordList,
        Belanja: keywordList,
        Tagihan: keywordList,
        Hiburan: keywordList,
        Kesehatan: keywordList,
    }) satisfies z.ZodType<Record<ExpenseCategory, string[]>>,
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

/**
 * Keyword validation result.
 */
export const KeywordValidationResultSchema = z.object({
    valid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
});

export type KeywordValidationResult = z.infer<typeof KeywordValidationResultSchema>;

// ============================================================================
// Parse Result Schemas
// ============================================================================

export const ParseErrorKindSchema = z.enum(['no_amount', 'empty_description']);

export type ParseErrorKind = z.infer<typeof ParseErrorKindSchema>;

export const ParseErrorSchema = z.object({
    kind: ParseErrorKindSchema,
    message: z.string(),
});

export type ParseError = z.infer<typeof ParseErrorSchema>;

/**
 * Result returned by parseMessage.
 * Failures are data: a message that fails to record must reach the user.
 */
export const MessageParseResultSchema = z.discriminatedUnion('ok', [
    z.object({
        ok: z.literal(true),
        transaction: TransactionSchema,
        amount: AmountExpressionSchema,
    }),
    z.object({
        ok: z.literal(false),
        error: ParseErrorSchema,
    }),
]);

export type MessageParseResult = z.infer<typeof MessageParseResultSchema>;

// ============================================================================
// Period & Report Schemas
// ============================================================================

/**
 * Inclusive date range over txn_date.
 */
export const PeriodSchema = z.object({
    start: isoDateString,
    end: isoDateString,
});

export type Period = z.infer<typeof PeriodSchema>;

export const TotalsSchema = z.object({
    income: z.number().int().min(0),
    expense: z.number().int().min(0),
    net: z.number().int(),
    saving_percent: z.number(),
});

export type Totals = z.infer<typeof TotalsSchema>;

export const CategoryBreakdownSchema = z.object({
    categories: z.array(z.object({
        name: CategorySchema,
        value: z.number().int().min(0),
    })),
    total: z.number().int().min(0),
});

export type CategoryBreakdown = z.infer<typeof CategoryBreakdownSchema>;

export const TrendPointSchema = z.object({
    date: isoDateString,
    amount: z.number().int().min(0),
});

export type TrendPoint = z.infer<typeof TrendPointSchema>;

export const MonthlyTotalsSchema = z.object({
    month: MonthSchema,
    income: z.number().int().min(0),
    expense: z.number().int().min(0),
});

export type MonthlyTotals = z.infer<typeof MonthlyTotalsSchema>;

// ============================================================================
// Settings Schema
// ============================================================================

/**
 * Workspace settings (config/settings.yaml).
 */
export const SettingsSchema = z.object({
    ledger_file: z.string().min(1).default(STORE_DEFAULTS.LEDGER_FILE),
    cache_ttl_seconds: z.number().min(0).default(CACHE_DEFAULTS.TTL_MS / 1000),
    store_timeout_ms: z.number().int().positive().default(STORE_DEFAULTS.TIMEOUT_MS),
    store_retry_attempts: z.number().int().min(1).default(STORE_DEFAULTS.RETRY_ATTEMPTS),
    store_retry_delay_ms: z.number().int().min(0).default(STORE_DEFAULTS.RETRY_DELAY_MS),
    utc_offset_minutes: z.number().int().min(-720).max(840).default(DEFAULT_UTC_OFFSET_MINUTES),
    default_source: z.string().min(1).default('cli'),
    min_bare_digits: z.number().int().min(1).default(AMOUNT_POLICY.MIN_BARE_DIGITS),
    max_bare_digits: z.number().int().min(1).default(AMOUNT_POLICY.MAX_BARE_DIGITS),
});

export type Settings = z.infer<typeof SettingsSchema>;
