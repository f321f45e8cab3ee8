/**
 * Chat message parser: free text in, Transaction out.
 *
 * Steps:
 * 1. Extract the leftmost amount expression (none -> no_amount)
 * 2. Strip it; no letter or digit left -> empty_description
 * 3. Direction from income keywords, default expense
 * 4. Category: Pemasukan for income, keyword classification otherwise
 * 5. Assemble and schema-check the Transaction
 *
 * Parsing is pure apart from reading the clock when options.now is absent.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures returned as data.
 */

import { extractAmount, removeSpan, DEFAULT_AMOUNT_POLICY } from './amount.js';
import { detectDirection } from './direction.js';
import { classify } from '../categorizer/classify.js';
import { generateTxnId } from '../utils/txn-id.js';
import { toLocalDate } from '../utils/date.js';
import {
    INCOME_CATEGORY,
    PARSE_ERROR_MESSAGES,
    TransactionSchema,
} from '../types/index.js';
import type {
    AmountPolicy,
    KeywordTable,
    MessageParseResult,
    ParseErrorKind,
    RawMessage,
    Transaction,
} from '../types/index.js';

/** Punctuation alone ("(500000)", "25000!!") does not describe anything */
const DESCRIPTIVE = /[\p{L}\p{N}]/u;

export interface ParseOptions {
    /** Creation time; defaults to the current time */
    now?: Date;
    /** Offset used to derive txn_date; defaults to UTC */
    utcOffsetMinutes?: number;
    amountPolicy?: AmountPolicy;
}

/**
 * Parse a chat message into a Transaction.
 *
 * @param message - Message from the transport
 * @param table - Keyword table for direction and category
 * @param options - Clock, date offset and amount policy
 * @returns ok with the transaction and amount, or the parse error
 */
export function parseMessage(
    message: RawMessage,
    table: KeywordTable,
    options: ParseOptions = {}
): MessageParseResult {
    const description = message.text.trim();

    const amount = extractAmount(description, options.amountPolicy ?? DEFAULT_AMOUNT_POLICY);
    if (!amount) {
        return failure('no_amount');
    }

    const memo = removeSpan(description, amount);
    if (!DESCRIPTIVE.test(memo)) {
        return failure('empty_description');
    }

    const direction = detectDirection(memo, table);
    const category = direction === 'income' ? INCOME_CATEGORY : classify(memo, table);

    const createdAt = (options.now ?? new Date()).toISOString();
    const transaction: Transaction = {
        txn_id: generateTxnId(createdAt, message.sender, description),
        txn_date: toLocalDate(new Date(createdAt), options.utcOffsetMinutes ?? 0),
        created_at: createdAt,
        amount: amount.value,
        direction,
        category,
        description,
        memo,
        source: message.sender,
    };

    // Validate against schema (runtime check)
    TransactionSchema.parse(transaction);

    return { ok: true, transaction, amount };
}

function failure(kind: ParseErrorKind): MessageParseResult {
    return { ok: false, error: { kind, message: PARSE_ERROR_MESSAGES[kind] } };
}
