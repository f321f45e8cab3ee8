/**
 * Amount extraction for informal Indonesian money shorthand.
 *
 * Handles formats like:
 *   "25000", "25.000", "Rp25.000", "15rb", "50k", "200ribu",
 *   "2ceban", "5jt", "1,5jt", "1.5 juta"
 *
 * ARCHITECTURAL NOTE: No console.* calls. NotFound is returned as null.
 */

import { Decimal } from 'decimal.js';
import { AMOUNT_POLICY, MULTIPLIER_TOKENS, MULTIPLIERS } from '../types/index.js';
import type { AmountExpression, AmountPolicy, MultiplierToken } from '../types/index.js';

const SEGMENT = /\S+/g;
const LEADING_PUNCTUATION = /^[("'[]+/;
const TRAILING_PUNCTUATION = /[)"'\],;:!?.]+$/;
/** "15.000,-": the dash closes a price and belongs to the amount */
const RUPIAH_DASH = /,-$/;
const CURRENCY_PREFIX = /^rp\.?/;
const NUMERAL_WITH_SUFFIX = /^(\d[\d.,]*)([a-z]*)$/;

/** Indonesian thousands grouping: 25.000, 1.500.000, 1,500 */
const GROUPED_INTEGER = /^\d{1,3}(?:[.,]\d{3})+$/;
/** Plain number; both , and . act as the decimal point */
const PLAIN_DECIMAL = /^\d+(?:[.,]\d+)?$/;

export const DEFAULT_AMOUNT_POLICY: AmountPolicy = {
    minBareDigits: AMOUNT_POLICY.MIN_BARE_DIGITS,
    maxBareDigits: AMOUNT_POLICY.MAX_BARE_DIGITS,
};

interface Segment {
    /** Lower-cased text without surrounding punctuation */
    core: string;
    start: number;
    end: number;
    /** End including a trailing ",-" */
    spanEnd: number;
}

interface SegmentReading {
    numeral: string;
    multiplier: MultiplierToken | null;
}

/**
 * Find the first amount expression in a message.
 *
 * Each whitespace-delimited segment is tested against the grammar
 * `numeral suffix?`; a bare numeral followed by a segment that is exactly a
 * suffix ("1.5 juta") forms one expression. The leftmost valid candidate
 * wins. A bare numeral only counts when its integer part has between
 * policy.minBareDigits and policy.maxBareDigits digits.
 *
 * @param text - Raw message text
 * @param policy - Bare numeral digit thresholds
 * @returns The amount expression, or null when the text carries none
 */
export function extractAmount(
    text: string,
    policy: AmountPolicy = DEFAULT_AMOUNT_POLICY
): AmountExpression | null {
    const segments = splitSegments(text);

    for (let i = 0; i < segments.length; i++) {
        const segment = segments[i];
        const reading = readSegment(segment.core);
        if (!reading) continue;

        let multiplier = reading.multiplier;
        let end = segment.spanEnd;

        if (multiplier === null) {
            const next = segments[i + 1];
            const token = next ? asMultiplierToken(next.core) : null;
            if (next && token) {
                multiplier = token;
                end = next.spanEnd;
            } else if (!withinBareDigitRange(reading.numeral, policy)) {
                continue;
            }
        }

        const value = resolveValue(reading.numeral, multiplier);
        if (value === null) continue;

        // "Rp 25.000": the currency word belongs to the amount
        const previous = segments[i - 1];
        const start = previous && previous.core === 'rp' ? previous.start : segment.start;

        return {
            text: text.slice(start, end),
            start,
            end,
            numeral: reading.numeral,
            multiplier,
            value,
        };
    }

    return null;
}

/**
 * Cut an amount expression out of its text and tidy the whitespace.
 */
export function removeSpan(text: string, expression: Pick<AmountExpression, 'start' | 'end'>): string {
    return `${text.slice(0, expression.start)} ${text.slice(expression.end)}`
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Normalize a numeral to a plain decimal string ("1,5" -> "1.5", "25.000" -> "25000").
 * Returns null if the string is not a numeral.
 */
export function normalizeNumeral(raw: string): string | null {
    if (GROUPED_INTEGER.test(raw)) {
        return new Decimal(raw.replace(/[.,]/g, '')).toFixed();
    }
    if (PLAIN_DECIMAL.test(raw)) {
        return new Decimal(raw.replace(',', '.')).toFixed();
    }
    return null;
}

function splitSegments(text: string): Segment[] {
    const segments: Segment[] = [];
    for (const match of text.matchAll(SEGMENT)) {
        const raw = match[0];
        const lead = raw.match(LEADING_PUNCTUATION)?.[0].length ?? 0;
        const trimmed = raw.slice(lead).replace(TRAILING_PUNCTUATION, '');
        const dash = trimmed.match(RUPIAH_DASH)?.[0].length ?? 0;
        const stripped = trimmed.slice(0, trimmed.length - dash);
        if (!stripped) continue;

        const start = (match.index ?? 0) + lead;
        const end = start + stripped.length;
        segments.push({
            core: stripped.toLowerCase(),
            start,
            end,
            spanEnd: end + dash,
        });
    }
    return segments;
}

function readSegment(core: string): SegmentReading | null {
    const match = core.replace(CURRENCY_PREFIX, '').match(NUMERAL_WITH_SUFFIX);
    if (!match) return null;

    const [, rawNumeral, suffix] = match;
    let multiplier: MultiplierToken | null = null;
    if (suffix) {
        multiplier = asMultiplierToken(suffix);
        if (!multiplier) return null;
    }

    const numeral = normalizeNumeral(rawNumeral);
    if (numeral === null) return null;

    return { numeral, multiplier };
}

function asMultiplierToken(value: string): MultiplierToken | null {
    return MULTIPLIER_TOKENS.find((token) => token === value) ?? null;
}

function withinBareDigitRange(numeral: string, policy: AmountPolicy): boolean {
    const integerDigits = numeral.split('.')[0].length;
    return integerDigits >= policy.minBareDigits && integerDigits <= policy.maxBareDigits;
}

/**
 * numeral × multiplier, rounded half-up to a whole rupiah.
 * Zero is not an amount.
 */
function resolveValue(numeral: string, multiplier: MultiplierToken | null): number | null {
    const factor = multiplier ? MULTIPLIERS[multiplier] : 1;
    const value = new Decimal(numeral)
        .times(factor)
        .toDecimalPlaces(0, Decimal.ROUND_HALF_UP)
        .toNumber();

    if (value <= 0 || !Number.isSafeInteger(value)) {
        return null;
    }
    return value;
}
