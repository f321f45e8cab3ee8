/**
 * Period helpers. Periods are inclusive ranges over txn_date.
 */

import { shiftIsoDate } from '../utils/date.js';
import type { Period, Transaction } from '../types/index.js';

/**
 * The calendar month YYYY-MM as a period.
 */
export function monthPeriod(month: string): Period {
    const match = month.match(/^(\d{4})-(\d{2})$/);
    if (!match) {
        throw new Error(`Invalid month "${month}". Use YYYY-MM (e.g., 2026-01).`);
    }
    const year = parseInt(match[1], 10);
    const monthIndex = parseInt(match[2], 10);
    if (monthIndex < 1 || monthIndex > 12) {
        throw new Error(`Invalid month "${match[2]}". Must be between 01 and 12.`);
    }
    // Day 0 of the next month is the last day of this one
    const lastDay = new Date(Date.UTC(year, monthIndex, 0)).getUTCDate();
    return {
        start: `${month}-01`,
        end: `${month}-${String(lastDay).padStart(2, '0')}`,
    };
}

/**
 * The last `days` days up to and including `today` (YYYY-MM-DD).
 */
export function lastDaysPeriod(days: number, today: string): Period {
    if (!Number.isInteger(days) || days < 1) {
        throw new Error(`Day count must be a positive integer (got ${days})`);
    }
    return { start: shiftIsoDate(today, -(days - 1)), end: today };
}

export function inPeriod(transaction: Transaction, period: Period): boolean {
    return transaction.txn_date >= period.start && transaction.txn_date <= period.end;
}

export function filterByPeriod(transactions: readonly Transaction[], period: Period): Transaction[] {
    return transactions.filter((txn) => inPeriod(txn, period));
}
