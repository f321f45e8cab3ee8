/**
 * Aggregations over transactions for summaries and charts.
 * All sums are integer rupiah.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Pure functions.
 */

import { shiftIsoDate } from '../utils/date.js';
import type {
    Category,
    CategoryBreakdown,
    MonthlyTotals,
    Totals,
    Transaction,
    TrendPoint,
} from '../types/index.js';

/**
 * Income, expense, net and the share of income saved.
 * saving_percent is rounded to one decimal and 0 when there is no income.
 */
export function computeTotals(transactions: readonly Transaction[]): Totals {
    let income = 0;
    let expense = 0;
    for (const txn of transactions) {
        if (txn.direction === 'income') {
            income += txn.amount;
        } else {
            expense += txn.amount;
        }
    }

    const net = income - expense;
    const savingPercent = income > 0 ? Math.round((net / income) * 1000) / 10 : 0;

    return { income, expense, net, saving_percent: savingPercent };
}

/**
 * Income minus expense over all given transactions.
 */
export function currentBalance(transactions: readonly Transaction[]): number {
    return computeTotals(transactions).net;
}

/**
 * Expense totals per category, largest first.
 */
export function categoryBreakdown(transactions: readonly Transaction[]): CategoryBreakdown {
    const totals = new Map<Category, number>();
    for (const txn of transactions) {
        if (txn.direction !== 'expense') continue;
        totals.set(txn.category, (totals.get(txn.category) ?? 0) + txn.amount);
    }

    const categories = [...totals.entries()]
        .map(([name, value]) => ({ name, value }))
        .sort((a, b) => b.value - a.value);

    return {
        categories,
        total: categories.reduce((sum, c) => sum + c.value, 0),
    };
}

/**
 * Daily expense sums for the `days` days ending at `today`, oldest first.
 * Days without spending are present with amount 0.
 */
export function dailyTrend(
    transactions: readonly Transaction[],
    days: number,
    today: string
): TrendPoint[] {
    const points: TrendPoint[] = [];
    const byDate = new Map<string, TrendPoint>();

    for (let offset = days - 1; offset >= 0; offset--) {
        const point = { date: shiftIsoDate(today, -offset), amount: 0 };
        points.push(point);
        byDate.set(point.date, point);
    }

    for (const txn of transactions) {
        if (txn.direction !== 'expense') continue;
        const point = byDate.get(txn.txn_date);
        if (point) {
            point.amount += txn.amount;
        }
    }

    return points;
}

/**
 * Income and expense per calendar month for the last `months` months that
 * have transactions, oldest first.
 */
export function monthlyComparison(
    transactions: readonly Transaction[],
    months: number
): MonthlyTotals[] {
    const byMonth = new Map<string, MonthlyTotals>();

    for (const txn of transactions) {
        const month = txn.txn_date.slice(0, 7);
        let totals = byMonth.get(month);
        if (!totals) {
            totals = { month, income: 0, expense: 0 };
            byMonth.set(month, totals);
        }
        if (txn.direction === 'income') {
            totals.income += txn.amount;
        } else {
            totals.expense += txn.amount;
        }
    }

    return [...byMonth.values()]
        .sort((a, b) => a.month.localeCompare(b.month))
        .slice(-months);
}

/**
 * Newest transactions first.
 */
export function recentTransactions(transactions: readonly Transaction[], limit: number): Transaction[] {
    return [...transactions]
        .sort((a, b) => b.created_at.localeCompare(a.created_at))
        .slice(0, limit);
}
