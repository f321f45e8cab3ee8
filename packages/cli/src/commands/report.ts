import {
    categoryBreakdown,
    computeTotals,
    dailyTrend,
    formatDmyDate,
    lastDaysPeriod,
    monthPeriod,
    monthlyComparison,
} from '@dompet/core';
import { createApp, today } from '../app.js';
import { formatRupiah } from '../bot/reply.js';
import { log, arrow, info } from '../utils/console.js';
import type { MonthOptions, MonthsOptions, TrendOptions } from '../types.js';

function currentMonth(options: MonthOptions, todayDate: string): string {
    return options.month ?? todayDate.slice(0, 7);
}

/**
 * Income, expense, net and saving rate for a month (default: this month).
 */
export async function showSummary(options: MonthOptions): Promise<void> {
    const app = createApp(options);
    const month = currentMonth(options, today(app.settings));
    const totals = computeTotals(await app.ledger.list(monthPeriod(month)));

    log(`Summary ${month}`);
    arrow(`Pemasukan:   ${formatRupiah(totals.income)}`);
    arrow(`Pengeluaran: ${formatRupiah(totals.expense)}`);
    arrow(`Selisih:     ${formatRupiah(totals.net)}`);
    arrow(`Tabungan:    ${totals.saving_percent}%`);
}

/**
 * Expense per category for a month, largest first.
 */
export async function showCategories(options: MonthOptions): Promise<void> {
    const app = createApp(options);
    const month = currentMonth(options, today(app.settings));
    const breakdown = categoryBreakdown(await app.ledger.list(monthPeriod(month)));

    if (breakdown.total === 0) {
        info(`No expenses in ${month}.`);
        return;
    }

    log(`Expenses by category ${month}`);
    for (const { name, value } of breakdown.categories) {
        const share = Math.round((value / breakdown.total) * 1000) / 10;
        arrow(`${name.padEnd(10)} ${formatRupiah(value).padStart(16)}  ${share}%`);
    }
    arrow(`${'Total'.padEnd(10)} ${formatRupiah(breakdown.total).padStart(16)}`);
}

/**
 * Daily spending over the last N days.
 */
export async function showTrends(options: TrendOptions): Promise<void> {
    const app = createApp(options);
    const end = today(app.settings);
    const transactions = await app.ledger.list(lastDaysPeriod(options.days, end));

    log(`Daily expenses, last ${options.days} days`);
    for (const point of dailyTrend(transactions, options.days, end)) {
        arrow(`${formatDmyDate(point.date)} ${formatRupiah(point.amount).padStart(16)}`);
    }
}

/**
 * Income against expense for the last N months with transactions.
 */
export async function showMonths(options: MonthsOptions): Promise<void> {
    const app = createApp(options);
    const months = monthlyComparison(await app.ledger.list(), options.count);

    if (months.length === 0) {
        info('No transactions recorded.');
        return;
    }

    for (const { month, income, expense } of months) {
        arrow(`${month}  in ${formatRupiah(income).padStart(16)}  out ${formatRupiah(expense).padStart(16)}`);
    }
}
