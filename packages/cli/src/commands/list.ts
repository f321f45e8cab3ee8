import { monthPeriod, recentTransactions, formatDmyDate } from '@dompet/core';
import { createApp } from '../app.js';
import { formatRupiah } from '../bot/reply.js';
import { log, info } from '../utils/console.js';
import type { ListOptions } from '../types.js';

/**
 * Newest transactions first, optionally within one month.
 */
export async function listTransactions(options: ListOptions): Promise<void> {
    const app = createApp(options);
    const period = options.month ? monthPeriod(options.month) : undefined;
    const transactions = recentTransactions(await app.ledger.list(period), options.limit);

    if (transactions.length === 0) {
        info('No transactions recorded.');
        return;
    }

    for (const txn of transactions) {
        const signed = txn.direction === 'income' ? txn.amount : -txn.amount;
        const amount = formatRupiah(signed).padStart(16);
        const category = txn.category.padEnd(10);
        log(`${formatDmyDate(txn.txn_date)} | ${amount} | ${category} | ${txn.memo}`);
    }
}
