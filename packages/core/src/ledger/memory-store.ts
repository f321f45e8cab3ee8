/**
 * In-process TransactionStore. Nothing survives the process.
 */

import { filterByPeriod } from '../report/period.js';
import type { Period, Transaction } from '../types/index.js';
import type { AppendResult, TransactionStore } from './types.js';

export class MemoryStore implements TransactionStore {
    private readonly rows: Transaction[] = [];

    constructor(initial: readonly Transaction[] = []) {
        this.rows.push(...initial);
    }

    async append(transaction: Transaction): Promise<AppendResult> {
        this.rows.push({ ...transaction });
        return { ok: true };
    }

    async readAll(period?: Period): Promise<Transaction[]> {
        const rows = period ? filterByPeriod(this.rows, period) : this.rows;
        return rows.map((txn) => ({ ...txn }));
    }
}
