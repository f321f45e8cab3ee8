/**
 * Ledger: the one place that writes to the store and reads through the cache.
 */

import { periodKey } from '../cache/keys.js';
import type { ReadThroughCache } from '../cache/read-through.js';
import type { Period, Transaction } from '../types/index.js';
import type { AppendResult, TransactionStore } from './types.js';

export class Ledger {
    constructor(
        private readonly store: TransactionStore,
        private readonly cache: ReadThroughCache<Transaction[]>
    ) {}

    /**
     * Append a transaction. On success every cached read is dropped, since
     * the all-transactions key and any period key may now be outdated.
     * A failed append leaves the cache untouched.
     */
    async record(transaction: Transaction): Promise<AppendResult> {
        const result = await this.store.append(transaction);
        if (result.ok) {
            this.cache.invalidate();
        }
        return result;
    }

    /**
     * Transactions, optionally limited to a period, served through the cache.
     */
    list(period?: Period): Promise<Transaction[]> {
        return this.cache.get(periodKey(period), () => this.store.readAll(period));
    }
}
