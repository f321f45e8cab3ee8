/**
 * Types for the ledger facade.
 */

import type { Period, Transaction } from '../types/index.js';

export type AppendResult = { ok: true } | { ok: false; error: string };

/**
 * The persistence store behind the ledger.
 * Implementations are expected to be rate limited; reads go through the cache.
 */
export interface TransactionStore {
    append(transaction: Transaction): Promise<AppendResult>;
    readAll(period?: Period): Promise<Transaction[]>;
}
