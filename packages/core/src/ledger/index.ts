/**
 * Ledger module: store interface and the cached read/invalidating write facade.
 */

export { Ledger } from './ledger.js';
export { MemoryStore } from './memory-store.js';
export type { AppendResult, TransactionStore } from './types.js';
