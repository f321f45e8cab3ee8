import type { KeywordTable, Transaction } from '../src/types/index.js';

/**
 * Compact keyword table for unit tests.
 */
export const TEST_KEYWORDS: KeywordTable = {
    income: ['gaji', 'terima', 'transfer', 'bonus', 'freelance', 'honor', 'bayaran'],
    categories: {
        Makan: ['makan', 'sarapan', 'nasi', 'kopi', 'teh', 'minum', 'seblak', 'bakso'],
        Transport: ['grab', 'gojek', 'ojek', 'bensin', 'parkir', 'kereta'],
        Belanja: ['belanja', 'beli', 'baju', 'sepatu', 'shopee', 'toko'],
        Tagihan: ['listrik', 'pdam', 'wifi', 'internet', 'pulsa', 'bayar', 'tagihan'],
        Hiburan: ['nonton', 'bioskop', 'netflix', 'spotify', 'game', 'tiket'],
        Kesehatan: ['obat', 'dokter', 'klinik', 'apotek', 'vitamin'],
    },
};

// Helper to create minimal transaction
export function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
    return {
        txn_id: 'a1b2c3d4e5f67890',
        txn_date: '2026-10-18',
        created_at: '2026-10-18T03:00:00.000Z',
        amount: 25000,
        direction: 'expense',
        category: 'Makan',
        description: 'makan siang 25000',
        memo: 'makan siang',
        source: 'tester',
        ...overrides,
    };
}

export function deferred<T>() {
    const handlers = {
        resolve: (_value: T): void => undefined,
        reject: (_error: unknown): void => undefined,
    };
    const promise = new Promise<T>((resolve, reject) => {
        handlers.resolve = resolve;
        handlers.reject = reject;
    });
    return { promise, resolve: handlers.resolve, reject: handlers.reject };
}
