import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Transaction } from '@dompet/shared';

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'dompet-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

// Helper to create minimal transaction
export function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
    return {
        txn_id: 'a1b2c3d4e5f67890',
        txn_date: '2026-10-18',
        created_at: '2026-10-18T05:30:00.000Z',
        amount: 25000,
        direction: 'expense',
        category: 'Makan',
        description: 'makan siang 25000',
        memo: 'makan siang',
        source: 'tester',
        ...overrides,
    };
}
