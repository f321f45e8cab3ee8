import { describe, it, expect } from 'vitest';
import {
    TransactionSchema,
    CategorySchema,
    KeywordTableSchema,
    MessageParseResultSchema,
    PeriodSchema,
    MonthSchema,
    SettingsSchema,
} from '../src/schemas.js';

describe('TransactionSchema', () => {
    const validTransaction = {
        txn_id: 'a1b2c3d4e5f67890',
        txn_date: '2026-01-15',
        created_at: '2026-01-15T05:30:00.000Z',
        amount: 25000,
        direction: 'expense',
        category: 'Makan',
        description: 'makan siang 25000',
        memo: 'makan siang',
        source: 'budi',
    };

    it('validates a complete transaction', () => {
        const result = TransactionSchema.safeParse(validTransaction);
        expect(result.success).toBe(true);
    });

    it('rejects invalid txn_id length', () => {
        const invalid = { ...validTransaction, txn_id: 'tooshort' };
        expect(TransactionSchema.safeParse(invalid).success).toBe(false);
    });

    it('rejects invalid date format', () => {
        const invalid = { ...validTransaction, txn_date: '15/01/2026' };
        expect(TransactionSchema.safeParse(invalid).success).toBe(false);
    });

    it('rejects zero and negative amounts', () => {
        expect(TransactionSchema.safeParse({ ...validTransaction, amount: 0 }).success).toBe(false);
        expect(TransactionSchema.safeParse({ ...validTransaction, amount: -500 }).success).toBe(false);
    });

    it('rejects fractional amounts', () => {
        const invalid = { ...validTransaction, amount: 1500.5 };
        expect(TransactionSchema.safeParse(invalid).success).toBe(false);
    });

    it('rejects unknown direction', () => {
        const invalid = { ...validTransaction, direction: 'refund' };
        expect(TransactionSchema.safeParse(invalid).success).toBe(false);
    });

    it('rejects empty memo', () => {
        const invalid = { ...validTransaction, memo: '' };
        expect(TransactionSchema.safeParse(invalid).success).toBe(false);
    });
});

describe('CategorySchema', () => {
    it('accepts expense, income and fallback categories', () => {
        expect(CategorySchema.safeParse('Tagihan').success).toBe(true);
        expect(CategorySchema.safeParse('Pemasukan').success).toBe(true);
        expect(CategorySchema.safeParse('Lainnya').success).toBe(true);
    });

    it('rejects categories outside the closed set', () => {
        expect(CategorySchema.safeParse('Groceries').success).toBe(false);
    });
});

describe('KeywordTableSchema', () => {
    const table = {
        income: ['gaji'],
        categories: {
            Makan: ['makan'],
            Transport: ['bensin'],
            Belanja: ['beli'],
            Tagihan: ['listrik'],
            Hiburan: ['nonton'],
            Kesehatan: ['obat'],
        },
    };

    it('validates a table listing every expense category', () => {
        expect(KeywordTableSchema.safeParse(table).success).toBe(true);
    });

    it('rejects a table missing a category', () => {
        const { Kesehatan: _omitted, ...rest } = table.categories;
        const result = KeywordTableSchema.safeParse({ income: table.income, categories: rest });
        expect(result.success).toBe(false);
    });

    it('rejects empty fragments', () => {
        const result = KeywordTableSchema.safeParse({
            ...table,
            income: [''],
        });
        expect(result.success).toBe(false);
    });
});

describe('MessageParseResultSchema', () => {
    it('validates a failure result', () => {
        const result = MessageParseResultSchema.safeParse({
            ok: false,
            error: { kind: 'no_amount', message: 'could not find an amount' },
        });
        expect(result.success).toBe(true);
    });

    it('rejects an unknown error kind', () => {
        const result = MessageParseResultSchema.safeParse({
            ok: false,
            error: { kind: 'too_long', message: 'x' },
        });
        expect(result.success).toBe(false);
    });
});

describe('PeriodSchema and MonthSchema', () => {
    it('validates an inclusive date range', () => {
        expect(PeriodSchema.safeParse({ start: '2026-10-01', end: '2026-10-31' }).success).toBe(true);
    });

    it('rejects month 13', () => {
        expect(MonthSchema.safeParse('2026-13').success).toBe(false);
        expect(MonthSchema.safeParse('2026-12').success).toBe(true);
    });
});

describe('SettingsSchema', () => {
    it('fills defaults for an empty file', () => {
        const settings = SettingsSchema.parse({});
        expect(settings.ledger_file).toBe('ledger.xlsx');
        expect(settings.cache_ttl_seconds).toBe(60);
        expect(settings.store_retry_attempts).toBe(3);
        expect(settings.utc_offset_minutes).toBe(420);
        expect(settings.min_bare_digits).toBe(3);
        expect(settings.max_bare_digits).toBe(9);
    });

    it('rejects a negative TTL', () => {
        expect(SettingsSchema.safeParse({ cache_ttl_seconds: -1 }).success).toBe(false);
    });
});
