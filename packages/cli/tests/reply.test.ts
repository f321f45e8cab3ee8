import { describe, it, expect } from 'vitest';
import {
    formatRupiah,
    formatAcknowledgement,
    formatParseError,
    formatBalance,
} from '../src/bot/reply.js';
import { makeTxn } from './helpers.js';

describe('formatRupiah', () => {
    it('groups thousands with dots', () => {
        expect(formatRupiah(0)).toBe('Rp 0');
        expect(formatRupiah(999)).toBe('Rp 999');
        expect(formatRupiah(25000)).toBe('Rp 25.000');
        expect(formatRupiah(1500000)).toBe('Rp 1.500.000');
    });

    it('puts the sign before Rp', () => {
        expect(formatRupiah(-25000)).toBe('-Rp 25.000');
    });
});

describe('formatAcknowledgement', () => {
    it('describes an expense', () => {
        expect(formatAcknowledgement(makeTxn(), 420)).toBe([
            '💸 PENGELUARAN TERCATAT!',
            '',
            '📊 Kategori: Makan',
            '💵 Jumlah: - Rp 25.000',
            '📝 Keterangan: makan siang',
            '🕐 Waktu: 18/10/2026 12:30',
        ].join('\n'));
    });

    it('describes income', () => {
        const txn = makeTxn({
            amount: 5000000,
            direction: 'income',
            category: 'Pemasukan',
            memo: 'gaji',
        });
        const lines = formatAcknowledgement(txn, 0).split('\n');

        expect(lines[0]).toBe('💰 PEMASUKAN TERCATAT!');
        expect(lines[3]).toBe('💵 Jumlah: + Rp 5.000.000');
        expect(lines[5]).toBe('🕐 Waktu: 18/10/2026 05:30');
    });
});

describe('formatParseError', () => {
    it('explains the failure and shows examples', () => {
        expect(formatParseError({ kind: 'no_amount', message: 'could not find an amount' })).toBe(
            '❌ Maaf, nominal tidak ditemukan (could not find an amount).\n' +
            'Contoh: "makan siang 25000", "beli kopi 15rb", atau "gaji 5jt".'
        );
    });
});

describe('formatBalance', () => {
    it('lists income, expense and balance', () => {
        expect(formatBalance({ income: 5000000, expense: 15000, net: 4985000, saving_percent: 99.7 })).toBe([
            '💰 SALDO KAMU',
            '',
            'Pemasukan: Rp 5.000.000',
            'Pengeluaran: Rp 15.000',
            'Saldo: Rp 4.985.000',
        ].join('\n'));
    });
});
