import { describe, it, expect } from 'vitest';
import { extractAmount, removeSpan, normalizeNumeral } from '../../src/parser/amount.js';

describe('extractAmount', () => {
    it.each([
        ['makan siang 25000', 25000],
        ['beli kopi 15rb', 15000],
        ['bensin 50k', 50000],
        ['bayar listrik 200ribu', 200000],
        ['gaji 5jt', 5000000],
        ['bonus 1juta', 1000000],
    ])('%s -> %d', (text, value) => {
        expect(extractAmount(text)?.value).toBe(value);
    });

    describe('bare numerals', () => {
        it('reads a plain rupiah amount and its span', () => {
            const amount = extractAmount('makan siang 25000');
            expect(amount).toEqual({
                text: '25000',
                start: 12,
                end: 17,
                numeral: '25000',
                multiplier: null,
                value: 25000,
            });
        });

        it('treats dot grouping as thousands', () => {
            expect(extractAmount('kopi 25.000')?.value).toBe(25000);
            expect(extractAmount('laptop 1.500.000')?.value).toBe(1500000);
        });

        it('treats comma grouping as thousands', () => {
            expect(extractAmount('parkir 1,500')?.value).toBe(1500);
        });

        it('ignores numerals with fewer than three digits', () => {
            expect(extractAmount('beli 2 kopi')).toBeNull();
            expect(extractAmount('lantai 12')).toBeNull();
        });

        it('ignores numerals that look like phone numbers', () => {
            const amount = extractAmount('08123456789 pulsa 50rb');
            expect(amount?.text).toBe('50rb');
            expect(amount?.value).toBe(50000);
        });

        it('honours a custom digit policy', () => {
            expect(extractAmount('lantai 12', { minBareDigits: 2, maxBareDigits: 9 })?.value).toBe(12);
        });
    });

    describe('multiplier suffixes', () => {
        it.each([
            ['jajan 15rb', 15000, 'rb'],
            ['jajan 15ribu', 15000, 'ribu'],
            ['jajan 50k', 50000, 'k'],
            ['jajan 50K', 50000, 'k'],
            ['jajan 2ceban', 20000, 'ceban'],
            ['gaji 5jt', 5000000, 'jt'],
            ['gaji 5juta', 5000000, 'juta'],
        ])('%s -> %d', (text, value, multiplier) => {
            const amount = extractAmount(text);
            expect(amount?.value).toBe(value);
            expect(amount?.multiplier).toBe(multiplier);
        });

        it('accepts a comma or dot as the decimal point', () => {
            expect(extractAmount('bonus 1,5jt')?.value).toBe(1500000);
            expect(extractAmount('bonus 1.5jt')?.value).toBe(1500000);
            expect(extractAmount('es 2.5k')?.value).toBe(2500);
        });

        it('rounds fractional rupiah half up', () => {
            expect(extractAmount('x 1,2345rb')?.value).toBe(1235);
        });

        it('joins a numeral with a following multiplier word', () => {
            const amount = extractAmount('bonus 1.5 juta bulan ini');
            expect(amount?.text).toBe('1.5 juta');
            expect(amount?.start).toBe(6);
            expect(amount?.end).toBe(14);
            expect(amount?.numeral).toBe('1.5');
            expect(amount?.value).toBe(1500000);
        });

        it('rejects unknown suffixes', () => {
            expect(extractAmount('beli 20rbu')).toBeNull();
            expect(extractAmount('kamar 3b')).toBeNull();
        });
    });

    describe('currency prefix', () => {
        it('strips an attached Rp', () => {
            const amount = extractAmount('Rp25.000 pulsa');
            expect(amount?.value).toBe(25000);
            expect(amount?.text).toBe('Rp25.000');
        });

        it('includes a separate Rp word in the span', () => {
            const amount = extractAmount('bayar Rp 25.000');
            expect(amount?.text).toBe('Rp 25.000');
            expect(amount?.start).toBe(6);
            expect(amount?.end).toBe(15);
        });

        it('takes a closing ",-" into the span', () => {
            const amount = extractAmount('makan Rp 15.000,-');
            expect(amount?.value).toBe(15000);
            expect(amount?.text).toBe('Rp 15.000,-');
            expect(amount?.start).toBe(6);
            expect(amount?.end).toBe(17);
            expect(extractAmount('Rp15.000,- pulsa')?.text).toBe('Rp15.000,-');
        });
    });

    describe('selection', () => {
        it('picks the leftmost amount', () => {
            expect(extractAmount('makan 25000 parkir 5000')?.value).toBe(25000);
        });

        it('skips zero amounts and keeps scanning', () => {
            expect(extractAmount('makan 0rb 25000')?.value).toBe(25000);
        });

        it('ignores surrounding punctuation', () => {
            const amount = extractAmount('kopi (50rb)');
            expect(amount?.text).toBe('50rb');
            expect(amount?.start).toBe(6);
            expect(amount?.end).toBe(10);
            expect(extractAmount('kopi 25.000.')?.value).toBe(25000);
        });

        it('returns null for text without an amount', () => {
            expect(extractAmount('makan siang')).toBeNull();
            expect(extractAmount('')).toBeNull();
        });

        it('rejects malformed grouping', () => {
            expect(extractAmount('x 1.234.5')).toBeNull();
        });
    });
});

describe('removeSpan', () => {
    it('cuts the amount out and tidies whitespace', () => {
        expect(removeSpan('makan siang 25000', { start: 12, end: 17 })).toBe('makan siang');
        expect(removeSpan('makan 25000 parkir 5000', { start: 6, end: 11 })).toBe('makan parkir 5000');
    });

    it('returns an empty string when only the amount was present', () => {
        expect(removeSpan('25000', { start: 0, end: 5 })).toBe('');
    });
});

describe('normalizeNumeral', () => {
    it('normalizes grouping and decimal separators', () => {
        expect(normalizeNumeral('25.000')).toBe('25000');
        expect(normalizeNumeral('1,5')).toBe('1.5');
        expect(normalizeNumeral('1.50')).toBe('1.5');
        expect(normalizeNumeral('007')).toBe('7');
    });

    it('returns null for non-numerals', () => {
        expect(normalizeNumeral('abc')).toBeNull();
        expect(normalizeNumeral('1.2.3')).toBeNull();
    });
});
