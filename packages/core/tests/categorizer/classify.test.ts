import { describe, it, expect } from 'vitest';
import { classify, classifyDetailed } from '../../src/categorizer/classify.js';
import { matchesKeyword, findKeyword } from '../../src/categorizer/match.js';
import { TEST_KEYWORDS } from '../helpers.js';

describe('classify', () => {
    it('returns the category whose keyword occurs', () => {
        expect(classify('isi bensin', TEST_KEYWORDS)).toBe('Transport');
        expect(classify('bayar listrik', TEST_KEYWORDS)).toBe('Tagihan');
    });

    it('matches case-insensitively', () => {
        expect(classify('BELI Sepatu', TEST_KEYWORDS)).toBe('Belanja');
    });

    it('matches fragments inside longer words', () => {
        expect(classify('makanan kucing', TEST_KEYWORDS)).toBe('Makan');
    });

    it('falls back to Lainnya', () => {
        expect(classify('random', TEST_KEYWORDS)).toBe('Lainnya');
        expect(classify('', TEST_KEYWORDS)).toBe('Lainnya');
    });

    describe('priority order', () => {
        it('Makan beats Belanja even when beli comes first', () => {
            expect(classify('beli kopi', TEST_KEYWORDS)).toBe('Makan');
        });

        it('Transport beats Belanja and Hiburan', () => {
            expect(classify('beli tiket kereta', TEST_KEYWORDS)).toBe('Transport');
        });
    });
});

describe('classifyDetailed', () => {
    it('reports the deciding keyword', () => {
        expect(classifyDetailed('beli kopi', TEST_KEYWORDS)).toEqual({ category: 'Makan', keyword: 'kopi' });
        expect(classifyDetailed('BELI Sepatu', TEST_KEYWORDS)).toEqual({ category: 'Belanja', keyword: 'beli' });
    });

    it('reports a null keyword for the fallback', () => {
        expect(classifyDetailed('random', TEST_KEYWORDS)).toEqual({ category: 'Lainnya', keyword: null });
    });
});

describe('matchesKeyword', () => {
    it('normalizes the fragment before comparing', () => {
        expect(matchesKeyword('isi bensin', '  BENSIN ')).toBe(true);
    });

    it('never matches a blank fragment', () => {
        expect(matchesKeyword('isi bensin', '   ')).toBe(false);
    });
});

describe('findKeyword', () => {
    it('returns the first fragment in list order', () => {
        expect(findKeyword('gojek ke kantor', ['ojek', 'gojek'])).toBe('ojek');
        expect(findKeyword('jalan kaki', ['ojek', 'gojek'])).toBeNull();
    });
});
