import { describe, it, expect } from 'vitest';
import { detectDirection } from '../../src/parser/direction.js';
import { TEST_KEYWORDS } from '../helpers.js';

describe('detectDirection', () => {
    it('detects income from income keywords', () => {
        expect(detectDirection('gaji bulan oktober', TEST_KEYWORDS)).toBe('income');
        expect(detectDirection('Transfer dari ayah', TEST_KEYWORDS)).toBe('income');
    });

    it('defaults to expense', () => {
        expect(detectDirection('makan siang', TEST_KEYWORDS)).toBe('expense');
        expect(detectDirection('', TEST_KEYWORDS)).toBe('expense');
    });

    it('matches fragments inside words', () => {
        expect(detectDirection('freelancer project', TEST_KEYWORDS)).toBe('income');
    });
});
