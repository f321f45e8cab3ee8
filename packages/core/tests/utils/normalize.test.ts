import { describe, it, expect } from 'vitest';
import { normalizeDescription } from '../../src/utils/normalize.js';

describe('normalizeDescription', () => {
    it('lowercases', () => {
        expect(normalizeDescription('Makan SIANG')).toBe('makan siang');
    });

    it('collapses whitespace and trims', () => {
        expect(normalizeDescription('  beli \t kopi\n ')).toBe('beli kopi');
    });

    it('handles empty string', () => {
        expect(normalizeDescription('')).toBe('');
    });
});
