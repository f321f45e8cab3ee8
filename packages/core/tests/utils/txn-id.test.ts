import { describe, it, expect } from 'vitest';
import { generateTxnId } from '../../src/utils/txn-id.js';

const CREATED_AT = '2026-10-18T03:00:00.000Z';

describe('generateTxnId', () => {
    it('generates 16-character hex string', () => {
        const id = generateTxnId(CREATED_AT, 'tester', 'makan 25000');
        expect(id).toHaveLength(16);
        expect(id).toMatch(/^[0-9a-f]{16}$/);
    });

    it('is deterministic - same input produces same output', () => {
        expect(generateTxnId(CREATED_AT, 'tester', 'makan 25000'))
            .toBe(generateTxnId(CREATED_AT, 'tester', 'makan 25000'));
    });

    it('produces different IDs for different creation times', () => {
        expect(generateTxnId(CREATED_AT, 'tester', 'makan 25000'))
            .not.toBe(generateTxnId('2026-10-18T03:00:01.000Z', 'tester', 'makan 25000'));
    });

    it('produces different IDs for different senders', () => {
        expect(generateTxnId(CREATED_AT, 'tester', 'makan 25000'))
            .not.toBe(generateTxnId(CREATED_AT, 'other', 'makan 25000'));
    });

    it('produces different IDs for different descriptions', () => {
        expect(generateTxnId(CREATED_AT, 'tester', 'makan 25000'))
            .not.toBe(generateTxnId(CREATED_AT, 'tester', 'makan 26000'));
    });
});
