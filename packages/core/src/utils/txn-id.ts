/**
 * Transaction ID generation.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so core stays free of node:crypto.
 */

import { sha256 } from 'js-sha256';
import { TXN_ID } from '../types/index.js';

/**
 * Generate deterministic transaction ID via SHA-256 hash.
 *
 * Payload format: "{created_at}|{source}|{description}"
 *
 * @param createdAt - ISO timestamp of creation
 * @param source - Identity of whoever reported the transaction
 * @param description - Original trimmed message text
 * @returns 16-character hex transaction ID
 */
export function generateTxnId(createdAt: string, source: string, description: string): string {
    const payload = `${createdAt}|${source}|${description}`;
    return sha256(payload).slice(0, TXN_ID.LENGTH);
}
