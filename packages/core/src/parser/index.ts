export { extractAmount, removeSpan, normalizeNumeral, DEFAULT_AMOUNT_POLICY } from './amount.js';
export { detectDirection } from './direction.js';
export { parseMessage } from './message.js';
export type { ParseOptions } from './message.js';
