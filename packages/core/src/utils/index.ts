export { normalizeDescription } from './normalize.js';
export { generateTxnId } from './txn-id.js';
export {
    formatIsoDate,
    toLocalDate,
    toLocalTime,
    parseIsoDate,
    parseDmyDate,
    formatDmyDate,
    shiftIsoDate,
} from './date.js';
