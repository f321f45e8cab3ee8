/**
 * Date helpers. Calendar dates are YYYY-MM-DD strings; arithmetic on them
 * is done in UTC so the host timezone never leaks in.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

/**
 * Format date as ISO YYYY-MM-DD string using UTC components.
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Calendar date of an instant as seen at the given UTC offset.
 */
export function toLocalDate(date: Date, utcOffsetMinutes: number): string {
    return formatIsoDate(new Date(date.getTime() + utcOffsetMinutes * MS_PER_MINUTE));
}

/**
 * Wall-clock time (HH:MM:SS) of an instant at the given UTC offset.
 */
export function toLocalTime(date: Date, utcOffsetMinutes: number): string {
    const shifted = new Date(date.getTime() + utcOffsetMinutes * MS_PER_MINUTE);
    return [shifted.getUTCHours(), shifted.getUTCMinutes(), shifted.getUTCSeconds()]
        .map((n) => String(n).padStart(2, '0'))
        .join(':');
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * Rejects impossible dates such as 2026-02-30.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;
    return buildUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

/**
 * Parse DD/MM/YYYY (the spreadsheet's date column) to Date (UTC).
 */
export function parseDmyDate(value: string): Date | null {
    const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;
    return buildUtcDate(parseInt(match[3], 10), parseInt(match[2], 10), parseInt(match[1], 10));
}

/**
 * Format YYYY-MM-DD as DD/MM/YYYY.
 */
export function formatDmyDate(isoDate: string): string {
    const [year, month, day] = isoDate.split('-');
    return `${day}/${month}/${year}`;
}

/**
 * Shift a YYYY-MM-DD date by a whole number of days.
 */
export function shiftIsoDate(isoDate: string, days: number): string {
    const date = parseIsoDate(isoDate);
    if (!date) {
        throw new Error(`Invalid date "${isoDate}", expected YYYY-MM-DD`);
    }
    return formatIsoDate(new Date(date.getTime() + days * MS_PER_DAY));
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }
    return date;
}
