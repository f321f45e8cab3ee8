/**
 * Text normalization for keyword matching.
 */

/**
 * Normalize a message fragment for consistent keyword matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 *
 * @param raw - Raw text
 * @returns Normalized text for matching
 */
export function normalizeDescription(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}
