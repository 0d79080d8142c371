/**
 * Text cleanup helpers shared by the normalizer and the fingerprint code.
 */

/**
 * Trim and collapse runs of whitespace to single spaces
 * "  12   Main\tSt " → "12 Main St"
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Title-case every word, keeping the letter after an apostrophe upper-case
 * "o'brien  LANE" → "O'Brien Lane"
 */
export function titleCase(value: string): string {
  return collapseWhitespace(value)
    .toLowerCase()
    .replace(/\b([a-z])/g, (letter) => letter.toUpperCase());
}

/**
 * Header text as compared during mapping: lower-case, and spaces, underscores
 * and hyphens treated as the same separator
 * "Property_Street" → "property street"
 */
export function normalizeHeader(header: string): string {
  return header
    .toLowerCase()
    .replace(/[\s_-]+/g, ' ') // Separators to one space
    .trim();
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}
