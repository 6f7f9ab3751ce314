/**
 * Built-in serial number shapes, applied in this order when no patterns are supplied.
 * - UUID-like: 8-4-4-4-12 alphanumeric groups
 * - SN: label followed by a 10 character value (only the value is matched)
 * - Segmented: hyphen-joined uppercase groups, 6-20 chars, at least one digit and one letter
 * - Plain run: 6-20 uppercase alphanumerics with at least one digit and one letter
 */
export const DEFAULT_SERIAL_PATTERNS: readonly string[] = [
    String.raw`\b[A-Za-z0-9]{8}-[A-Za-z0-9]{4}-[A-Za-z0-9]{4}-[A-Za-z0-9]{4}-[A-Za-z0-9]{12}\b`,
    String.raw`(?<=\bSN:)[A-Z0-9]{10}\b`,
    String.raw`\b(?=[A-Z0-9-]{6,20}\b)(?![A-Z0-9-]{21})(?=[A-Z0-9-]*\d)(?=[A-Z0-9-]*[A-Z])[A-Z0-9]{2,}(?:-[A-Z0-9]{2,})+\b`,
    String.raw`\b(?=[A-Z0-9]*\d)(?=[A-Z0-9]*[A-Z])[A-Z0-9]{6,20}\b`,
];

export function resolvePatternSet(patterns?: readonly string[]): readonly string[] {
    return patterns && patterns.length > 0 ? patterns : DEFAULT_SERIAL_PATTERNS;
}
