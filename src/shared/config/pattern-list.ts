const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Split a comma-separated list of regular expressions.
 * Commas inside groups, character classes, quantifiers or after a backslash
 * belong to the pattern and do not separate entries. Entries of a list are
 * trimmed and blanks dropped; a value without a separating comma is kept verbatim.
 */
export function splitPatternList(value: string): string[] {
    const parts: string[] = [];
    const closers: string[] = [];
    let current = '';

    for (let i = 0; i < value.length; i++) {
        const char = value.charAt(i);

        if (char === '\\' && i + 1 < value.length) {
            current += char + value.charAt(i + 1);
            i++;
            continue;
        }

        const inClass = closers[closers.length - 1] === ']';
        if (char === ',' && closers.length === 0) {
            parts.push(current);
            current = '';
            continue;
        }

        if (char === closers[closers.length - 1]) {
            closers.pop();
        } else if (!inClass && char in OPENERS) {
            closers.push(OPENERS[char]);
        }
        current += char;
    }

    parts.push(current);
    if (parts.length === 1) {
        return current.length > 0 ? [current] : [];
    }
    return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}
