export type CharClass = 'digit' | 'upper' | 'lower' | 'other';

/**
 * - `preserve`: each position keeps its class (digit, upper, lower); other characters stay as they are
 * - `alphanumeric`: every position is drawn from A-Z0-9
 */
export type TokenStyle = 'preserve' | 'alphanumeric';

export type CompiledPattern = {
    /** Pattern string as supplied by the caller. */
    source: string;
    regex: RegExp;
};

export type SerialMatch = {
    start: number;
    end: number;
    text: string;
    patternIndex: number;
};

export type PatternReport = {
    pattern: string;
    count: number;
};

export type MaskResult = {
    text: string;
    replacements: number;
    perPattern: PatternReport[];
};
