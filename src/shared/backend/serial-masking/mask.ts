import { logger } from '../logger';
import type { IRandomSource } from '../ports';
import { MathRandomSource } from '../random';
import { compilePatterns } from './compile-patterns';
import { resolvePatternSet } from './default-patterns';
import { generateReplacementToken } from './replacement-token';
import type { CompiledPattern, MaskResult, PatternReport, SerialMatch, TokenStyle } from './types';

export type SerialMaskerConfig = {
    /** Replacement token style (default: preserve) */
    tokenStyle?: TokenStyle;
};

type Span = { start: number; end: number };

/**
 * Find non-overlapping matches of one pattern, skipping spans already replaced
 * by an earlier pattern. Scanning resumes after the end of a blocking span.
 */
function findMatches(
    text: string,
    pattern: CompiledPattern,
    patternIndex: number,
    protectedSpans: readonly Span[],
): SerialMatch[] {
    const { regex } = pattern;
    const matches: SerialMatch[] = [];

    regex.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
        const start = match.index;
        const end = start + match[0].length;

        if (end === start) {
            regex.lastIndex = start + 1;
            continue;
        }

        const blocking = protectedSpans.find((span) => start < span.end && end > span.start);
        if (blocking) {
            regex.lastIndex = blocking.end;
            continue;
        }

        matches.push({ start, end, text: match[0], patternIndex });
    }

    return matches;
}

/**
 * Replaces serial numbers with random tokens of the same length and shape.
 * Each match is randomized independently: repeated values get unrelated tokens.
 */
export class SerialMasker {
    private readonly tokenStyle: TokenStyle;

    constructor(
        private readonly random: IRandomSource = new MathRandomSource(),
        config: SerialMaskerConfig = {},
    ) {
        this.tokenStyle = config.tokenStyle ?? 'preserve';
    }

    /**
     * Mask every match of `patterns` (built-in defaults when empty or omitted).
     * @throws PatternError if a pattern does not compile; nothing is masked in that case
     */
    mask(text: string, patterns?: readonly string[]): string {
        return this.maskWithReport(text, patterns).text;
    }

    maskWithReport(text: string, patterns?: readonly string[]): MaskResult {
        return this.maskCompiled(text, compilePatterns(resolvePatternSet(patterns)));
    }

    /**
     * Apply already compiled patterns in order. Replaced spans are protected from later patterns.
     */
    maskCompiled(text: string, patterns: readonly CompiledPattern[]): MaskResult {
        const perPattern: PatternReport[] = patterns.map((p) => ({ pattern: p.source, count: 0 }));
        if (text.length === 0) {
            return { text, replacements: 0, perPattern };
        }

        const protectedSpans: Span[] = [];
        let masked = text;
        let replacements = 0;

        patterns.forEach((pattern, patternIndex) => {
            const matches = findMatches(masked, pattern, patternIndex, protectedSpans);
            if (matches.length === 0) return;

            let rebuilt = '';
            let cursor = 0;
            for (const match of matches) {
                const token = generateReplacementToken(match.text, this.random, this.tokenStyle);
                logger.debug(
                    { original: match.text, replacement: token, offset: match.start, pattern: pattern.source },
                    'Masked serial number',
                );
                rebuilt += masked.slice(cursor, match.start) + token;
                cursor = match.end;
                protectedSpans.push({ start: match.start, end: match.end });
            }
            masked = rebuilt + masked.slice(cursor);

            perPattern[patternIndex].count = matches.length;
            replacements += matches.length;
        });

        return { text: masked, replacements, perPattern };
    }
}
