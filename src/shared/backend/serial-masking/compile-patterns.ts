import { PatternError, describeError } from '../errors';
import type { CompiledPattern } from './types';

/**
 * Compile every pattern up front so a malformed one aborts before any text is touched.
 * @throws PatternError naming the first pattern that fails to compile
 */
export function compilePatterns(patterns: readonly string[]): CompiledPattern[] {
    return patterns.map((source) => {
        try {
            return { source, regex: new RegExp(source, 'g') };
        } catch (error) {
            throw new PatternError(source, `Invalid regular expression: ${source} - ${describeError(error)}`, {
                cause: error,
            });
        }
    });
}
