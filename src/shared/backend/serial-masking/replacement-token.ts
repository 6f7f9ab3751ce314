import type { IRandomSource } from '../ports';
import type { CharClass, TokenStyle } from './types';

const DIGITS = '0123456789';
const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
const ALPHANUMERIC = UPPERCASE + DIGITS;

const CLASS_ALPHABETS: Record<Exclude<CharClass, 'other'>, string> = {
    digit: DIGITS,
    upper: UPPERCASE,
    lower: LOWERCASE,
};

export function classifyChar(char: string): CharClass {
    if (char >= '0' && char <= '9') return 'digit';
    if (char >= 'A' && char <= 'Z') return 'upper';
    if (char >= 'a' && char <= 'z') return 'lower';
    return 'other';
}

function pick(alphabet: string, random: IRandomSource): string {
    return alphabet.charAt(random.nextInt(alphabet.length));
}

/**
 * Generate a random token with the same length as `original`.
 * In `preserve` style the class of every position is kept and non-alphanumeric
 * characters are copied through unchanged.
 */
export function generateReplacementToken(
    original: string,
    random: IRandomSource,
    style: TokenStyle = 'preserve',
): string {
    let token = '';
    for (let i = 0; i < original.length; i++) {
        if (style === 'alphanumeric') {
            token += pick(ALPHANUMERIC, random);
            continue;
        }
        const char = original.charAt(i);
        const charClass = classifyChar(char);
        token += charClass === 'other' ? char : pick(CLASS_ALPHABETS[charClass], random);
    }
    return token;
}
