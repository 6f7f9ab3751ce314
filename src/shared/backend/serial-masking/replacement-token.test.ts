import { MathRandomSource } from '../random';
import { fixedRandom, SequenceRandomSource } from '../../../test/random';
import { classifyChar, generateReplacementToken } from './replacement-token';

describe('classifyChar', () => {
    it('should classify ASCII digits and letters', () => {
        expect(classifyChar('7')).toBe('digit');
        expect(classifyChar('Q')).toBe('upper');
        expect(classifyChar('q')).toBe('lower');
    });

    it('should treat punctuation, whitespace and non-ASCII letters as other', () => {
        expect(classifyChar('-')).toBe('other');
        expect(classifyChar(' ')).toBe('other');
        expect(classifyChar('é')).toBe('other');
        expect(classifyChar('Ä')).toBe('other');
    });
});

describe('generateReplacementToken', () => {
    it('should draw each position from the alphabet of its class', () => {
        expect(generateReplacementToken('Ab3-x', fixedRandom(0))).toBe('Aa0-a');
        expect(generateReplacementToken('Ab3-x', fixedRandom(1))).toBe('Bb1-b');
        expect(generateReplacementToken('a1B', new SequenceRandomSource([25, 9, 25]))).toBe('z9Z');
    });

    it('should not consume randomness for characters it keeps', () => {
        const random = new SequenceRandomSource([1, 2, 3]);
        expect(generateReplacementToken('A-B_C', random)).toBe('B-C_D');
    });

    it('should use A-Z0-9 for every position in alphanumeric style', () => {
        expect(generateReplacementToken('Ab3-x', fixedRandom(0), 'alphanumeric')).toBe('AAAAA');
        expect(generateReplacementToken('Ab3-x', fixedRandom(27), 'alphanumeric')).toBe('11111');
    });

    it('should return an empty token for an empty match', () => {
        expect(generateReplacementToken('', fixedRandom(0))).toBe('');
    });

    it('should keep length and per-position class with a real random source', () => {
        const random = new MathRandomSource();
        const original = 'Ab9-zZ_0é';

        for (let run = 0; run < 50; run++) {
            const token = generateReplacementToken(original, random);
            expect(token).toHaveLength(original.length);
            for (let i = 0; i < original.length; i++) {
                expect(classifyChar(token.charAt(i))).toBe(classifyChar(original.charAt(i)));
                if (classifyChar(original.charAt(i)) === 'other') {
                    expect(token.charAt(i)).toBe(original.charAt(i));
                }
            }
        }
    });
});
