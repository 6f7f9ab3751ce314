import type { IRandomSource } from '../ports';

/**
 * Non-cryptographic random source backed by Math.random.
 * Replacement tokens only need to hide the original value, not resist prediction.
 */
export class MathRandomSource implements IRandomSource {
    nextInt(maxExclusive: number): number {
        if (!Number.isInteger(maxExclusive) || maxExclusive < 1) {
            throw new RangeError(`maxExclusive must be a positive integer, got ${maxExclusive}`);
        }
        return Math.floor(Math.random() * maxExclusive);
    }
}
