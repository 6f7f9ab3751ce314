export interface IRandomSource {
    /**
     * Uniform integer in `[0, maxExclusive)`.
     * @throws RangeError if maxExclusive is not a positive integer
     */
    nextInt(maxExclusive: number): number;
}
