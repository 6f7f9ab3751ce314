import type { ITextFileRepository } from '../ports';
import { logger } from '../logger';
import { compilePatterns, resolvePatternSet, type PatternReport, type SerialMasker } from '../serial-masking';

export type MaskFileUseCaseDeps = {
    masker: SerialMasker;
    fileRepo: ITextFileRepository;
};

export type MaskFileParams = {
    inputPath: string;
    outputPath: string;
    /** Built-in defaults when empty */
    patterns: readonly string[];
    /** Forced encoding; detected from the input when omitted */
    encoding?: string;
};

export type MaskFileResult = {
    encoding: string;
    replacements: number;
    perPattern: PatternReport[];
};

/**
 * Read a file, mask its serial numbers and write the result.
 * The output is only written once the whole transform has succeeded.
 */
export class MaskFileUseCase {
    constructor(private readonly deps: MaskFileUseCaseDeps) {}

    async execute(params: MaskFileParams): Promise<MaskFileResult> {
        const { inputPath, outputPath, patterns, encoding } = params;
        const { masker, fileRepo } = this.deps;

        const compiled = compilePatterns(resolvePatternSet(patterns));
        logger.debug(
            { patterns: compiled.map((p) => p.source), defaults: patterns.length === 0 },
            'Patterns compiled',
        );

        const input = await fileRepo.read(inputPath, encoding);
        const result = masker.maskCompiled(input.text, compiled);
        await fileRepo.write(outputPath, { text: result.text, encoding: input.encoding });

        logger.info(
            { inputPath, outputPath, encoding: input.encoding, replacements: result.replacements },
            'Successfully processed',
        );

        return { encoding: input.encoding, replacements: result.replacements, perPattern: result.perPattern };
    }
}
