import { z } from 'zod';
import { encodingExists } from 'iconv-lite';
import { ConfigValidationError } from '../backend/errors';
import type { TokenStyle } from '../backend/serial-masking';
import { splitPatternList } from './pattern-list';

const rawMaskerOptionsSchema = z.object({
    input: z.string().trim().min(1, 'Input file path is required'),
    output: z.string().trim().min(1, 'Output file path is required'),
    patterns: z.array(z.string()).optional(),
    encoding: z
        .string()
        .trim()
        .min(1, 'Encoding cannot be empty')
        .refine((name) => encodingExists(name), { message: 'Unknown encoding' })
        .optional(),
    alphanumeric: z.boolean().optional(),
    debug: z.boolean().optional(),
});

export type RawMaskerOptions = z.input<typeof rawMaskerOptionsSchema>;

export type MaskerConfig = {
    inputPath: string;
    outputPath: string;
    /** Empty means the built-in defaults */
    patterns: string[];
    encoding?: string;
    tokenStyle: TokenStyle;
    debug: boolean;
};

const maskerConfigSchema = rawMaskerOptionsSchema.transform(
    (raw): MaskerConfig => ({
        inputPath: raw.input,
        outputPath: raw.output,
        patterns: (raw.patterns ?? []).flatMap(splitPatternList),
        encoding: raw.encoding,
        tokenStyle: raw.alphanumeric ? 'alphanumeric' : 'preserve',
        debug: raw.debug ?? false,
    }),
);

/**
 * Validate raw CLI options into a MaskerConfig.
 * @throws ConfigValidationError describing the first invalid option
 */
export function parseMaskerConfig(raw: RawMaskerOptions): MaskerConfig {
    const parsed = maskerConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const message = issue ? `${issue.path.join('.') || 'options'}: ${issue.message}` : parsed.error.message;
        throw new ConfigValidationError(`Invalid options - ${message}`);
    }
    return parsed.data;
}
