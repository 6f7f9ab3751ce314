export {
    SerialMasker,
    compilePatterns,
    generateReplacementToken,
    classifyChar,
    DEFAULT_SERIAL_PATTERNS,
    type SerialMaskerConfig,
    type MaskResult,
    type TokenStyle,
} from './shared/backend/serial-masking';
export { MaskFileUseCase, type MaskFileParams, type MaskFileResult } from './shared/backend/use-cases/mask-file.use-case';
export { TextFileRepository } from './shared/backend/repositories';
export { MathRandomSource } from './shared/backend/random';
export type { IRandomSource, ITextFileRepository, TextFileContents } from './shared/backend/ports';
export { FileReadError, FileWriteError, PatternError, ConfigValidationError } from './shared/backend/errors';
export { runCli, EXIT_CODES } from './app/cli/run';
