import { CommanderError } from 'commander';
import { parseMaskerConfig } from '../../shared/config';
import { createMaskerContainer, MASK_FILE_USE_CASE } from '../../shared/backend/container';
import { FileReadError, FileWriteError, isMaskingFailure, type MaskingFailure } from '../../shared/backend/errors';
import { logger, setLogLevel } from '../../shared/backend/logger';
import type { MaskFileUseCase } from '../../shared/backend/use-cases/mask-file.use-case';
import { createProgram, type CliIo, type CliOptions } from './program';

export const EXIT_CODES = {
    success: 0,
    usage: 1,
    fileRead: 2,
    fileWrite: 3,
} as const;

const processIo: CliIo = {
    writeOut: (str) => process.stdout.write(str),
    writeErr: (str) => process.stderr.write(str),
};

function exitCodeFor(error: MaskingFailure): number {
    if (error instanceof FileReadError) return EXIT_CODES.fileRead;
    if (error instanceof FileWriteError) return EXIT_CODES.fileWrite;
    return EXIT_CODES.usage;
}

/**
 * Run the CLI against `argv` (node and script path first, as in process.argv).
 * Resolves to the process exit code; unexpected errors are rethrown.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
    const program = createProgram(io);
    try {
        program.parse([...argv]);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }

    try {
        const config = parseMaskerConfig(program.opts<CliOptions>());
        if (config.debug) {
            setLogLevel('debug');
            logger.debug('Debug mode enabled.');
        }

        const container = createMaskerContainer(config);
        await container.resolve<MaskFileUseCase>(MASK_FILE_USE_CASE).execute({
            inputPath: config.inputPath,
            outputPath: config.outputPath,
            patterns: config.patterns,
            encoding: config.encoding,
        });
        return EXIT_CODES.success;
    } catch (error) {
        if (!isMaskingFailure(error)) {
            throw error;
        }
        logger.error({ err: error, code: error.code }, 'Serial number masking failed');
        io.writeErr(`error: ${error.message}\n`);
        return exitCodeFor(error);
    }
}
