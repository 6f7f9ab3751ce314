import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

// Tests run silent unless a case raises the level itself.
const defaultLevel: LogLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

/**
 * Process-wide logger. Writes synchronously to stderr so diagnostics never mix
 * with anything the CLI prints on stdout and are flushed before exit.
 */
export const logger = pino(
    {
        name: 'serial-masker',
        level: defaultLevel,
        base: undefined,
        timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
);

export type Logger = typeof logger;

export function setLogLevel(level: LogLevel): void {
    logger.level = level;
}
