export class FileReadError extends Error {
    readonly code = 'FILE_READ';

    constructor(
        readonly path: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'FileReadError';
    }
}

export class FileWriteError extends Error {
    readonly code = 'FILE_WRITE';

    constructor(
        readonly path: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'FileWriteError';
    }
}

export class PatternError extends Error {
    readonly code = 'PATTERN';

    constructor(
        readonly pattern: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'PatternError';
    }
}

export class ConfigValidationError extends Error {
    readonly code = 'CONFIG_VALIDATION';

    constructor(message: string) {
        super(message);
        this.name = 'ConfigValidationError';
    }
}

export type MaskingFailure = FileReadError | FileWriteError | PatternError | ConfigValidationError;

export function isMaskingFailure(error: unknown): error is MaskingFailure {
    return (
        error instanceof FileReadError ||
        error instanceof FileWriteError ||
        error instanceof PatternError ||
        error instanceof ConfigValidationError
    );
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
