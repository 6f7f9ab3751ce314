import { open } from 'node:fs/promises';
import { detect } from 'chardet';
import { decode, encode, encodingExists } from 'iconv-lite';
import { logger } from '../logger';
import { FileReadError, FileWriteError, describeError } from '../errors';
import type { ITextFileRepository, TextFileContents } from '../ports';

const EMPTY_FILE_ENCODING = 'UTF-8';

function errnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

async function readAllBytes(path: string): Promise<Buffer> {
    const handle = await open(path, 'r');
    try {
        return await handle.readFile();
    } finally {
        await handle.close();
    }
}

export class TextFileRepository implements ITextFileRepository {
    async read(path: string, encoding?: string): Promise<TextFileContents> {
        let bytes: Buffer;
        try {
            bytes = await readAllBytes(path);
        } catch (error) {
            const message =
                errnoCode(error) === 'ENOENT'
                    ? `Input file not found: ${path}`
                    : `Error reading input file: ${path} - ${describeError(error)}`;
            throw new FileReadError(path, message, { cause: error });
        }

        const resolved = encoding ?? this.detectEncoding(path, bytes);
        if (!encodingExists(resolved)) {
            throw new FileReadError(path, `Unsupported encoding ${resolved} for file: ${path}`);
        }

        // The codec substitutes undecodable bytes instead of failing; a lossy decode
        // would rewrite text outside the masked spans on output.
        const text = decode(bytes, resolved, { stripBOM: false });
        if (!encode(text, resolved).equals(bytes)) {
            throw new FileReadError(path, `Error decoding file ${path} with encoding ${resolved}`);
        }

        logger.debug({ path, encoding: resolved, detected: encoding === undefined, bytes: bytes.length }, 'Input read');
        return { text, encoding: resolved };
    }

    async write(path: string, contents: TextFileContents): Promise<void> {
        const bytes = encode(contents.text, contents.encoding);

        try {
            const handle = await open(path, 'w');
            try {
                await handle.writeFile(bytes);
            } finally {
                await handle.close();
            }
        } catch (error) {
            throw new FileWriteError(path, `Error writing to output file: ${path} - ${describeError(error)}`, {
                cause: error,
            });
        }

        logger.debug({ path, encoding: contents.encoding, bytes: bytes.length }, 'Output written');
    }

    private detectEncoding(path: string, bytes: Buffer): string {
        if (bytes.length === 0) return EMPTY_FILE_ENCODING;
        const detected = detect(bytes);
        if (!detected) {
            throw new FileReadError(path, `Failed to detect encoding for file: ${path}`);
        }
        return detected;
    }
}
