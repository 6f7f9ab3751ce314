export type TextFileContents = {
    text: string;
    /** Encoding the text was decoded from and will be encoded back to. */
    encoding: string;
};

export interface ITextFileRepository {
    /**
     * Read and decode a whole file. Detects the encoding unless one is given.
     * @throws FileReadError if the file is missing, unreadable or cannot be decoded
     */
    read(path: string, encoding?: string): Promise<TextFileContents>;

    /**
     * Encode and write a whole file, replacing any previous contents.
     * @throws FileWriteError if the path cannot be written
     */
    write(path: string, contents: TextFileContents): Promise<void>;
}
