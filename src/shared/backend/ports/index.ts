export type { IRandomSource } from './random-source.interface';
export type { ITextFileRepository, TextFileContents } from './text-file-repository.interface';
