export { TextFileRepository } from './text-file.repository';
