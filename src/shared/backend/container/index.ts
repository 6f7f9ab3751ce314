export { Container } from './container';
export { createMaskerContainer } from './module';
export { RANDOM_SOURCE, TEXT_FILE_REPOSITORY, SERIAL_MASKER, MASK_FILE_USE_CASE } from './tokens';
