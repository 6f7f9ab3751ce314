export const RANDOM_SOURCE = Symbol('RandomSource');
export const TEXT_FILE_REPOSITORY = Symbol('TextFileRepository');
export const SERIAL_MASKER = Symbol('SerialMasker');
export const MASK_FILE_USE_CASE = Symbol('MaskFileUseCase');
