export type { CharClass, CompiledPattern, MaskResult, PatternReport, SerialMatch, TokenStyle } from './types';
export { SerialMasker, type SerialMaskerConfig } from './mask';
export { compilePatterns } from './compile-patterns';
export { DEFAULT_SERIAL_PATTERNS, resolvePatternSet } from './default-patterns';
export { classifyChar, generateReplacementToken } from './replacement-token';
