export { parseMaskerConfig, type MaskerConfig, type RawMaskerOptions } from './masker';
export { splitPatternList } from './pattern-list';
