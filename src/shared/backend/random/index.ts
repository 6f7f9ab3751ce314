export { MathRandomSource } from './math-random.source';
