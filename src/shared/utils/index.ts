export type { ListInput } from './array';
export { flattenSingleton, shuffle, shuffleInPlace } from './array';
export { clamp, clampInt, isInteger, wrap } from './math';
export { formatNumber, roundTo } from './numeric';
export type { DiceNotation } from './parse';
export {
  parseDiceNotation,
  requireIntAtLeast,
  requirePositiveInt,
} from './parse';
export { isRecord } from './typeGuards';
