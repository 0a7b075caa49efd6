export {
  LIGHTNESS_RANGE,
  randomColor,
  randomHueColor,
  randomMix,
  SATURATION_RANGE,
} from './colors';
export type {
  ChannelMultiplier,
  OpacityRange,
  RandomColorOptions,
  RandomHueColorOptions,
  RandomMixOptions,
} from './colors';
export { flattenValueMap, randomListItem, randomMapValue } from './collections';
export type { ValueMap } from './collections';
export { randomBetween, randomDecimal, rollDice } from './numbers';
export {
  createMulberry32,
  createRandomSource,
  createSequenceSource,
  mulberry32Step,
} from './rng';
export type { Mulberry32Step, RandomSource } from './rng';
export { shuffle, shuffleInPlace } from '../shared/utils';
