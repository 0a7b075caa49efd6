export * from './animator';
export * from './color';
export * from './core';
export * from './css';
export * from './random';
export { InvalidArgumentError, isInvalidArgumentError } from './shared/errors';
export {
  clamp,
  flattenSingleton,
  isInteger,
  parseDiceNotation,
  requirePositiveInt,
} from './shared/utils';
export type { DiceNotation, ListInput } from './shared/utils';
