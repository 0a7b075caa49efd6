import { InvalidArgumentError } from '../shared/errors';
import { isInteger, parseDiceNotation } from '../shared/utils';

/** Uniform integer in `[min, max]`, inclusive; reversed bounds are swapped. */
export function randomBetween(
  min: number,
  max: number,
  random: () => number = Math.random,
): number {
  if (!isInteger(min)) throw new InvalidArgumentError('min', min, 'expected an integer');
  if (!isInteger(max)) throw new InvalidArgumentError('max', max, 'expected an integer');
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  return lo + Math.floor(random() * (hi - lo + 1));
}

// Resolution of decimal draws; the grid includes both ends so `max` can come out.
const DECIMAL_STEPS = 2 ** 32;

/** Uniform value in `[min, max]`, inclusive; reversed bounds are swapped. */
export function randomDecimal(
  min: number,
  max: number,
  random: () => number = Math.random,
): number {
  if (!Number.isFinite(min)) throw new InvalidArgumentError('min', min, 'expected a finite number');
  if (!Number.isFinite(max)) throw new InvalidArgumentError('max', max, 'expected a finite number');
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  return lo + (randomBetween(0, DECIMAL_STEPS, random) / DECIMAL_STEPS) * (hi - lo);
}

/** Sums N rolls of an M-sided die for `"NdM"`. */
export function rollDice(notation: string, random: () => number = Math.random): number {
  const { count, sides } = parseDiceNotation(notation);
  let total = 0;
  for (let i = 0; i < count; i += 1) {
    total += randomBetween(1, sides, random);
  }
  return total;
}
