import { InvalidArgumentError } from '../errors';
import { isInteger } from './math';

export function requireIntAtLeast(
  value: unknown,
  min: number,
  name: string,
): number {
  if (!isInteger(value)) {
    throw new InvalidArgumentError(name, value, 'expected an integer');
  }
  if (value < min) {
    throw new InvalidArgumentError(name, value, `expected at least ${min}`);
  }
  return value;
}

export function requirePositiveInt(value: unknown, name: string): number {
  return requireIntAtLeast(value, 1, name);
}

export type DiceNotation = {
  count: number;
  sides: number;
};

const DICE_PATTERN = /^(\d+)d(\d+)$/i;

export function parseDiceNotation(notation: string): DiceNotation {
  const match = DICE_PATTERN.exec(notation.trim());
  if (!match) {
    throw new InvalidArgumentError('dice', notation, 'expected "NdM"');
  }
  const count = Number.parseInt(match[1] ?? '', 10);
  const sides = Number.parseInt(match[2] ?? '', 10);
  return {
    count: requirePositiveInt(count, 'dice count'),
    sides: requirePositiveInt(sides, 'dice sides'),
  };
}
