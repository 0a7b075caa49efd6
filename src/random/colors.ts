import { hslToColor, MAX_CHANNEL, mixColors, rgba, toColor } from '../color/color';
import type { Color } from '../color/color';
import { defaultStyleLogger } from '../core/logger';
import type { StyleLogger } from '../core/logger';
import { InvalidArgumentError } from '../shared/errors';
import { clamp, wrap } from '../shared/utils';
import { randomBetween, randomDecimal } from './numbers';

export type OpacityRange = { min: number; max: number };

export type ChannelMultiplier = number | readonly [number, number, number];

export type RandomColorOptions = {
  /** Scales the upper bound of each channel draw; `[r, g, b]` or one value for all. */
  multiplier?: ChannelMultiplier;
  /** Fixed alpha, or a range to draw it from. */
  opacity?: number | OpacityRange;
};

export type RandomHueColorOptions = {
  opacity?: number;
};

export type RandomMixOptions = {
  /** Lower bound of the weight of `first`, in percent. */
  min?: number;
  max?: number;
};

export const SATURATION_RANGE = { min: 20, max: 100 } as const;
export const LIGHTNESS_RANGE = { min: 20, max: 80 } as const;

const clampOpacity = (
  source: string,
  parameter: string,
  value: number,
  logger: StyleLogger,
): number => {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(parameter, value, 'expected a finite number');
  }
  const used = clamp(value, 0, 1);
  if (used !== value) {
    logger.onValueAdjusted(source, {
      parameter,
      given: value,
      used,
      reason: 'clamped to [0, 1]',
    });
  }
  return used;
};

const resolveOpacity = (
  opacity: number | OpacityRange,
  random: () => number,
  logger: StyleLogger,
): number => {
  if (typeof opacity === 'number') {
    return clampOpacity('randomColor', 'opacity', opacity, logger);
  }
  if (opacity.min < 0) {
    throw new InvalidArgumentError('opacity.min', opacity.min, 'must not be negative');
  }
  if (opacity.max < 0) {
    throw new InvalidArgumentError('opacity.max', opacity.max, 'must not be negative');
  }
  const min = clampOpacity('randomColor', 'opacity.min', opacity.min, logger);
  const max = clampOpacity('randomColor', 'opacity.max', opacity.max, logger);
  return randomDecimal(min, max, random);
};

const multiplierFor = (multiplier: ChannelMultiplier, index: number): number => {
  const value = typeof multiplier === 'number' ? multiplier : multiplier[index];
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError('multiplier', value, 'expected a non-negative number');
  }
  return value;
};

/**
 * Draws each channel from `[1, 255 × multiplier]` and clamps it to 255, so a
 * multiplier above 1 biases that channel towards full intensity.
 */
export function randomColor(
  options: RandomColorOptions = {},
  random: () => number = Math.random,
  logger: StyleLogger = defaultStyleLogger,
): Color {
  const multiplier = options.multiplier ?? 1;
  const bounds = [0, 1, 2].map((index) =>
    Math.round(MAX_CHANNEL * multiplierFor(multiplier, index)),
  );
  const alpha = resolveOpacity(options.opacity ?? 1, random, logger);
  const [r, g, b] = bounds.map((bound) =>
    clamp(randomBetween(1, bound, random), 0, MAX_CHANNEL),
  );
  return rgba(r ?? 0, g ?? 0, b ?? 0, alpha);
}

export function randomHueColor(
  hue: number,
  options: RandomHueColorOptions = {},
  random: () => number = Math.random,
  logger: StyleLogger = defaultStyleLogger,
): Color {
  if (!Number.isFinite(hue)) {
    throw new InvalidArgumentError('hue', hue, 'expected a finite number');
  }
  const wrapped = wrap(hue, 360);
  if (wrapped !== hue) {
    logger.onValueAdjusted('randomHueColor', {
      parameter: 'hue',
      given: hue,
      used: wrapped,
      reason: 'wrapped to [0, 360)',
    });
  }
  const alpha = clampOpacity('randomHueColor', 'opacity', options.opacity ?? 1, logger);
  const saturation = randomBetween(SATURATION_RANGE.min, SATURATION_RANGE.max, random);
  const lightness = randomBetween(LIGHTNESS_RANGE.min, LIGHTNESS_RANGE.max, random);
  return hslToColor(wrapped, saturation, lightness, alpha);
}

const clampWeight = (parameter: string, value: number, logger: StyleLogger): number => {
  const used = clamp(value, 0, 100);
  if (used !== value) {
    logger.onValueAdjusted('randomMix', {
      parameter,
      given: value,
      used,
      reason: 'clamped to [0, 100]',
    });
  }
  return used;
};

/** Mixes two colors with a weight drawn from `[min, max]` percent. */
export function randomMix(
  first: Color | string,
  second: Color | string,
  options: RandomMixOptions = {},
  random: () => number = Math.random,
  logger: StyleLogger = defaultStyleLogger,
): Color {
  const a = toColor(first);
  const b = toColor(second);
  const min = clampWeight('min', options.min ?? 0, logger);
  const max = clampWeight('max', options.max ?? 100, logger);
  return mixColors(a, b, randomBetween(min, max, random));
}
