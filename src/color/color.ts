import { InvalidArgumentError } from '../shared/errors';
import { clamp, formatNumber, isRecord } from '../shared/utils';

export type Color = {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
};

export const MAX_CHANNEL = 255;

const channel = (value: number): number => Math.round(clamp(value, 0, MAX_CHANNEL));

export const rgba = (r: number, g: number, b: number, a = 1): Color => ({
  r: channel(r),
  g: channel(g),
  b: channel(b),
  a: clamp(a, 0, 1),
});

export const isColor = (value: unknown): value is Color =>
  isRecord(value) &&
  Object.keys(value).length === 4 &&
  typeof value.r === 'number' &&
  typeof value.g === 'number' &&
  typeof value.b === 'number' &&
  typeof value.a === 'number';

/**
 * Converts HSL to a color. Hue is in degrees, saturation and lightness in
 * percent.
 */
export const hslToColor = (
  hue: number,
  saturation: number,
  lightness: number,
  alpha = 1,
): Color => {
  const s = clamp(saturation, 0, 100) / 100;
  const l = clamp(lightness, 0, 100) / 100;
  const h = ((hue % 360) + 360) % 360;
  const amount = s * Math.min(l, 1 - l);
  const component = (n: number): number => {
    const k = (n + h / 30) % 12;
    return l - amount * Math.max(-1, Math.min(k - 3, 9 - k, 1));
  };
  return rgba(
    component(0) * MAX_CHANNEL,
    component(8) * MAX_CHANNEL,
    component(4) * MAX_CHANNEL,
    alpha,
  );
};

/**
 * Blends two colors the way stylesheet preprocessors implement `mix()`:
 * `weight` is the percentage of `first`, adjusted by the alpha difference.
 */
export const mixColors = (first: Color, second: Color, weight: number): Color => {
  const p = clamp(weight, 0, 100) / 100;
  const w = 2 * p - 1;
  const alphaDelta = first.a - second.a;
  const combined = w * alphaDelta === -1 ? w : (w + alphaDelta) / (1 + w * alphaDelta);
  const w1 = (combined + 1) / 2;
  const w2 = 1 - w1;
  return rgba(
    first.r * w1 + second.r * w2,
    first.g * w1 + second.g * w2,
    first.b * w1 + second.b * w2,
    first.a * p + second.a * (1 - p),
  );
};

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;
const RGB_PATTERN = /^rgba?\(\s*([^)]*)\)$/i;

const parseHex = (digits: string): Color => {
  const full =
    digits.length === 3
      ? digits
          .split('')
          .map((d) => d + d)
          .join('')
      : digits;
  return rgba(
    Number.parseInt(full.slice(0, 2), 16),
    Number.parseInt(full.slice(2, 4), 16),
    Number.parseInt(full.slice(4, 6), 16),
  );
};

export const parseColor = (text: string): Color => {
  const value = text.trim();
  const hex = HEX_PATTERN.exec(value);
  if (hex) return parseHex(hex[1] ?? '');

  const fn = RGB_PATTERN.exec(value);
  if (fn) {
    const parts = (fn[1] ?? '')
      .split(',')
      .map((part) => part.trim())
      .map((part) => (part === '' ? Number.NaN : Number(part)));
    const [r, g, b, a = 1] = parts;
    if (
      (parts.length === 3 || parts.length === 4) &&
      r !== undefined &&
      g !== undefined &&
      b !== undefined &&
      parts.every((part) => Number.isFinite(part))
    ) {
      return rgba(r, g, b, a);
    }
  }
  throw new InvalidArgumentError('color', text, 'expected #rgb, #rrggbb, rgb() or rgba()');
};

export const toColor = (value: Color | string): Color =>
  typeof value === 'string' ? parseColor(value) : value;

const hexByte = (value: number): string => value.toString(16).padStart(2, '0');

export const formatColor = (color: Color): string => {
  if (color.a >= 1) {
    return `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;
  }
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${formatNumber(color.a)})`;
};
