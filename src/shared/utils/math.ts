export const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value % 1 === 0;

export const clamp = (value: number, min: number, max: number): number => {
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  return Math.max(lo, Math.min(hi, value));
};

export const clampInt = (value: number, min: number, max: number): number =>
  clamp(Math.floor(value), min, max);

export const wrap = (value: number, size: number): number =>
  ((value % size) + size) % size;
