export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Shortest decimal text for `value`, at most `decimals` fraction digits. */
export function formatNumber(value: number, decimals = 3): string {
  const rounded = roundTo(value, decimals);
  return Object.is(rounded, -0) ? '0' : String(rounded);
}
