export function shuffleInPlace<T>(
  values: T[],
  random: () => number = Math.random,
): T[] {
  for (let i = values.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [values[i], values[j]] = [values[j]!, values[i]!];
  }
  return values;
}

export function shuffle<T>(
  values: readonly T[],
  random: () => number = Math.random,
): T[] {
  return shuffleInPlace(values.slice(), random);
}

export type ListInput<T> = readonly T[] | readonly [readonly T[]];

const isSingletonList = <T>(
  values: ListInput<T>,
): values is readonly [readonly T[]] =>
  values.length === 1 && Array.isArray(values[0]);

// A list whose only item is a list stands for that inner list.
export function flattenSingleton<T>(values: ListInput<T>): readonly T[] {
  return isSingletonList(values) ? values[0] : values;
}
