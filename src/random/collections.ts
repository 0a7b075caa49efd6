import { isColor } from '../color/color';
import type { CssValue } from '../css/types';
import { InvalidArgumentError } from '../shared/errors';
import { flattenSingleton, isRecord } from '../shared/utils';
import type { ListInput } from '../shared/utils';

export type ValueMap = {
  readonly [key: string]: CssValue | ValueMap;
};

export function randomListItem<T>(
  values: ListInput<T>,
  random: () => number = Math.random,
): T {
  const list = flattenSingleton(values);
  if (list.length === 0) {
    throw new InvalidArgumentError('list', values, 'expected at least one item');
  }
  return list[Math.floor(random() * list.length)]!;
}

const isValueMap = (value: CssValue | ValueMap): value is ValueMap =>
  isRecord(value) && !isColor(value);

/** Leaf values of `map` in depth-first key order. */
export function flattenValueMap(map: ValueMap): CssValue[] {
  const out: CssValue[] = [];
  for (const value of Object.values(map)) {
    if (isValueMap(value)) {
      out.push(...flattenValueMap(value));
    } else {
      out.push(value);
    }
  }
  return out;
}

export function randomMapValue(
  map: ValueMap,
  random: () => number = Math.random,
): CssValue {
  const values = flattenValueMap(map);
  if (values.length === 0) {
    throw new InvalidArgumentError('map', map, 'expected at least one value');
  }
  return randomListItem(values, random);
}
