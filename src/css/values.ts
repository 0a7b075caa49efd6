import { formatColor } from '../color/color';
import { formatNumber } from '../shared/utils';
import type { CssValue } from './types';

export const formatValue = (value: CssValue): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return formatNumber(value);
  return formatColor(value);
};
