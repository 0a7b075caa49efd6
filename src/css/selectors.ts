import { requirePositiveInt } from '../shared/utils';

export const nthChildSelector = (base: string, index: number): string =>
  `${base}:nth-child(${requirePositiveInt(index, 'index')})`;
