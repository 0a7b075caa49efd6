import { InvalidArgumentError } from '../shared/errors';
import { requirePositiveInt } from '../shared/utils';
import type { PerElementOptions } from './types';

export const validatePerElement = <TArgs extends unknown[]>(
  options: PerElementOptions<TArgs>,
): number => {
  if (options.selector.trim() === '') {
    throw new InvalidArgumentError('selector', options.selector, 'must not be empty');
  }
  if (options.property.trim() === '') {
    throw new InvalidArgumentError('property', options.property, 'must not be empty');
  }
  return requirePositiveInt(options.elementCount, 'elementCount');
};
