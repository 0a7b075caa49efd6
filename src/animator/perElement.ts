import type { StyleContext } from '../core/context';
import { nthChildSelector } from '../css/selectors';
import type { StyleRule } from '../css/types';
import type { PerElementOptions } from './types';
import { validatePerElement } from './validate';

/** `property: generator(...args)` for each of the first `elementCount` children. */
export const randomPerElement = <TArgs extends unknown[]>(
  context: StyleContext,
  options: PerElementOptions<TArgs>,
): StyleRule[] => {
  const elementCount = validatePerElement(options);
  const rules = Array.from({ length: elementCount }, (_, i) => ({
    selector: nthChildSelector(options.selector, i + 1),
    declarations: [{ property: options.property, value: options.generator(...options.args) }],
    keyframes: [],
  }));
  context.logger.onRulesGenerated('randomPerElement', rules.length, []);
  return rules;
};
