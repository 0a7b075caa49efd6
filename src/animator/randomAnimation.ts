import type { StyleContext } from '../core/context';
import { emitKeyframes, prefixedDeclarations } from '../css/keyframes';
import { nthChildSelector } from '../css/selectors';
import type { KeyframeStep, StyleRule } from '../css/types';
import { InvalidArgumentError } from '../shared/errors';
import { requireIntAtLeast } from '../shared/utils';
import type { RandomAnimationOptions } from './types';
import { validatePerElement } from './validate';

// Integer percentages stay distinct up to 101 steps.
export const MAX_STEP_COUNT = 101;

export const computeStepPercentages = (stepCount: number): number[] => {
  const count = requireIntAtLeast(stepCount, 2, 'stepCount');
  if (count > MAX_STEP_COUNT) {
    throw new InvalidArgumentError('stepCount', stepCount, `expected at most ${MAX_STEP_COUNT}`);
  }
  return Array.from({ length: count }, (_, k) => Math.floor((k * 100) / (count - 1)));
};

/**
 * One uniquely named keyframe animation per positional element. Each step
 * value comes from its own generator call; vendor duplicates of an
 * element's keyframes reuse those values.
 */
export const generateRandomAnimations = <TArgs extends unknown[]>(
  context: StyleContext,
  options: RandomAnimationOptions<TArgs>,
): StyleRule[] => {
  const elementCount = validatePerElement(options);
  const percentages = computeStepPercentages(options.stepCount);
  const timing = options.timing.trim();

  // Every value is drawn before any name is taken, so a throwing generator
  // leaves the name pool untouched.
  const elementSteps: KeyframeStep[][] = Array.from({ length: elementCount }, () =>
    percentages.map((percentage) => ({
      percentage,
      declarations: [
        { property: options.property, value: options.generator(...options.args) },
      ],
    })),
  );

  const names: string[] = [];
  const rules = elementSteps.map((steps, i): StyleRule => {
    const name = context.names.next();
    names.push(name);
    return {
      selector: nthChildSelector(options.selector, i + 1),
      declarations: prefixedDeclarations(
        'animation',
        timing === '' ? name : `${name} ${timing}`,
        context.config,
      ),
      keyframes: emitKeyframes(name, steps, context.config),
    };
  });

  context.logger.onRulesGenerated('randomAnimation', rules.length, names);
  return rules;
};
