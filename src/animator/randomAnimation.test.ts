import { describe, expect, it, vi } from 'vitest';
import type { StyleContext } from '../core/context';
import { createNamePool } from '../css/names';
import type { StyleRule } from '../css/types';
import { InvalidArgumentError } from '../shared/errors';
import {
  computeStepPercentages,
  generateRandomAnimations,
  MAX_STEP_COUNT,
} from './randomAnimation';

const createContext = (prefixMode = false): StyleContext => ({
  config: { prefixMode, vendorPrefixes: ['-webkit-'] },
  names: createNamePool('anim'),
  logger: { onValueAdjusted: vi.fn(), onRulesGenerated: vi.fn() },
});

const counter = () => {
  let n = 0;
  return () => {
    n += 1;
    return n;
  };
};

const stepValues = (rule: StyleRule | undefined, block = 0) =>
  rule?.keyframes[block]?.steps.map((step) => step.declarations[0]?.value);

const noArgs: [] = [];

describe('computeStepPercentages', () => {
  it('spaces steps evenly from 0 to 100', () => {
    expect(computeStepPercentages(2)).toEqual([0, 100]);
    expect(computeStepPercentages(3)).toEqual([0, 50, 100]);
    expect(computeStepPercentages(4)).toEqual([0, 33, 66, 100]);
    expect(computeStepPercentages(5)).toEqual([0, 25, 50, 75, 100]);
  });
  it('yields distinct ascending values for every valid count', () => {
    for (let count = 2; count <= MAX_STEP_COUNT; count += 1) {
      const table = computeStepPercentages(count);
      expect(table).toHaveLength(count);
      expect(table[0]).toBe(0);
      expect(table[count - 1]).toBe(100);
      for (let k = 1; k < count; k += 1) {
        const gap = (table[k] ?? 0) - (table[k - 1] ?? 0);
        expect(gap).toBeGreaterThanOrEqual(Math.floor(100 / (count - 1)));
        expect(gap).toBeLessThanOrEqual(Math.ceil(100 / (count - 1)));
      }
    }
  });
  it('rejects counts that cannot form a progression', () => {
    expect(() => computeStepPercentages(1)).toThrow(
      'Invalid stepCount: expected at least 2 (received 1)',
    );
    expect(() => computeStepPercentages(2.5)).toThrow(InvalidArgumentError);
    expect(() => computeStepPercentages(102)).toThrow(
      'Invalid stepCount: expected at most 101 (received 102)',
    );
  });
});

describe('generateRandomAnimations', () => {
  it('emits one named animation per element', () => {
    const context = createContext();
    const rules = generateRandomAnimations(context, {
      selector: '.dot',
      elementCount: 2,
      property: 'color',
      timing: '2s infinite',
      stepCount: 3,
      generator: () => 'red',
      args: [],
    });

    expect(rules).toHaveLength(2);
    expect(rules.map((r) => r.selector)).toEqual(['.dot:nth-child(1)', '.dot:nth-child(2)']);
    expect(rules.map((r) => r.keyframes.map((k) => k.name))).toEqual([['anim-1'], ['anim-2']]);
    for (const rule of rules) {
      expect(rule.keyframes[0]?.steps.map((s) => s.percentage)).toEqual([0, 50, 100]);
      expect(rule.keyframes[0]?.steps[1]?.declarations).toEqual([
        { property: 'color', value: 'red' },
      ]);
    }
    expect(rules[0]?.declarations).toEqual([
      { property: 'animation', value: 'anim-1 2s infinite' },
    ]);
    expect(rules[1]?.declarations).toEqual([
      { property: 'animation', value: 'anim-2 2s infinite' },
    ]);
  });

  it('calls the generator once per step with the forwarded arguments', () => {
    const generator = vi.fn((size: number, unit: string) => `${size}${unit}`);
    generateRandomAnimations(createContext(), {
      selector: 'li',
      elementCount: 3,
      property: 'width',
      timing: '1s',
      stepCount: 4,
      generator,
      args: [10, 'px'],
    });
    expect(generator).toHaveBeenCalledTimes(12);
    for (const call of generator.mock.calls) {
      expect(call).toEqual([10, 'px']);
    }
  });

  it('gives each element its own value progression', () => {
    const rules = generateRandomAnimations(createContext(), {
      selector: 'li',
      elementCount: 2,
      property: 'opacity',
      timing: '1s',
      stepCount: 3,
      generator: counter(),
      args: [],
    });
    expect(rules.map((rule) => stepValues(rule))).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('shares step values between vendor and standard keyframes', () => {
    const rules = generateRandomAnimations(createContext(true), {
      selector: 'li',
      elementCount: 2,
      property: 'opacity',
      timing: '1s',
      stepCount: 2,
      generator: counter(),
      args: [],
    });
    const [first, second] = rules;
    expect(first?.keyframes.map((k) => k.vendorPrefix)).toEqual(['-webkit-', undefined]);
    expect(stepValues(first, 0)).toEqual([1, 2]);
    expect(stepValues(first, 1)).toEqual([1, 2]);
    expect(stepValues(second, 0)).toEqual([3, 4]);
    expect(stepValues(second, 1)).toEqual([3, 4]);
    expect(first?.declarations).toEqual([
      { property: '-webkit-animation', value: 'anim-1 1s' },
      { property: 'animation', value: 'anim-1 1s' },
    ]);
  });

  it('avoids names already taken in the stylesheet', () => {
    const context = createContext();
    context.names.reserve('anim-1');
    const first = generateRandomAnimations(context, {
      selector: 'li',
      elementCount: 1,
      property: 'opacity',
      timing: '1s',
      stepCount: 2,
      generator: () => 1,
      args: [],
    });
    const second = generateRandomAnimations(context, {
      selector: 'p',
      elementCount: 2,
      property: 'opacity',
      timing: '1s',
      stepCount: 2,
      generator: () => 1,
      args: [],
    });
    const names = [...first, ...second].map((rule) => rule.keyframes[0]?.name);
    expect(names).toEqual(['anim-2', 'anim-3', 'anim-4']);
  });

  it('omits the timing when it is blank', () => {
    const [rule] = generateRandomAnimations(createContext(), {
      selector: 'li',
      elementCount: 1,
      property: 'opacity',
      timing: '  ',
      stepCount: 2,
      generator: () => 0,
      args: [],
    });
    expect(rule?.declarations).toEqual([{ property: 'animation', value: 'anim-1' }]);
  });

  it('reports the generated names', () => {
    const context = createContext();
    generateRandomAnimations(context, {
      selector: 'li',
      elementCount: 2,
      property: 'opacity',
      timing: '1s',
      stepCount: 2,
      generator: () => 0,
      args: [],
    });
    expect(context.logger.onRulesGenerated).toHaveBeenCalledWith('randomAnimation', 2, [
      'anim-1',
      'anim-2',
    ]);
  });

  it('fails before generating anything on invalid counts', () => {
    const context = createContext();
    const generator = vi.fn(() => 0);
    const base = {
      selector: 'li',
      property: 'opacity',
      timing: '1s',
      generator,
      args: noArgs,
    };
    expect(() =>
      generateRandomAnimations(context, { ...base, elementCount: 0, stepCount: 3 }),
    ).toThrow('Invalid elementCount: expected at least 1 (received 0)');
    expect(() =>
      generateRandomAnimations(context, { ...base, elementCount: 3, stepCount: 1 }),
    ).toThrow('Invalid stepCount: expected at least 2 (received 1)');
    expect(() =>
      generateRandomAnimations(context, { ...base, elementCount: 1.5, stepCount: 3 }),
    ).toThrow(InvalidArgumentError);
    expect(generator).not.toHaveBeenCalled();
    expect(context.names.size).toBe(0);
    expect(context.logger.onRulesGenerated).not.toHaveBeenCalled();
  });

  it('takes no names when the generator throws on a later element', () => {
    const context = createContext();
    const generator = vi
      .fn(() => 1)
      .mockImplementationOnce(() => 1)
      .mockImplementationOnce(() => 2)
      .mockImplementationOnce(() => {
        throw new Error('out of values');
      });
    expect(() =>
      generateRandomAnimations(context, {
        selector: 'li',
        elementCount: 2,
        property: 'opacity',
        timing: '1s',
        stepCount: 2,
        generator,
        args: noArgs,
      }),
    ).toThrow('out of values');
    expect(generator).toHaveBeenCalledTimes(3);
    expect(context.names.size).toBe(0);
    expect(context.logger.onRulesGenerated).not.toHaveBeenCalled();
    expect(context.names.next()).toBe('anim-1');
  });

  it('rejects an empty selector or property', () => {
    const options = {
      selector: 'li',
      elementCount: 1,
      property: 'opacity',
      timing: '1s',
      stepCount: 2,
      generator: () => 0,
      args: noArgs,
    };
    expect(() => generateRandomAnimations(createContext(), { ...options, selector: '' })).toThrow(
      'Invalid selector: must not be empty (received "")',
    );
    expect(() => generateRandomAnimations(createContext(), { ...options, property: ' ' })).toThrow(
      InvalidArgumentError,
    );
  });
});
