import { afterEach, describe, expect, it, vi } from 'vitest';
import { createStyleLogger } from './logger';

describe('createStyleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('warns about adjusted values with context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const adjustment = {
      parameter: 'opacity',
      given: 1.5,
      used: 1,
      reason: 'clamped to [0, 1]',
    };
    createStyleLogger().onValueAdjusted('randomColor', adjustment);
    expect(warn).toHaveBeenCalledWith(
      'randomColor: opacity clamped to [0, 1]',
      adjustment,
    );
  });

  it('reports generated rules at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    createStyleLogger().onRulesGenerated('animate', 2, ['a-1', 'a-2']);
    expect(debug).toHaveBeenCalledWith('Style rules generated', {
      source: 'animate',
      ruleCount: 2,
      names: ['a-1', 'a-2'],
    });
  });
});
