import { generateRandomAnimations } from '../animator/randomAnimation';
import { randomPerElement } from '../animator/perElement';
import type { PerElementOptions, RandomAnimationOptions } from '../animator/types';
import { createNamePool } from '../css/names';
import type { NamePool } from '../css/names';
import { renderStylesheet } from '../css/render';
import type { RenderOptions } from '../css/render';
import type { StyleRule } from '../css/types';
import { createRandomSource } from '../random/rng';
import { resolveStyleConfig } from './config';
import type { StyleConfig } from './config';
import type { StyleContext } from './context';
import { defaultStyleLogger } from './logger';
import type { StyleLogger } from './logger';

export type StyleDocument = StyleContext & {
  config: StyleConfig;
  names: NamePool;
  /** The document's random source; pass it to generators for seeded output. */
  random: () => number;
  readonly rules: readonly StyleRule[];
  add: (...rules: StyleRule[]) => void;
  animate: <TArgs extends unknown[]>(options: RandomAnimationOptions<TArgs>) => StyleRule[];
  perElement: <TArgs extends unknown[]>(options: PerElementOptions<TArgs>) => StyleRule[];
  toCss: (options?: RenderOptions) => string;
};

export type StyleDocumentOptions = Partial<StyleConfig> & {
  logger?: StyleLogger;
};

/** A stylesheet being built; generated animation names are unique within it. */
export const createStyleDocument = (options: StyleDocumentOptions = {}): StyleDocument => {
  const { logger = defaultStyleLogger, ...overrides } = options;
  const config = resolveStyleConfig(overrides);
  const names = createNamePool(config.animationNamePrefix);
  const source = createRandomSource(config.seed);
  const rules: StyleRule[] = [];

  const doc: StyleDocument = {
    config,
    names,
    logger,
    random: source.next,
    get rules() {
      return rules;
    },
    add: (...added) => {
      rules.push(...added);
    },
    animate: (animation) => {
      const generated = generateRandomAnimations(doc, animation);
      rules.push(...generated);
      return generated;
    },
    perElement: (perElement) => {
      const generated = randomPerElement(doc, perElement);
      rules.push(...generated);
      return generated;
    },
    toCss: (renderOptions = {}) =>
      renderStylesheet(rules, { indent: config.indent, ...renderOptions }),
  };
  return doc;
};
