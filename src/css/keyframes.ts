import type { CssValue, Declaration, EmitConfig, KeyframesBlock, KeyframeStep } from './types';

/**
 * One `@keyframes` block, preceded by a vendor duplicate per prefix when
 * prefix mode is on. Every duplicate shares the same steps.
 */
export const emitKeyframes = (
  name: string,
  steps: readonly KeyframeStep[],
  config: EmitConfig,
): KeyframesBlock[] => {
  const prefixed = config.prefixMode
    ? config.vendorPrefixes.map((vendorPrefix) => ({ name, vendorPrefix, steps }))
    : [];
  return [...prefixed, { name, steps }];
};

export const prefixedDeclarations = (
  property: string,
  value: CssValue,
  config: EmitConfig,
): Declaration[] => {
  const prefixed = config.prefixMode
    ? config.vendorPrefixes.map((prefix) => ({ property: `${prefix}${property}`, value }))
    : [];
  return [...prefixed, { property, value }];
};
