export type {
  CssValue,
  Declaration,
  EmitConfig,
  KeyframesBlock,
  KeyframeStep,
  StyleRule,
} from './types';
export { emitKeyframes, prefixedDeclarations } from './keyframes';
export { createNamePool } from './names';
export type { NamePool } from './names';
export { renderKeyframes, renderStylesheet } from './render';
export type { RenderOptions } from './render';
export { nthChildSelector } from './selectors';
export { formatValue } from './values';
