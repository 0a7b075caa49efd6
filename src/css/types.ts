import type { Color } from '../color/color';

export type CssValue = string | number | Color;

export type Declaration = {
  property: string;
  value: CssValue;
};

export type KeyframeStep = {
  /** Integer in [0, 100]. */
  percentage: number;
  declarations: readonly Declaration[];
};

export type KeyframesBlock = {
  name: string;
  /** Set on vendor duplicates, e.g. `-webkit-` for `@-webkit-keyframes`. */
  vendorPrefix?: string;
  steps: readonly KeyframeStep[];
};

export type StyleRule = {
  selector: string;
  declarations: readonly Declaration[];
  /** Keyframe blocks owned by this rule. */
  keyframes: readonly KeyframesBlock[];
};

export type EmitConfig = {
  prefixMode: boolean;
  vendorPrefixes: readonly string[];
};
