import type { CssValue } from '../css/types';

export type ValueGenerator<TArgs extends unknown[]> = (...args: TArgs) => CssValue;

export type PerElementOptions<TArgs extends unknown[]> = {
  /** Base selector; element `i` is matched with `:nth-child(i)`. */
  selector: string;
  elementCount: number;
  property: string;
  generator: ValueGenerator<TArgs>;
  /** Forwarded verbatim to every generator call. */
  args: TArgs;
};

export type RandomAnimationOptions<TArgs extends unknown[]> = PerElementOptions<TArgs> & {
  /** Everything after the name in the `animation` shorthand, e.g. `2s infinite`. */
  timing: string;
  stepCount: number;
};
