export {
  computeStepPercentages,
  generateRandomAnimations,
  MAX_STEP_COUNT,
} from './randomAnimation';
export { randomPerElement } from './perElement';
export type {
  PerElementOptions,
  RandomAnimationOptions,
  ValueGenerator,
} from './types';
