export type RandomSource = {
  next: () => number;
  /** Present when the source is reproducible. */
  seed?: number;
};

export type Mulberry32Step = {
  value: number;
  state: number;
};

const MULBERRY32_INCREMENT = 0x6d2b79f5;
const UINT32_RANGE = 4294967296;

/** One Mulberry32 step: the draw in [0, 1) for `state` and the state after it. */
export const mulberry32Step = (state: number): Mulberry32Step => {
  const next = (state + MULBERRY32_INCREMENT) >>> 0;
  let mixed = Math.imul(next ^ (next >>> 15), next | 1);
  mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
  return { value: ((mixed ^ (mixed >>> 14)) >>> 0) / UINT32_RANGE, state: next };
};

export const createMulberry32 = (seed: number): RandomSource => {
  let state = seed >>> 0;
  const next = (): number => {
    const step = mulberry32Step(state);
    state = step.state;
    return step.value;
  };
  return { seed, next };
};

export const createRandomSource = (seed?: number): RandomSource =>
  typeof seed === 'number' && Number.isFinite(seed)
    ? createMulberry32(Math.floor(seed))
    : { next: () => Math.random() };

/** Replays `values` in order, cycling when exhausted. */
export const createSequenceSource = (values: readonly number[]): RandomSource => {
  let index = 0;
  return {
    next: () => {
      const value = values.length === 0 ? 0 : (values[index % values.length] ?? 0);
      index += 1;
      return value;
    },
  };
};
