import type { RandomSource } from '../random';

/** Always the first element. */
export const firstRandom: RandomSource = { int: () => 0 };

/** Always the last element. */
export const lastRandom: RandomSource = { int: max => max - 1 };

export function sequenceRandom(values: number[]): RandomSource {
  let index = 0;
  return {
    int: max => (values[index++] ?? 0) % max,
  };
}
