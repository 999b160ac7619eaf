import { randomInt } from 'crypto';

/** Source of uniform integers in `[0, max)`. */
export interface RandomSource {
  int(max: number): number;
}

export const cryptoRandom: RandomSource = {
  int: max => randomInt(max),
};

export function pick(rng: RandomSource, chars: string): string {
  return chars.charAt(rng.int(chars.length));
}

// Fisher–Yates, in place
export function shuffle<T>(rng: RandomSource, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = rng.int(i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
