import { cryptoRandom, pick, shuffle } from '../utils/random';
import type { RandomSource } from '../utils/random';

export const LOWER      = 'abcdefghijklmnopqrstuvwxyz';
export const UPPER      = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const DIGITS     = '0123456789';
export const CONSONANTS = 'bcdfghjklmnprstvwxyz';
export const VOWELS     = 'aeiou';

export const DEFAULT_SYMBOLS = '@$!%*?&#';
export const DEFAULT_LENGTH  = 14;

const PATTERN_CODES = 'LUNS';

export interface GeneratorOptions {
  length?: number;      // default: 14
  symbols?: string;     // default: @$!%*?&#
  random?: RandomSource;
}

export interface CharClasses {
  lower: boolean;
  upper: boolean;
  digits: boolean;
  symbols: boolean;
}

export const ALL_CLASSES: CharClasses = {
  lower: true,
  upper: true,
  digits: true,
  symbols: true,
};

export class PasswordGenerator {
  private length: number;
  readonly symbols: string;
  private readonly rng: RandomSource;

  constructor(opts: GeneratorOptions = {}) {
    this.length  = opts.length ?? DEFAULT_LENGTH;
    this.symbols = opts.symbols ?? DEFAULT_SYMBOLS;
    this.rng     = opts.random ?? cryptoRandom;
  }

  getLength(): number {
    return this.length;
  }

  /** Ignores anything that is not a positive integer. */
  setLength(length: number): void {
    if (Number.isInteger(length) && length > 0) this.length = length;
  }

  generate(length?: number): string {
    const charset = LOWER + UPPER + DIGITS + this.symbols;
    const n = length ?? this.length;

    let result = '';
    for (let i = 0; i < n; i++) result += pick(this.rng, charset);
    return result;
  }

  /**
   * One character per code (L lower, U upper, N digit, S symbol, any case),
   * shuffled. Returns '' when the pattern is empty or holds any other code.
   */
  generateFromPattern(pattern: string): string {
    if (!this.validatePattern(pattern)) return '';

    const chars = [...pattern.toUpperCase()].map(code => pick(this.rng, this.classFor(code)));
    return shuffle(this.rng, chars).join('');
  }

  validatePattern(pattern: string): boolean {
    if (!pattern) return false;
    return [...pattern.toUpperCase()].every(code => PATTERN_CODES.includes(code));
  }

  /**
   * Seeds one character from each enabled class, fills the rest from their
   * union and shuffles. With every class disabled the result is ''.
   */
  generateWithRequirements(length?: number, classes: Partial<CharClasses> = {}): string {
    const want = { ...ALL_CLASSES, ...classes };
    const n = length ?? this.length;

    const pools: string[] = [];
    if (want.lower)   pools.push(LOWER);
    if (want.upper)   pools.push(UPPER);
    if (want.digits)  pools.push(DIGITS);
    if (want.symbols) pools.push(this.symbols);

    const chars = pools.map(pool => pick(this.rng, pool));
    const charset = pools.join('');
    if (charset) {
      for (let i = chars.length; i < n; i++) chars.push(pick(this.rng, charset));
    }
    return shuffle(this.rng, chars).join('');
  }

  /** Consonant, vowel, digit, repeating; then one capital and one symbol. */
  generateMemorable(length?: number): string {
    const n = length ?? this.length;
    const cycle = [CONSONANTS, VOWELS, DIGITS];

    const chars: string[] = [];
    for (let i = 0; i < n; i++) chars.push(pick(this.rng, cycle[i % 3]));

    if (chars.length > 0) {
      const idx = this.rng.int(chars.length);
      chars[idx] = chars[idx].toUpperCase();
    }
    if (chars.length > 1) {
      const idx = this.rng.int(chars.length);
      chars[idx] = pick(this.rng, this.symbols);
    }
    return chars.join('');
  }

  private classFor(code: string): string {
    switch (code) {
      case 'L': return LOWER;
      case 'U': return UPPER;
      case 'N': return DIGITS;
      default:  return this.symbols;
    }
  }
}
