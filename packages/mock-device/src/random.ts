/**
 * Random helpers built on an injectable RandomSource
 */

import type { RandomSource } from './types.js';

/**
 * Process-global, unseeded source. Output is not reproducible across runs.
 */
export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * Uniform integer in [min, max], both ends inclusive.
 *
 * @example
 * ```typescript
 * randomInt(mathRandomSource, 15, 17); // 15, 16 or 17
 * ```
 */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
    throw new RangeError(`Invalid integer range [${min}, ${max}]`);
  }
  return min + Math.floor(rng.next() * (max - min + 1));
}

/**
 * Uniform pick from a non-empty list.
 */
export function choice<T>(rng: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(rng.next() * items.length)];
  if (item === undefined) {
    throw new RangeError('Cannot choose from an empty list');
  }
  return item;
}

/**
 * String of `length` characters drawn uniformly from `alphabet`.
 */
export function randomString(rng: RandomSource, alphabet: string, length: number): string {
  const chars = Array.from(alphabet);
  let out = '';
  for (let i = 0; i < length; i += 1) {
    out += choice(rng, chars);
  }
  return out;
}
