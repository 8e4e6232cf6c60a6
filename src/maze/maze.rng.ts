import seedrandom from 'seedrandom';
import type { RandomSource } from './maze.types';

/** Seed accepted by {@link createRng}. Numbers are stringified before seeding. */
export type Seed = number | string;

/** PRNG handle returned by `seedrandom`: callable, plus `int32()`, `quick()` and `double()`. */
export type Prng = seedrandom.PRNG;

/**
 * Create an independent PRNG.
 *
 * With a seed the sequence is reproducible across runs and platforms; without one
 * `seedrandom` mixes in local entropy. The generator never touches `Math.random`.
 *
 * @example
 * const a = createRng(7);
 * const b = createRng(7);
 * a() === b(); // true
 */
export function createRng(seed?: Seed): Prng {
  return seed === undefined ? seedrandom() : seedrandom(String(seed));
}

/** Uniform integer in `[0, n)`. */
export function randomInt(rng: RandomSource, n: number): number {
  return Math.floor(rng() * n);
}

/** Uniformly chosen element of a non-empty array. */
export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('Cannot pick from an empty array');
  return items[randomInt(rng, items.length)];
}
