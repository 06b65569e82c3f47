/**
 * Seedable random source
 *
 * Every random draw in the engine goes through an injected RNG, so a run
 * is fully reproducible from its seed. Math.random is only used to pick a
 * seed when none is given.
 */

import type { Action } from './automaton.js';

/** A function that returns a pseudo-random number in [0, 1) */
export type RNG = () => number;

/**
 * Create a seeded RNG (Mulberry32). If no seed is provided one is auto-generated.
 */
export function createRNG(seed?: number): { rng: RNG; seed: number } {
  const actualSeed = seed ?? Math.floor(Math.random() * 0x100000000);
  let state = actualSeed >>> 0;

  const rng: RNG = () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return { rng, seed: actualSeed };
}

/**
 * Uniform draw over {0, 1}
 */
export function randomBit(rng: RNG): Action {
  return rng() < 0.5 ? 0 : 1;
}

/**
 * Fisher-Yates shuffle (in-place, returns same array).
 */
export function shuffleArray<T>(arr: T[], rng: RNG): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = arr[i];
    arr[i] = arr[j];
    arr[j] = tmp;
  }
  return arr;
}
