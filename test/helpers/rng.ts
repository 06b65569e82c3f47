import type { RNG } from '../../src/lib/random.js';

/**
 * RNG that replays the given values in a loop
 */
export function scriptedRng(...values: number[]): RNG {
  let i = 0;
  return () => values[i++ % values.length];
}
