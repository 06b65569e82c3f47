/**
 * Fitness-proportional selection
 *
 * Payoffs become a cumulative distribution over population slots; draws
 * pick a slot with probability equal to its share of the total payoff.
 */

import type { Automaton } from './automaton.js';
import { DegenerateFitnessError, InvalidConfigurationError, requireInteger } from './errors.js';
import type { RNG } from './random.js';

/**
 * Cumulative distribution of N+1 points: 0, then running payoff shares up to exactly 1.
 */
export function computeDistribution(payoffs: readonly number[]): number[] {
  let total = 0;
  for (const p of payoffs) {
    if (!Number.isFinite(p) || p < 0) {
      throw new InvalidConfigurationError(`Payoffs must be finite and non-negative, got ${p}`);
    }
    total += p;
  }
  if (total === 0) {
    throw new DegenerateFitnessError();
  }

  // Divide running sums rather than accumulating shares, so the last point is S/S = 1
  const distribution: number[] = [0];
  let running = 0;
  for (const p of payoffs) {
    running += p;
    distribution.push(running / total);
  }
  return distribution;
}

const DISTRIBUTION_TOLERANCE = 1e-9;

/**
 * Throw unless the points start at 0, never decrease and end at 1
 */
function validateDistribution(distribution: readonly number[]): void {
  if (distribution[0] !== 0) {
    throw new InvalidConfigurationError(`Distribution must start at 0, got ${distribution[0]}`);
  }
  for (let i = 1; i < distribution.length; i++) {
    if (!(distribution[i] >= distribution[i - 1])) {
      throw new InvalidConfigurationError(
        `Distribution must be non-decreasing: point ${i} (${distribution[i]}) is below point ${i - 1} (${distribution[i - 1]})`,
      );
    }
  }
  const last = distribution[distribution.length - 1];
  if (Math.abs(last - 1) > DISTRIBUTION_TOLERANCE) {
    throw new InvalidConfigurationError(`Distribution must end at 1, got ${last}`);
  }
}

/**
 * Smallest index i with distribution[i] > r
 */
function findSlot(distribution: readonly number[], r: number): number {
  let lo = 1;
  let hi = distribution.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (distribution[mid] > r) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

/**
 * Draw `count` individuals with replacement, weighted by the distribution.
 */
export function sample<T = Automaton>(
  distribution: readonly number[],
  population: readonly T[],
  count: number,
  rng: RNG,
): T[] {
  if (distribution.length !== population.length + 1) {
    throw new InvalidConfigurationError(
      `Distribution has ${distribution.length} points for a population of ${population.length}`,
    );
  }
  requireInteger('count', count, 0);
  if (count > 0 && population.length === 0) {
    throw new InvalidConfigurationError('Cannot sample from an empty population');
  }
  validateDistribution(distribution);

  const drawn: T[] = [];
  for (let n = 0; n < count; n++) {
    drawn.push(population[findSlot(distribution, rng()) - 1]);
  }
  return drawn;
}
