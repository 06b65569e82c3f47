/**
 * Repeated prisoner's dilemma between automata
 */

import { currentAction, step } from './automaton.js';
import type { Action, Automaton } from './automaton.js';
import { InvalidConfigurationError, requireInteger } from './errors.js';

export type PayoffPair = readonly [number, number];

// Reward 3, temptation 4, sucker 0, punishment 1. Indexed [own action][opponent action].
export const PAYOFF_MATRIX: readonly [readonly [PayoffPair, PayoffPair], readonly [PayoffPair, PayoffPair]] = [
  [[3, 3], [0, 4]],
  [[4, 0], [1, 1]],
];

/**
 * Payoffs for one simultaneous move
 */
export function payoff(action1: Action, action2: Action): PayoffPair {
  return PAYOFF_MATRIX[action1][action2];
}

/**
 * Play `rounds` rounds between two automata. Each side reacts to the
 * other's move of the round just played.
 */
export function matchPair(a1: Automaton, a2: Automaton, rounds: number): PayoffPair[] {
  requireInteger('rounds', rounds, 1);

  const results: PayoffPair[] = [];
  let p1 = a1;
  let p2 = a2;
  for (let round = 0; round < rounds; round++) {
    const move1 = currentAction(p1);
    const move2 = currentAction(p2);
    results.push(payoff(move1, move2));
    p1 = step(p1, move2);
    p2 = step(p2, move1);
  }
  return results;
}

/**
 * Sum a match's per-round payoffs for each side
 */
export function totalPayoffs(results: readonly PayoffPair[]): PayoffPair {
  let total1 = 0;
  let total2 = 0;
  for (const [p1, p2] of results) {
    total1 += p1;
    total2 += p2;
  }
  return [total1, total2];
}

/**
 * Match slot 2i against slot 2i+1 and return each slot's total payoff,
 * in population order.
 */
export function matchPopulation(population: readonly Automaton[], rounds: number): number[] {
  if (population.length % 2 !== 0) {
    throw new InvalidConfigurationError(`Population size must be even, got ${population.length}`);
  }
  requireInteger('rounds', rounds, 1);

  const payoffs: number[] = new Array<number>(population.length);
  for (let i = 0; i < population.length; i += 2) {
    const [total1, total2] = totalPayoffs(matchPair(population[i], population[i + 1], rounds));
    payoffs[i] = total1;
    payoffs[i + 1] = total2;
  }
  return payoffs;
}
