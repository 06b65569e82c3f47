/**
 * Round-robin tournament between named automata
 */

import type { Automaton } from './automaton.js';
import { InvalidConfigurationError, requireInteger } from './errors.js';
import { matchPair, totalPayoffs } from './game.js';

export interface Entrant {
  name: string;
  automaton: Automaton;
}

export interface Standing {
  name: string;
  totalPayoff: number;
  matches: number;
  /** Mean payoff per round played */
  averagePayoff: number;
}

/**
 * Play every unordered pair of entrants once (no self-play) and rank by total payoff.
 */
export function runTournament(entrants: readonly Entrant[], rounds: number): Standing[] {
  if (entrants.length < 2) {
    throw new InvalidConfigurationError(`A tournament needs at least 2 entrants, got ${entrants.length}`);
  }
  requireInteger('rounds', rounds, 1);

  const totals = entrants.map(() => 0);
  const matches = entrants.map(() => 0);

  for (let i = 0; i < entrants.length; i++) {
    for (let j = i + 1; j < entrants.length; j++) {
      const [p1, p2] = totalPayoffs(matchPair(entrants[i].automaton, entrants[j].automaton, rounds));
      totals[i] += p1;
      totals[j] += p2;
      matches[i]++;
      matches[j]++;
    }
  }

  return entrants
    .map((e, i) => ({
      name: e.name,
      totalPayoff: totals[i],
      matches: matches[i],
      averagePayoff: totals[i] / (matches[i] * rounds),
    }))
    .sort((a, b) => b.totalPayoff - a.totalPayoff || a.name.localeCompare(b.name));
}
