/**
 * Text formatters for the CLIs
 */

import { automatonKey } from './automaton.js';
import type { Automaton } from './automaton.js';
import type { Standing } from './tournament.js';

const ACTION_LABELS = ['C', 'D'] as const;

/**
 * e.g. tit-for-tat is `C(0,1) D(0,1) @0`
 */
export function formatAutomaton(a: Automaton): string {
  const states = a.states
    .map(s => `${ACTION_LABELS[s.action]}(${s.next[0]},${s.next[1]})`)
    .join(' ');
  return `${states} @${a.current}`;
}

export interface HistorySummary {
  cycles: number;
  first: number;
  last: number;
  min: number;
  max: number;
  mean: number;
}

export function summarizeHistory(history: readonly number[]): HistorySummary | null {
  if (history.length === 0) return null;
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const v of history) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
  }
  return {
    cycles: history.length,
    first: history[0],
    last: history[history.length - 1],
    min,
    max,
    mean: sum / history.length,
  };
}

/**
 * One line per `every` cycles, always including the last cycle
 */
export function formatHistory(history: readonly number[], every: number = 1): string {
  const step = Math.max(1, Math.floor(every));
  const lines: string[] = [];
  history.forEach((value, cycle) => {
    if (cycle % step === 0 || cycle === history.length - 1) {
      lines.push(`${String(cycle).padStart(5)}  ${value.toFixed(4)}`);
    }
  });
  return lines.join('\n');
}

export interface StrategyCount {
  key: string;
  automaton: Automaton;
  count: number;
}

/**
 * Distinct automata in a population, most common first
 */
export function countStrategies(population: readonly Automaton[]): StrategyCount[] {
  const counts = new Map<string, StrategyCount>();
  for (const a of population) {
    const key = automatonKey(a);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { key, automaton: a, count: 1 });
    }
  }
  return [...counts.values()].sort((a, b) => b.count - a.count || a.key.localeCompare(b.key));
}

export function formatStandings(standings: readonly Standing[]): string {
  const width = Math.max(4, ...standings.map(s => s.name.length));
  const header = `${'#'.padStart(2)}  ${'Name'.padEnd(width)}  ${'Total'.padStart(7)}  ${'Avg'.padStart(6)}`;
  const rows = standings.map((s, i) =>
    `${String(i + 1).padStart(2)}  ${s.name.padEnd(width)}  ${String(s.totalPayoff).padStart(7)}  ${s.averagePayoff.toFixed(2).padStart(6)}`,
  );
  return [header, ...rows].join('\n');
}
