#!/usr/bin/env node
/**
 * Evolution Simulator CLI
 *
 * Evolves a random population of two-state automata playing the iterated
 * prisoner's dilemma and prints the mean payoff per cycle.
 * Uses a seeded PRNG for fully reproducible results.
 *
 * Usage:
 *   node dist/bin/evolve.js [options]
 *
 * Examples:
 *   node dist/bin/evolve.js --seed 42
 *   node dist/bin/evolve.js --config small --cycles 100 --json
 */

import { parseArgs } from 'util';

import { DEFAULT_CONFIG, runSimulation } from '../lib/evolution.js';
import type { SimulationConfig } from '../lib/evolution.js';
import { parseIntOption, resolveConfig } from '../lib/options.js';
import { countStrategies, formatAutomaton, formatHistory, summarizeHistory } from '../lib/report.js';

// --- CLI ---
function main(): void {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: DEFAULT_CONFIG.name },
      population: { type: 'string', short: 'n' },
      cycles: { type: 'string' },
      speed: { type: 'string' },
      rounds: { type: 'string', short: 'r' },
      seed: { type: 'string' },
      every: { type: 'string', default: '10' },
      top: { type: 'string', default: '5' },
      json: { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
    },
  });

  const base = resolveConfig(values.config ?? DEFAULT_CONFIG.name);
  const config: SimulationConfig = {
    ...base,
    populationSize: parseIntOption('population', values.population) ?? base.populationSize,
    cycles: parseIntOption('cycles', values.cycles) ?? base.cycles,
    speed: parseIntOption('speed', values.speed) ?? base.speed,
    roundsPerMatch: parseIntOption('rounds', values.rounds) ?? base.roundsPerMatch,
  };
  const seed = parseIntOption('seed', values.seed);

  const result = runSimulation(config, { seed, verbose: values.verbose && !values.json });

  if (values.json) {
    console.log(JSON.stringify({ seed: result.seed, config: result.config, history: result.history }));
    return;
  }

  console.log(`=== Evolution: ${config.name} ===`);
  console.log(
    `Population: ${config.populationSize} | Cycles: ${config.cycles} | Speed: ${config.speed} | Rounds: ${config.roundsPerMatch} | Seed: ${result.seed}`,
  );

  const summary = summarizeHistory(result.history);
  if (!summary) {
    console.log('No cycles run.');
    return;
  }

  console.log('\nCycle  Mean payoff');
  console.log(formatHistory(result.history, parseIntOption('every', values.every, 1) ?? 10));
  console.log(
    `\nFirst: ${summary.first.toFixed(4)} | Last: ${summary.last.toFixed(4)} | Min: ${summary.min.toFixed(4)} | Max: ${summary.max.toFixed(4)} | Mean: ${summary.mean.toFixed(4)}`,
  );

  const top = parseIntOption('top', values.top, 0) ?? 5;
  console.log('\nMost common automata:');
  for (const entry of countStrategies(result.population).slice(0, top)) {
    console.log(`  ${String(entry.count).padStart(4)}  ${formatAutomaton(entry.automaton)}`);
  }
}

try {
  main();
} catch (e: unknown) {
  const msg = e instanceof Error ? e.message : String(e);
  console.error('Fatal:', msg);
  process.exit(1);
}
