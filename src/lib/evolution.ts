/**
 * Evolution loop
 *
 * Each cycle:
 * 1. Consecutive pairs play a repeated match
 * 2. The cycle's mean payoff per round is recorded
 * 3. The first `speed` slots are dropped and refilled by fitness-proportional draws
 * 4. The population is reshuffled
 *
 * Because of the reshuffle, dropping the first slots is a uniformly random
 * death process; only rebirth depends on fitness.
 */

import { generateRandom } from './automaton.js';
import type { Automaton } from './automaton.js';
import { DegenerateFitnessError, InvalidConfigurationError, requireInteger } from './errors.js';
import { matchPopulation } from './game.js';
import { createRNG, shuffleArray } from './random.js';
import type { RNG } from './random.js';
import { computeDistribution, sample } from './selection.js';

export interface SimulationConfig {
  name: string;
  populationSize: number;
  cycles: number;
  /** Individuals replaced per cycle (absolute count) */
  speed: number;
  roundsPerMatch: number;
}

export const SIMULATION_CONFIGS: SimulationConfig[] = [
  {
    name: 'small',
    populationSize: 20,
    cycles: 50,
    speed: 2,
    roundsPerMatch: 5,
  },
  {
    name: 'default',
    populationSize: 100,
    cycles: 200,
    speed: 10,
    roundsPerMatch: 10,
  },
  {
    name: 'large',
    populationSize: 1000,
    cycles: 500,
    speed: 50,
    roundsPerMatch: 20,
  },
];

export const DEFAULT_CONFIG: SimulationConfig = SIMULATION_CONFIGS[1];

export interface CycleReport {
  cycle: number;
  meanPayoff: number;
  /** Population after replacement and reshuffle */
  population: readonly Automaton[];
}

export interface EvolveOptions {
  rng?: RNG;
  verbose?: boolean;
  onCycle?: (report: CycleReport) => void;
}

export interface SimulationResult {
  seed: number;
  config: SimulationConfig;
  history: number[];
  population: Automaton[];
}

function requireEvenPopulation(size: number): void {
  if (!Number.isInteger(size) || size < 2 || size % 2 !== 0) {
    throw new InvalidConfigurationError(`Population size must be an even integer >= 2, got ${size}`);
  }
}

/**
 * Generate `n` independent random automata. Without an RNG a freshly seeded one is used.
 */
export function generatePopulation(n: number, rng: RNG = createRNG().rng): Automaton[] {
  requireEvenPopulation(n);
  const population: Automaton[] = [];
  for (let i = 0; i < n; i++) {
    population.push(generateRandom(rng));
  }
  return population;
}

function validateRun(size: number, cycles: number, speed: number, roundsPerMatch: number): void {
  requireEvenPopulation(size);
  requireInteger('cycles', cycles, 0);
  requireInteger('roundsPerMatch', roundsPerMatch, 1);
  if (!Number.isInteger(speed) || speed <= 0 || speed >= size) {
    throw new InvalidConfigurationError(`speed must be an integer in (0, ${size}), got ${speed}`);
  }
}

/**
 * Run one cycle and return the mean payoff and the next population
 */
function runCycle(
  population: readonly Automaton[],
  speed: number,
  roundsPerMatch: number,
  rng: RNG,
): { meanPayoff: number; next: Automaton[] } {
  const payoffs = matchPopulation(population, roundsPerMatch);
  const total = payoffs.reduce((sum, p) => sum + p, 0);
  const meanPayoff = total / (roundsPerMatch * population.length);

  const distribution = computeDistribution(payoffs);
  const survivors = population.slice(speed);
  const successors = sample(distribution, population, speed, rng);

  return { meanPayoff, next: shuffleArray([...survivors, ...successors], rng) };
}

/**
 * Evolve a population for `cycles` cycles and return the mean payoff per
 * round of each cycle. The input population is not modified.
 */
export function evolve(
  population: readonly Automaton[],
  cycles: number,
  speed: number,
  roundsPerMatch: number,
  options: EvolveOptions = {},
): number[] {
  validateRun(population.length, cycles, speed, roundsPerMatch);
  const rng = options.rng ?? createRNG().rng;
  const verbose = options.verbose || false;

  const history: number[] = [];
  let current: readonly Automaton[] = population;

  for (let cycle = 0; cycle < cycles; cycle++) {
    let result: { meanPayoff: number; next: Automaton[] };
    try {
      result = runCycle(current, speed, roundsPerMatch, rng);
    } catch (e: unknown) {
      if (e instanceof DegenerateFitnessError) throw new DegenerateFitnessError(cycle, { cause: e });
      throw e;
    }

    history.push(result.meanPayoff);
    current = result.next;

    if (verbose) {
      console.log(`Cycle ${cycle}: mean payoff ${result.meanPayoff.toFixed(4)}`);
    }
    options.onCycle?.({ cycle, meanPayoff: result.meanPayoff, population: Object.freeze([...current]) });
  }

  return history;
}

/**
 * Seed an RNG, generate a random population and evolve it.
 */
export function runSimulation(
  config: SimulationConfig,
  options: { seed?: number; verbose?: boolean; onCycle?: (report: CycleReport) => void } = {},
): SimulationResult {
  validateRun(config.populationSize, config.cycles, config.speed, config.roundsPerMatch);
  const { rng, seed } = createRNG(options.seed);

  const initial = generatePopulation(config.populationSize, rng);
  let final: readonly Automaton[] = initial;

  const history = evolve(initial, config.cycles, config.speed, config.roundsPerMatch, {
    rng,
    verbose: options.verbose,
    onCycle: (report) => {
      final = report.population;
      options.onCycle?.(report);
    },
  });

  return { seed, config, history, population: [...final] };
}
