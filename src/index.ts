/**
 * automaton-evolution -- Evolutionary dynamics of two-state automata in the iterated prisoner's dilemma
 *
 * Exports the automaton model, game engine, fitness selection, evolution loop and reporting helpers.
 */

export {
  AllDefect,
  AllCooperate,
  TitForTat,
  GrimTrigger,
  currentAction,
  step,
  createAutomaton,
  generateRandom,
  automatonKey,
} from './lib/automaton.js';
export type { Action, StateIndex, State, Automaton, StateTable } from './lib/automaton.js';

export { PAYOFF_MATRIX, payoff, matchPair, matchPopulation, totalPayoffs } from './lib/game.js';
export type { PayoffPair } from './lib/game.js';

export { computeDistribution, sample } from './lib/selection.js';

export {
  SIMULATION_CONFIGS,
  DEFAULT_CONFIG,
  generatePopulation,
  evolve,
  runSimulation,
} from './lib/evolution.js';
export type { SimulationConfig, CycleReport, EvolveOptions, SimulationResult } from './lib/evolution.js';

export { createRNG, randomBit, shuffleArray } from './lib/random.js';
export type { RNG } from './lib/random.js';

export {
  SimulationError,
  InvalidConfigurationError,
  DegenerateFitnessError,
} from './lib/errors.js';
export type { SimulationErrorCode } from './lib/errors.js';

export { getPreset, listPresets, getPresetInfo, listPresetsWithInfo } from './lib/presets.js';
export type { PresetInfo } from './lib/presets.js';

export { runTournament } from './lib/tournament.js';
export type { Entrant, Standing } from './lib/tournament.js';

export {
  formatAutomaton,
  summarizeHistory,
  formatHistory,
  countStrategies,
  formatStandings,
} from './lib/report.js';
export type { HistorySummary, StrategyCount } from './lib/report.js';
