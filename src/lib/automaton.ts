/**
 * Two-state automata for the iterated prisoner's dilemma
 *
 * An automaton outputs the action of its current state and, after each
 * round, moves to the state its transition table names for the opponent's
 * last action. Automata are frozen values: `step` returns a new one.
 */

import { InvalidConfigurationError } from './errors.js';
import { randomBit } from './random.js';
import type { RNG } from './random.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** 0 = cooperate, 1 = defect */
export type Action = 0 | 1;

export type StateIndex = 0 | 1;

export interface State {
  readonly action: Action;
  /** Target state indexed by the opponent's last action */
  readonly next: readonly [StateIndex, StateIndex];
}

export interface Automaton {
  readonly states: readonly [State, State];
  readonly current: StateIndex;
}

/** (action, target on opponent 0, target on opponent 1) */
export type StateTable = readonly [number, number, number];

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function isBit(value: number): value is 0 | 1 {
  return value === 0 || value === 1;
}

function toBit(value: number, what: string): 0 | 1 {
  if (!isBit(value)) {
    throw new InvalidConfigurationError(`${what} must be 0 or 1, got ${value}`);
  }
  return value;
}

function createState(table: StateTable, label: string): State {
  const [action, onCooperate, onDefect] = table;
  return Object.freeze({
    action: toBit(action, `${label} action`),
    next: Object.freeze([
      toBit(onCooperate, `${label} target on 0`),
      toBit(onDefect, `${label} target on 1`),
    ] as const),
  });
}

/**
 * Build an automaton from two state tables and an initial state index
 */
export function createAutomaton(
  states: readonly [StateTable, StateTable],
  initial: number,
): Automaton {
  return Object.freeze({
    states: Object.freeze([createState(states[0], 'state 0'), createState(states[1], 'state 1')] as const),
    current: toBit(initial, 'initial state'),
  });
}

/**
 * Uniformly random automaton: initial state, then action and both targets
 * for each state, all independent draws.
 */
export function generateRandom(rng: RNG): Automaton {
  const initial = randomBit(rng);
  const s0: StateTable = [randomBit(rng), randomBit(rng), randomBit(rng)];
  const s1: StateTable = [randomBit(rng), randomBit(rng), randomBit(rng)];
  return createAutomaton([s0, s1], initial);
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export function currentAction(a: Automaton): Action {
  return a.states[a.current].action;
}

/**
 * Advance on the opponent's action. The states are shared with the input.
 */
export function step(a: Automaton, opponentAction: Action): Automaton {
  return Object.freeze({
    states: a.states,
    current: a.states[a.current].next[opponentAction],
  });
}

/**
 * Canonical text key of an automaton's table and current state, e.g. `0.0.1|1.0.1@0`
 */
export function automatonKey(a: Automaton): string {
  const table = a.states.map(s => `${s.action}.${s.next[0]}.${s.next[1]}`).join('|');
  return `${table}@${a.current}`;
}

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

export const AllDefect: Automaton = createAutomaton([[1, 1, 1], [1, 1, 1]], 1);

export const AllCooperate: Automaton = createAutomaton([[0, 0, 0], [0, 0, 0]], 0);

/** Cooperates first, then copies the opponent's last move */
export const TitForTat: Automaton = createAutomaton([[0, 0, 1], [1, 0, 1]], 0);

/** Cooperates until the opponent defects once, then defects forever */
export const GrimTrigger: Automaton = createAutomaton([[0, 0, 1], [1, 1, 1]], 0);
