/**
 * Evolution loop — zero-fitness cycles
 *
 * The payoff matrix never produces an all-zero cycle, so the game engine
 * is replaced by one that scores every slot 1 on its first call and 0 after.
 */

import { beforeEach, describe, it, expect, vi } from 'vitest';

const engine = vi.hoisted(() => ({ calls: 0 }));

vi.mock('../../src/lib/game.js', () => ({
  matchPopulation: (population: readonly unknown[]) => {
    const score = engine.calls === 0 ? 1 : 0;
    engine.calls++;
    return population.map(() => score);
  },
}));

import { AllCooperate } from '../../src/lib/automaton.js';
import { DegenerateFitnessError } from '../../src/lib/errors.js';
import { evolve } from '../../src/lib/evolution.js';
import { createRNG } from '../../src/lib/random.js';

function runUntilFailure(onCycle = vi.fn()): unknown {
  try {
    evolve([AllCooperate, AllCooperate], 3, 1, 1, { rng: createRNG(1).rng, onCycle });
  } catch (e) {
    return e;
  }
  return undefined;
}

describe('evolve with zero total payoff', () => {
  beforeEach(() => {
    engine.calls = 0;
  });

  it('fails with the index of the zero-payoff cycle', () => {
    const error = runUntilFailure();
    expect(error).toBeInstanceOf(DegenerateFitnessError);
    expect(error).toMatchObject({ code: 'DEGENERATE_FITNESS', cycle: 1 });
  });

  it('reports only the cycles completed before the failure', () => {
    const onCycle = vi.fn();
    runUntilFailure(onCycle);
    expect(onCycle).toHaveBeenCalledTimes(1);
    expect(onCycle.mock.calls[0][0]).toMatchObject({ cycle: 0, meanPayoff: 1 });
  });

  it('keeps the selection error as the cause', () => {
    const error = runUntilFailure();
    expect(error).toBeInstanceOf(DegenerateFitnessError);
    expect(error).toMatchObject({ cause: expect.objectContaining({ cycle: null }) });
    expect(error instanceof Error && error.cause instanceof DegenerateFitnessError).toBe(true);
  });

  it('names the cycle in the message', () => {
    expect(() => evolve([AllCooperate, AllCooperate], 2, 1, 1, { rng: createRNG(1).rng }))
      .toThrow('Total payoff is zero at cycle 1: fitness distribution is undefined');
  });
});
