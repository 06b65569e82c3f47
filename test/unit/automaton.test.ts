/**
 * Automaton model — Unit Tests
 *
 * Covers construction and validation, pure transitions, random generation
 * and the preset transition tables.
 */

import { describe, it, expect } from 'vitest';
import {
  AllCooperate,
  AllDefect,
  GrimTrigger,
  TitForTat,
  automatonKey,
  createAutomaton,
  currentAction,
  generateRandom,
  step,
} from '../../src/lib/automaton.js';
import { InvalidConfigurationError } from '../../src/lib/errors.js';
import { scriptedRng } from '../helpers/rng.js';

describe('automaton', () => {
  // ── Construction ───────────────────────────────────────────

  describe('createAutomaton', () => {
    it('builds states from tables', () => {
      const a = createAutomaton([[0, 1, 0], [1, 0, 1]], 1);
      expect(a.current).toBe(1);
      expect(a.states[0]).toEqual({ action: 0, next: [1, 0] });
      expect(a.states[1]).toEqual({ action: 1, next: [0, 1] });
    });

    it('rejects actions outside {0,1}', () => {
      expect(() => createAutomaton([[2, 0, 0], [0, 0, 0]], 0)).toThrow(InvalidConfigurationError);
    });

    it('rejects transition targets outside {0,1}', () => {
      expect(() => createAutomaton([[0, 0, 0], [0, -1, 0]], 0)).toThrow(InvalidConfigurationError);
    });

    it('rejects an initial state outside {0,1}', () => {
      expect(() => createAutomaton([[0, 0, 0], [0, 0, 0]], 2)).toThrow('initial state must be 0 or 1, got 2');
    });

    it('freezes the automaton and its states', () => {
      const a = createAutomaton([[0, 0, 1], [1, 0, 1]], 0);
      expect(Object.isFrozen(a)).toBe(true);
      expect(Object.isFrozen(a.states)).toBe(true);
      expect(Object.isFrozen(a.states[0])).toBe(true);
      expect(Object.isFrozen(a.states[0].next)).toBe(true);
    });
  });

  // ── Transitions ────────────────────────────────────────────

  describe('step', () => {
    it('moves tit-for-tat to its defect state after a defection', () => {
      const next = step(TitForTat, 1);
      expect(next.current).toBe(1);
      expect(currentAction(next)).toBe(1);
    });

    it('moves tit-for-tat back after a cooperation', () => {
      const next = step(step(TitForTat, 1), 0);
      expect(next.current).toBe(0);
      expect(currentAction(next)).toBe(0);
    });

    it('returns a new value and leaves the input unchanged', () => {
      const next = step(TitForTat, 1);
      expect(next).not.toBe(TitForTat);
      expect(TitForTat.current).toBe(0);
      expect(next.states).toBe(TitForTat.states);
    });

    it('keeps grim trigger defecting once triggered', () => {
      let a = step(GrimTrigger, 1);
      for (let i = 0; i < 5; i++) a = step(a, 0);
      expect(currentAction(a)).toBe(1);
    });
  });

  describe('currentAction', () => {
    it('reads the current state action of each preset', () => {
      expect(currentAction(AllDefect)).toBe(1);
      expect(currentAction(AllCooperate)).toBe(0);
      expect(currentAction(TitForTat)).toBe(0);
      expect(currentAction(GrimTrigger)).toBe(0);
    });
  });

  // ── Random generation ──────────────────────────────────────

  describe('generateRandom', () => {
    it('draws the initial state first, then each state as action and two targets', () => {
      const rng = scriptedRng(0.9, 0.1, 0.6, 0.2, 0.7, 0.8, 0.3);
      const a = generateRandom(rng);
      expect(a.current).toBe(1);
      expect(a.states[0]).toEqual({ action: 0, next: [1, 0] });
      expect(a.states[1]).toEqual({ action: 1, next: [1, 0] });
    });

    it('produces all-zero tables from a low stream', () => {
      const a = generateRandom(() => 0);
      expect(automatonKey(a)).toBe('0.0.0|0.0.0@0');
    });
  });

  // ── Presets ────────────────────────────────────────────────

  describe('presets', () => {
    it('match their transition tables', () => {
      expect(automatonKey(AllDefect)).toBe('1.1.1|1.1.1@1');
      expect(automatonKey(AllCooperate)).toBe('0.0.0|0.0.0@0');
      expect(automatonKey(TitForTat)).toBe('0.0.1|1.0.1@0');
      expect(automatonKey(GrimTrigger)).toBe('0.0.1|1.1.1@0');
    });

    it('are frozen', () => {
      for (const preset of [AllDefect, AllCooperate, TitForTat, GrimTrigger]) {
        expect(Object.isFrozen(preset)).toBe(true);
      }
    });
  });
});
