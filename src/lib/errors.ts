/**
 * Error types raised by the simulation engine.
 *
 * Both are fatal: a run either completes or fails before returning any history.
 */

export type SimulationErrorCode = 'INVALID_CONFIGURATION' | 'DEGENERATE_FITNESS';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad sizes, counts or automaton tables, detected before any work is done */
export class InvalidConfigurationError extends SimulationError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
  }
}

/**
 * Total payoff of a cycle was zero, so fitness-proportional selection is undefined.
 * `cycle` is null when raised outside of an evolution run.
 */
export class DegenerateFitnessError extends SimulationError {
  readonly cycle: number | null;

  constructor(cycle: number | null = null, options?: ErrorOptions) {
    super(
      'DEGENERATE_FITNESS',
      cycle === null
        ? 'Total payoff is zero: fitness distribution is undefined'
        : `Total payoff is zero at cycle ${cycle}: fitness distribution is undefined`,
      options,
    );
    this.cycle = cycle;
  }
}

/**
 * Throw unless `value` is an integer >= `min`
 */
export function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigurationError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}
