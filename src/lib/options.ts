/**
 * Command-line option helpers shared by the CLIs
 */

import { InvalidConfigurationError } from './errors.js';
import { SIMULATION_CONFIGS } from './evolution.js';
import type { SimulationConfig } from './evolution.js';

/**
 * Parse an integer option. Returns undefined when the option was not given.
 */
export function parseIntOption(name: string, value: string | undefined, min?: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidConfigurationError(`--${name} must be an integer, got "${value}"`);
  }
  if (min !== undefined && parsed < min) {
    throw new InvalidConfigurationError(`--${name} must be >= ${min}, got ${parsed}`);
  }
  return parsed;
}

/**
 * Look up a named simulation config
 */
export function resolveConfig(name: string): SimulationConfig {
  const config = SIMULATION_CONFIGS.find(c => c.name === name);
  if (!config) {
    throw new InvalidConfigurationError(
      `Unknown config: ${name}. Available: ${SIMULATION_CONFIGS.map(c => c.name).join(', ')}`,
    );
  }
  return config;
}
