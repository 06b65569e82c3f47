/**
 * Preset Registry
 *
 * Named classic automata with short aliases, for the CLIs and tournaments.
 */

import { AllCooperate, AllDefect, GrimTrigger, TitForTat } from './automaton.js';
import type { Automaton } from './automaton.js';
import { InvalidConfigurationError } from './errors.js';

interface PresetEntry {
  automaton: Automaton;
  description: string;
}

// Registry of all presets
const PRESETS: Record<string, PresetEntry> = {
  'all-defect': { automaton: AllDefect, description: 'Always defects.' },
  'all-cooperate': { automaton: AllCooperate, description: 'Always cooperates.' },
  'tit-for-tat': { automaton: TitForTat, description: 'Cooperates first, then copies the opponent.' },
  'grim-trigger': { automaton: GrimTrigger, description: 'Cooperates until the first defection, then defects forever.' },
};

// Aliases for convenience
const ALIASES: Record<string, string> = {
  'alld': 'all-defect',
  'allc': 'all-cooperate',
  'tft': 'tit-for-tat',
  'grim': 'grim-trigger',
};

function resolve(name: string): string {
  return ALIASES[name] ?? name;
}

/**
 * Get a preset automaton by name or alias
 */
export function getPreset(name: string): Automaton {
  const entry = PRESETS[resolve(name)];
  if (!entry) {
    throw new InvalidConfigurationError(`Unknown preset: ${name}. Available: ${listPresets().join(', ')}`);
  }
  return entry.automaton;
}

/**
 * List all preset names
 */
export function listPresets(): string[] {
  return Object.keys(PRESETS);
}

export interface PresetInfo {
  name: string;
  description: string;
  aliases: string[];
}

/**
 * Get preset info (name, description, aliases)
 */
export function getPresetInfo(name: string): PresetInfo | null {
  const resolvedName = resolve(name);
  const entry = PRESETS[resolvedName];
  if (!entry) return null;

  const aliases = Object.entries(ALIASES)
    .filter(([, target]) => target === resolvedName)
    .map(([alias]) => alias);

  return { name: resolvedName, description: entry.description, aliases };
}

/**
 * List all presets with descriptions
 */
export function listPresetsWithInfo(): PresetInfo[] {
  return listPresets().flatMap(name => getPresetInfo(name) ?? []);
}
