#!/usr/bin/env node
/**
 * Preset Tournament CLI
 *
 * Plays a round-robin between preset automata.
 *
 * Usage:
 *   node dist/bin/tournament.js [presets] [--rounds N] [--json]
 *
 * Examples:
 *   node dist/bin/tournament.js
 *   node dist/bin/tournament.js tft,alld,grim --rounds 50
 */

import { parseArgs } from 'util';

import { getPreset, listPresets, listPresetsWithInfo } from '../lib/presets.js';
import { formatStandings } from '../lib/report.js';
import { runTournament } from '../lib/tournament.js';
import { parseIntOption } from '../lib/options.js';

function main(): void {
  const { values, positionals } = parseArgs({
    options: {
      rounds: { type: 'string', short: 'r', default: '10' },
      json: { type: 'boolean', default: false },
      list: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  if (values.list) {
    for (const info of listPresetsWithInfo()) {
      const aliases = info.aliases.length > 0 ? ` (${info.aliases.join(', ')})` : '';
      console.log(`${info.name}${aliases}: ${info.description}`);
    }
    return;
  }

  const rounds = parseIntOption('rounds', values.rounds, 1) ?? 10;

  const names = positionals.length > 0
    ? positionals.flatMap(p => p.split(',')).filter(Boolean)
    : listPresets();
  const entrants = names.map(name => ({ name, automaton: getPreset(name) }));

  const standings = runTournament(entrants, rounds);

  if (values.json) {
    console.log(JSON.stringify({ rounds, standings }));
    return;
  }

  console.log(`=== Tournament: ${entrants.length} entrants, ${rounds} rounds per match ===\n`);
  console.log(formatStandings(standings));
}

try {
  main();
} catch (e: unknown) {
  const msg = e instanceof Error ? e.message : String(e);
  console.error('Fatal:', msg);
  process.exit(1);
}
