#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { Command } from 'commander';
import { loadConfig } from '../src/shared/config.js';
import { runDemoSimulation, writeResult } from './simulate.js';
import { ARCHETYPES } from '../src/data/archetypes.js';
import { WEAPONS } from '../src/data/weapons.js';

const program = new Command();

program
  .name('breach-tactics')
  .description('Turn-based tactical combat engine')
  .version('0.1.0');

program
  .command('simulate')
  .description('Run the demo skirmish with the AI playing both sides')
  .option('--seed <n>', 'RNG seed (default: BREACH_SEED or 42)')
  .option('--max-rounds <n>', 'Stop after this many rounds (default: BREACH_MAX_ROUNDS or 30)')
  .option('--escape', 'Player side attempts to escape whenever it is offered', false)
  .option('--json', 'Print the result as one JSON line', false)
  .action((opts: { seed?: string; maxRounds?: string; escape: boolean; json: boolean }) => {
    try {
      const config = loadConfig({
        seed: parseIntOption('--seed', opts.seed),
        maxRounds: parseIntOption('--max-rounds', opts.maxRounds),
      });
      const result = runDemoSimulation(config, opts.escape);
      writeResult(result, config.seed, opts);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[BT] ${msg}\n`);
      process.exit(1);
    }
  });

program
  .command('catalog')
  .description('List the available archetypes and weapons')
  .action(() => {
    for (const archetype of Object.values(ARCHETYPES)) {
      const a = archetype.attributes;
      console.log(
        `${archetype.archetypeId}: hp=${archetype.maxHp} armor=${archetype.armor} weapon=${archetype.weaponId} ` +
          `body=${a.body} reflexes=${a.reflexes} int=${a.intelligence} tech=${a.tech} cool=${a.cool}`,
      );
    }
    for (const weapon of WEAPONS.values()) {
      console.log(
        `${weapon.id}: ${weapon.type} dmg=${weapon.damage} acc=${weapon.accuracy} range=${weapon.range} ` +
          `pen=${weapon.armorPenetration} crit=x${weapon.critMultiplier}`,
      );
    }
  });

function parseIntOption(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${flag} must be an integer (got "${raw}")`);
  }
  return value;
}

program.parse();
