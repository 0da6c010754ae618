// cli/simulate.ts — Builds the demo skirmish and runs it to completion

import { CombatEncounter } from '../src/engine/encounter.js';
import { buildScenario } from '../src/engine/actor-factory.js';
import { simulateEncounter } from '../src/engine/simulation.js';
import type { SimulationResult } from '../src/engine/simulation.js';
import { DEMO_SKIRMISH } from '../src/data/scenarios.js';
import type { EngineConfig } from '../src/shared/config.js';

export interface SimulateCommandOptions {
  escape: boolean;
  json: boolean;
}

export function runDemoSimulation(config: EngineConfig, escapeWhenAvailable: boolean): SimulationResult {
  const { playerTeam, opponentTeam, cover } = buildScenario(DEMO_SKIRMISH);
  const encounter = new CombatEncounter(playerTeam, opponentTeam, {
    seed: config.seed,
    rules: config.rules,
    cover,
  });
  return simulateEncounter(encounter, { maxRounds: config.maxRounds, escapeWhenAvailable });
}

/** Lines printed for a finished simulation, log first, then the result banner. */
export function formatResult(result: SimulationResult, seed: number): string[] {
  const lines = [...result.log];
  const outcome = result.timedOut ? 'unresolved (round limit reached)' : (result.outcome ?? 'unresolved');
  lines.push(`[BT] seed=${seed} rounds=${result.rounds} outcome=${outcome}`);
  lines.push(
    `[BT] survivors: player=${result.summary.player.survivors.length} opponent=${result.summary.opponent.survivors.length}`,
  );
  return lines;
}

export function writeResult(result: SimulationResult, seed: number, opts: SimulateCommandOptions): void {
  if (opts.json) {
    process.stdout.write(JSON.stringify({ seed, ...result }) + '\n');
    return;
  }
  for (const line of formatResult(result, seed)) {
    console.log(line);
  }
}
