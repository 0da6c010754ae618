// tests/cli.test.ts — Tests for the simulate command's output

import { describe, it, expect } from 'vitest';
import { formatResult, runDemoSimulation } from '../cli/simulate.js';
import { loadConfig } from '../src/shared/config.js';
import type { SimulationResult } from '../src/engine/simulation.js';

function result(overrides: Partial<SimulationResult> = {}): SimulationResult {
  return {
    outcome: 'victory',
    rounds: 4,
    timedOut: false,
    summary: {
      id: 'enc-test',
      outcome: 'victory',
      rounds: 4,
      player: { team: 'player', survivors: ['a'], casualties: ['b'] },
      opponent: { team: 'opponent', survivors: [], casualties: ['c', 'd'] },
    },
    log: ['=== COMBAT START ===', '=== VICTORY ==='],
    ...overrides,
  };
}

describe('formatResult', () => {
  it('prints the log followed by the result banner', () => {
    expect(formatResult(result(), 42)).toEqual([
      '=== COMBAT START ===',
      '=== VICTORY ===',
      '[BT] seed=42 rounds=4 outcome=victory',
      '[BT] survivors: player=1 opponent=0',
    ]);
  });

  it('reports a timeout as unresolved', () => {
    const lines = formatResult(result({ outcome: null, timedOut: true, rounds: 31 }), 7);
    expect(lines.at(-2)).toBe('[BT] seed=7 rounds=31 outcome=unresolved (round limit reached)');
  });
});

describe('runDemoSimulation', () => {
  it('runs the demo skirmish reproducibly', () => {
    const config = loadConfig({ seed: 3 }, {});
    const first = runDemoSimulation(config, false);
    const second = runDemoSimulation(config, false);

    expect(first.log[0]).toBe('=== COMBAT START ===');
    expect(first.log[1]).toMatch(/ rolled initiative: \d+$/);
    expect(second.log).toEqual(first.log);
  });
});
