// tests/simulation.test.ts — Tests for the AI-vs-AI simulation runner

import { describe, it, expect } from 'vitest';
import { CombatEncounter } from '../src/engine/encounter.js';
import { buildScenario } from '../src/engine/actor-factory.js';
import { simulateEncounter } from '../src/engine/simulation.js';
import { DEMO_SKIRMISH } from '../src/data/scenarios.js';
import { makeActor, ScriptedRng, die } from './helpers.js';

function demo(seed: number): CombatEncounter {
  const { playerTeam, opponentTeam, cover } = buildScenario(DEMO_SKIRMISH);
  return new CombatEncounter(playerTeam, opponentTeam, { seed, cover, id: 'demo' });
}

/** Nobody can act, so only the round limit or an escape ends the fight. */
function standoff(playerHp = 100): CombatEncounter {
  const p1 = makeActor({ id: 'p1', team: 'player', hp: playerHp, maxAp: 0 });
  const o1 = makeActor({ id: 'o1', team: 'opponent', maxAp: 0, position: { x: 15, y: 10 } });
  return new CombatEncounter([p1], [o1], { rng: new ScriptedRng([], die(5, 10)) });
}

describe('simulateEncounter', () => {
  it('replays identically for the same seed', () => {
    const first = simulateEncounter(demo(7), { maxRounds: 30 });
    const second = simulateEncounter(demo(7), { maxRounds: 30 });

    expect(second.log).toEqual(first.log);
    expect(second.outcome).toBe(first.outcome);
    expect(second.rounds).toBe(first.rounds);
  });

  it('ends with an outcome or a timeout, never both', () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const result = simulateEncounter(demo(seed), { maxRounds: 30 });
      expect(result.timedOut).toBe(result.outcome === null);

      const { player, opponent } = result.summary;
      const ids = [...player.survivors, ...player.casualties, ...opponent.survivors, ...opponent.casualties];
      expect(ids.sort()).toEqual(['demo_skirmish_0', 'demo_skirmish_1', 'demo_skirmish_2', 'demo_skirmish_3', 'demo_skirmish_4']);
      if (result.outcome === 'victory') expect(opponent.survivors).toEqual([]);
      if (result.outcome === 'defeat') expect(player.survivors).toEqual([]);
    }
  });

  it('stops at the round limit', () => {
    const result = simulateEncounter(standoff(), { maxRounds: 3 });

    expect(result.timedOut).toBe(true);
    expect(result.outcome).toBeNull();
    expect(result.rounds).toBe(4);
  });

  it('takes the escape once it is offered', () => {
    // Solo chance 55 (reflexes 5); every d100 lands on 46
    const result = simulateEncounter(standoff(40), { maxRounds: 10, escapeWhenAvailable: true });

    expect(result.outcome).toBe('fled');
    expect(result.rounds).toBe(3);
    expect(result.log).toContain('Attempting solo escape... (55% chance, rolled 46)');
  });
});
