// engine/escape-negotiator.ts — Round-gated escape availability and escape attempt resolution

import type { EscapeAssessment, EscapeReason } from '../types/index.js';
import type { CombatActor } from './actor.js';
import type { Rng } from './rng.js';
import { clamp } from '../shared/utils.js';
import {
  ESCAPE_BASE_CHANCE,
  ESCAPE_FAIL_DAMAGE_PERCENT,
  ESCAPE_LOW_HP_PERCENT,
  ESCAPE_OUTNUMBERED_RATIO,
  ESCAPE_PER_REFLEX,
  ESCAPE_SACRIFICE_CHANCE,
  HIT_CHANCE_MAX,
  HIT_CHANCE_MIN,
} from '../shared/constants.js';

export interface EscapeRoll {
  chance: number;
  roll: number;
  success: boolean;
}

export class EscapeNegotiator {
  constructor(
    private readonly minRound: number,
    private readonly startingPlayerCount: number,
  ) {}

  /**
   * Pure: reads the rosters and returns what the flag should be for `round`.
   * The encounter commits the result before anyone can observe it.
   */
  assess(round: number, playerTeam: readonly CombatActor[], opponentTeam: readonly CombatActor[]): EscapeAssessment {
    const livingPlayers = playerTeam.filter((a) => a.alive);
    const livingOpponents = opponentTeam.filter((a) => a.alive);
    const averageHpPercent = averageHp(livingPlayers);

    if (round < this.minRound || livingPlayers.length === 0) {
      return { round, available: false, reasons: [], averageHpPercent };
    }

    const reasons: EscapeReason[] = [];
    if (averageHpPercent < ESCAPE_LOW_HP_PERCENT) reasons.push('low_hp');
    if (livingPlayers.length < this.startingPlayerCount) reasons.push('casualties');
    if (livingOpponents.length >= livingPlayers.length * ESCAPE_OUTNUMBERED_RATIO) reasons.push('outnumbered');

    return { round, available: reasons.length > 0, reasons, averageHpPercent };
  }

  escapeChance(leader: CombatActor, withSacrifice: boolean): number {
    if (withSacrifice) return ESCAPE_SACRIFICE_CHANCE;
    return clamp(ESCAPE_BASE_CHANCE + leader.attributes.reflexes * ESCAPE_PER_REFLEX, HIT_CHANCE_MIN, HIT_CHANCE_MAX);
  }

  roll(leader: CombatActor, withSacrifice: boolean, rng: Rng): EscapeRoll {
    const chance = this.escapeChance(leader, withSacrifice);
    const roll = rng.nextInt(1, 100);
    return { chance, roll, success: roll <= chance };
  }

  failurePenalty(leader: CombatActor): number {
    return Math.floor(leader.maxHp * ESCAPE_FAIL_DAMAGE_PERCENT);
  }
}

function averageHp(actors: readonly CombatActor[]): number {
  if (actors.length === 0) return 0;
  return actors.reduce((sum, a) => sum + a.hpPercentage(), 0) / actors.length;
}
