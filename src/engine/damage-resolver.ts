// engine/damage-resolver.ts — Hit chance, hit roll and damage formula for one attacker/defender pair

import type { CombatActor } from './actor.js';
import type { Rng } from './rng.js';
import type { CombatRules } from '../shared/rules.js';
import { clamp } from '../shared/utils.js';
import {
  COVER_DAMAGE_FACTOR,
  DAMAGE_VARIANCE_MAX,
  DAMAGE_VARIANCE_MIN,
  HIT_CHANCE_MAX,
  HIT_CHANCE_MIN,
  MIN_DAMAGE,
} from '../shared/constants.js';

export interface DamageRoll {
  damage: number;
  critical: boolean;
}

export interface HitRoll {
  hitChance: number;
  roll: number;
  hit: boolean;
}

export interface AttackOutcome extends HitRoll, DamageRoll {}

/**
 * Stateless apart from the rules it was built with. Reads actors, never mutates them;
 * applying the damage is the encounter's job so the victory check runs right after.
 *
 * RNG draw order per attack: hit roll, then on a hit the variance and the crit roll.
 */
export class DamageResolver {
  constructor(private readonly rules: CombatRules) {}

  hitChance(attacker: CombatActor, defender: CombatActor): number {
    let hit = attacker.weapon.accuracy - defender.dodgeChance();

    if (defender.inCover) {
      hit -= defender.coverKind === 'half' ? this.rules.coverHalfPenalty : this.rules.coverFullPenalty;
    }

    return clamp(hit, HIT_CHANCE_MIN, HIT_CHANCE_MAX);
  }

  rollHit(attacker: CombatActor, defender: CombatActor, rng: Rng): HitRoll {
    const hitChance = this.hitChance(attacker, defender);
    const roll = rng.nextInt(1, 100);
    return { hitChance, roll, hit: roll <= hitChance };
  }

  rollDamage(attacker: CombatActor, defender: CombatActor, rng: Rng): DamageRoll {
    const { weapon, attributes } = attacker;

    const base = weapon.damage * rng.nextFloat(DAMAGE_VARIANCE_MIN, DAMAGE_VARIANCE_MAX);
    const statBonus = weapon.type === 'melee' ? attributes.body * 3 : attributes.reflexes * 2;

    const critical = rng.nextInt(1, 100) <= attacker.critChance();
    const critMult = critical ? weapon.critMultiplier : 1.0;

    let total = (base + statBonus) * critMult * attacker.moraleModifier();

    const effectiveArmor = defender.armor * (1 - weapon.armorPenetration);
    total -= effectiveArmor * this.rules.armorReductionMultiplier;

    // Tech weapons ignore the cover damage reduction (not the hit penalty)
    if (defender.inCover && weapon.type !== 'tech') {
      total *= defender.coverKind === 'half' ? COVER_DAMAGE_FACTOR.half : COVER_DAMAGE_FACTOR.full;
    }

    return { damage: Math.max(MIN_DAMAGE, Math.round(total)), critical };
  }

  resolve(attacker: CombatActor, defender: CombatActor, rng: Rng): AttackOutcome {
    const hitRoll = this.rollHit(attacker, defender, rng);
    if (!hitRoll.hit) {
      return { ...hitRoll, damage: 0, critical: false };
    }
    return { ...hitRoll, ...this.rollDamage(attacker, defender, rng) };
  }
}
