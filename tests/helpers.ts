// tests/helpers.ts — Shared fixtures: actor builder and a scripted random source

import { RngBase } from '../src/engine/rng.js';
import { createActor } from '../src/engine/actor-factory.js';
import type { CombatActor } from '../src/engine/actor.js';
import type { ActorDefinition, Attributes, Team, Weapon } from '../src/types/index.js';

export const TEST_RIFLE: Weapon = {
  name: 'Test Rifle',
  damage: 20,
  accuracy: 80,
  range: 10,
  armorPenetration: 0,
  critMultiplier: 2,
  type: 'ranged',
};

export function attrs(overrides: Partial<Attributes> = {}): Attributes {
  return { body: 5, reflexes: 5, intelligence: 5, tech: 5, cool: 5, ...overrides };
}

export type ActorOverrides = Partial<ActorDefinition> & { id: string; team: Team };

/** Defaults: 100 HP, no armor, morale 50 (neutral modifier), all attributes 5. */
export function makeActor(overrides: ActorOverrides): CombatActor {
  return createActor({
    name: overrides.name ?? overrides.id,
    position: { x: 0, y: 0 },
    attributes: attrs(),
    maxHp: 100,
    armor: 0,
    morale: 50,
    weapon: TEST_RIFLE,
    ...overrides,
  });
}

/** Replays the given raw values, then repeats `fallback`. */
export class ScriptedRng extends RngBase {
  consumed = 0;
  private readonly queue: number[];

  constructor(
    values: number[],
    private readonly fallback = 0.5,
  ) {
    super();
    this.queue = [...values];
  }

  next(): number {
    this.consumed++;
    return this.queue.shift() ?? this.fallback;
  }
}

/** Raw value that makes nextInt(1, sides) land on `face`. */
export function die(face: number, sides = 100): number {
  return (face - 0.5) / sides;
}
