// types/actor.ts — Actor attributes, weapons, definitions and read-only views

import type { ActorId, Position, Team } from './core.js';

export type WeaponType = 'melee' | 'ranged' | 'tech';
export type CoverKind = 'none' | 'half' | 'full';

export interface Attributes {
  body: number;
  reflexes: number;
  intelligence: number;
  tech: number;
  cool: number;
}

export interface Weapon {
  name: string;
  damage: number;
  accuracy: number;
  range: number;
  /** Fraction of armor ignored, 0..1 */
  armorPenetration: number;
  critMultiplier: number;
  type: WeaponType;
}

/** Input of the actor factory: everything an external character/enemy definition provides. */
export interface ActorDefinition {
  id?: ActorId;
  name: string;
  team: Team;
  position: Position;
  attributes: Attributes;
  maxHp: number;
  hp?: number;
  armor?: number;
  morale?: number;
  maxAp?: number;
  weapon: Weapon;
  cover?: CoverKind;
}

export interface ActorView {
  id: ActorId;
  name: string;
  team: Team;
  position: Position;
  attributes: Attributes;
  hp: number;
  maxHp: number;
  hpPercentage: number;
  armor: number;
  morale: number;
  ap: number;
  maxAp: number;
  weapon: Weapon;
  alive: boolean;
  hasActed: boolean;
  hasMoved: boolean;
  inCover: boolean;
  coverKind: CoverKind;
}

export interface DamageTaken {
  dealt: number;
  hpAfter: number;
  died: boolean;
  moraleLost: number;
}
