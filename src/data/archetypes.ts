// data/archetypes.ts — Stat presets for player characters and enemies

import type { Attributes } from '../types/index.js';

export interface Archetype {
  archetypeId: string;
  attributes: Attributes;
  maxHp: number;
  armor: number;
  weaponId: string;
}

export const ARCHETYPES: Record<string, Archetype> = {
  operative: {
    archetypeId: 'operative',
    attributes: { body: 5, reflexes: 6, intelligence: 4, tech: 4, cool: 5 },
    maxHp: 150,
    armor: 15,
    weaponId: 'assault_rifle',
  },
  bruiser: {
    archetypeId: 'bruiser',
    attributes: { body: 6, reflexes: 5, intelligence: 3, tech: 3, cool: 4 },
    maxHp: 180,
    armor: 15,
    weaponId: 'shotgun',
  },
  grunt: {
    archetypeId: 'grunt',
    attributes: { body: 4, reflexes: 4, intelligence: 2, tech: 2, cool: 3 },
    maxHp: 80,
    armor: 15,
    weaponId: 'pistol',
  },
  elite: {
    archetypeId: 'elite',
    attributes: { body: 6, reflexes: 6, intelligence: 4, tech: 4, cool: 6 },
    maxHp: 150,
    armor: 15,
    weaponId: 'assault_rifle',
  },
};
