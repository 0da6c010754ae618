// data/weapons.ts — Weapon catalog

import type { Weapon } from '../types/index.js';

export interface WeaponDefinition extends Weapon {
  id: string;
}

export const WEAPONS: Map<string, WeaponDefinition> = new Map();

const catalog: WeaponDefinition[] = [
  { id: 'assault_rifle', name: 'Assault Rifle', damage: 30, accuracy: 85, range: 12, armorPenetration: 0.15, critMultiplier: 2.0, type: 'ranged' },
  { id: 'pistol', name: 'Pistol', damage: 25, accuracy: 90, range: 10, armorPenetration: 0.1, critMultiplier: 2.0, type: 'ranged' },
  { id: 'shotgun', name: 'Shotgun', damage: 45, accuracy: 75, range: 6, armorPenetration: 0.05, critMultiplier: 1.5, type: 'ranged' },
  { id: 'katana', name: 'Katana', damage: 35, accuracy: 95, range: 1, armorPenetration: 0.2, critMultiplier: 2.5, type: 'melee' },
  { id: 'shock_glove', name: 'Shock Glove', damage: 20, accuracy: 80, range: 1, armorPenetration: 0.5, critMultiplier: 1.5, type: 'tech' },
];

for (const weapon of catalog) {
  WEAPONS.set(weapon.id, weapon);
}

export function getWeapon(id: string): WeaponDefinition {
  const weapon = WEAPONS.get(id);
  if (!weapon) {
    throw new Error(`Unknown weapon: ${id}`);
  }
  return weapon;
}
