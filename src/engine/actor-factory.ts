// engine/actor-factory.ts — Builds combat actors from definitions, archetypes and scenarios

import type { ActorDefinition, ActorId, CoverTile, Position, Team } from '../types/index.js';
import { CombatActor } from './actor.js';
import { ARCHETYPES } from '../data/archetypes.js';
import { getWeapon } from '../data/weapons.js';
import type { Scenario } from '../data/scenarios.js';
import { DEFAULT_ARMOR, DEFAULT_MORALE, MAX_ACTION_POINTS } from '../shared/constants.js';
import { generateActorId } from '../shared/utils.js';

export function createActor(def: ActorDefinition): CombatActor {
  return new CombatActor({
    id: def.id ?? generateActorId(),
    name: def.name,
    team: def.team,
    position: def.position,
    attributes: def.attributes,
    maxHp: def.maxHp,
    hp: def.hp ?? def.maxHp,
    armor: def.armor ?? DEFAULT_ARMOR,
    morale: def.morale ?? DEFAULT_MORALE,
    maxAp: def.maxAp ?? MAX_ACTION_POINTS,
    weapon: def.weapon,
    cover: def.cover ?? 'none',
  });
}

export function createFromArchetype(
  archetypeId: string,
  opts: { name: string; team: Team; position: Position; id?: ActorId },
): CombatActor {
  const archetype = ARCHETYPES[archetypeId];
  if (!archetype) {
    throw new Error(`Unknown archetype: ${archetypeId}`);
  }

  return createActor({
    id: opts.id,
    name: opts.name,
    team: opts.team,
    position: opts.position,
    attributes: archetype.attributes,
    maxHp: archetype.maxHp,
    armor: archetype.armor,
    weapon: getWeapon(archetype.weaponId),
  });
}

export interface ScenarioRosters {
  playerTeam: CombatActor[];
  opponentTeam: CombatActor[];
  cover: CoverTile[];
}

export function buildScenario(scenario: Scenario): ScenarioRosters {
  const playerTeam: CombatActor[] = [];
  const opponentTeam: CombatActor[] = [];

  scenario.slots.forEach((slot, i) => {
    const actor = createFromArchetype(slot.archetypeId, {
      id: `${scenario.scenarioId}_${i}`,
      name: slot.name,
      team: slot.team,
      position: slot.position,
    });
    if (slot.team === 'player') playerTeam.push(actor);
    else opponentTeam.push(actor);
  });

  return { playerTeam, opponentTeam, cover: scenario.cover.map((tile) => ({ ...tile })) };
}
