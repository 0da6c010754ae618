// index.ts — Public API of the combat engine

export * from './types/index.js';

export { CombatEncounter } from './engine/encounter.js';
export type { EncounterOptions } from './engine/encounter.js';
export { CombatActor } from './engine/actor.js';
export type { CombatActorInit } from './engine/actor.js';
export { createActor, createFromArchetype, buildScenario } from './engine/actor-factory.js';
export type { ScenarioRosters } from './engine/actor-factory.js';
export { DamageResolver } from './engine/damage-resolver.js';
export type { AttackOutcome, DamageRoll, HitRoll } from './engine/damage-resolver.js';
export { TurnScheduler } from './engine/turn-scheduler.js';
export type { InitiativeEntry, AdvanceHooks } from './engine/turn-scheduler.js';
export { EscapeNegotiator } from './engine/escape-negotiator.js';
export type { EscapeRoll } from './engine/escape-negotiator.js';
export { OpponentController } from './engine/opponent-controller.js';
export { ActionValidator } from './engine/validator.js';
export type { Battlefield } from './engine/validator.js';
export { InvalidEncounterError } from './engine/errors.js';
export type { InvalidEncounterCode } from './engine/errors.js';
export { RngBase, SeededRng, MathRng } from './engine/rng.js';
export type { Rng } from './engine/rng.js';
export { simulateEncounter } from './engine/simulation.js';
export type { SimulationOptions, SimulationResult } from './engine/simulation.js';

export { DEFAULT_RULES, resolveRules } from './shared/rules.js';
export type { CombatRules } from './shared/rules.js';
export { loadConfig } from './shared/config.js';
export type { EngineConfig } from './shared/config.js';

export { WEAPONS, getWeapon } from './data/weapons.js';
export type { WeaponDefinition } from './data/weapons.js';
export { ARCHETYPES } from './data/archetypes.js';
export type { Archetype } from './data/archetypes.js';
export { DEMO_SKIRMISH } from './data/scenarios.js';
export type { Scenario, ScenarioSlot } from './data/scenarios.js';
