// types/index.ts — Barrel export

export type { ActorId, Round, Team, Position } from './core.js';
export { distance, samePosition, otherTeam } from './core.js';

export type {
  WeaponType,
  CoverKind,
  Attributes,
  Weapon,
  ActorDefinition,
  ActorView,
  DamageTaken,
} from './actor.js';

export type {
  ActionType,
  ActionRequest,
  AttackResolution,
  ValidatedAction,
  RejectedAction,
  AcceptedAction,
  ActionResult,
} from './action.js';

export type {
  EncounterPhase,
  Outcome,
  EscapeReason,
  EscapeAssessment,
  EscapeResult,
  CombatEvent,
  CoverTile,
  EncounterSnapshot,
  TeamSummary,
  EncounterSummary,
} from './encounter.js';
