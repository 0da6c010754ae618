// types/encounter.ts — Encounter phases, outcomes, events and snapshots

import type { ActorId, Position, Round, Team } from './core.js';
import type { ActorView, CoverKind } from './actor.js';

export type EncounterPhase = 'initializing' | 'in_progress' | 'terminated';
export type Outcome = 'victory' | 'defeat' | 'fled';

export type EscapeReason = 'low_hp' | 'casualties' | 'outnumbered';

export interface EscapeAssessment {
  round: Round;
  available: boolean;
  reasons: EscapeReason[];
  averageHpPercent: number;
}

export type EscapeResult =
  | {
      status: 'resolved';
      success: boolean;
      chance: number;
      roll: number;
      sacrificedId: ActorId | null;
      penaltyDamage: number;
    }
  | { status: 'not_allowed'; reason: string };

export type CombatEvent =
  | { type: 'initiative'; actorId: ActorId; initiative: number }
  | { type: 'round_start'; round: Round }
  | { type: 'turn_start'; round: Round; actorId: ActorId }
  | { type: 'move'; actorId: ActorId; from: Position; to: Position }
  | { type: 'cover'; actorId: ActorId; coverKind: CoverKind }
  | {
      type: 'attack';
      attackerId: ActorId;
      targetId: ActorId;
      hit: boolean;
      critical: boolean;
      damage: number;
      targetHpAfter: number;
    }
  | { type: 'death'; actorId: ActorId; killedBy: ActorId | null }
  | { type: 'escape_available'; round: Round; reasons: EscapeReason[] }
  | { type: 'escape_attempt'; success: boolean; chance: number; roll: number; sacrificedId: ActorId | null }
  | { type: 'rejected'; actorId: ActorId | null; reason: string }
  | { type: 'combat_end'; outcome: Outcome; round: Round };

export interface CoverTile extends Position {
  kind: Exclude<CoverKind, 'none'>;
}

export interface EncounterSnapshot {
  id: string;
  phase: EncounterPhase;
  round: Round;
  active: boolean;
  outcome: Outcome | null;
  currentActorId: ActorId | null;
  turnOrder: ActorId[];
  escapeAvailable: boolean;
  actors: ActorView[];
}

export interface TeamSummary {
  team: Team;
  survivors: ActorId[];
  casualties: ActorId[];
}

export interface EncounterSummary {
  id: string;
  outcome: Outcome | null;
  rounds: Round;
  player: TeamSummary;
  opponent: TeamSummary;
}
