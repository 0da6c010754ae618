// types/action.ts — Action requests, validation and results

import type { ActorId, Position } from './core.js';
import type { CoverKind } from './actor.js';

export type ActionType = 'move' | 'attack' | 'take_cover' | 'leave_cover' | 'end_turn';

export type ActionRequest =
  | { type: 'move'; dx: number; dy: number }
  | { type: 'attack'; targetId: ActorId }
  | { type: 'take_cover' }
  | { type: 'leave_cover' }
  | { type: 'end_turn' };

export interface AttackResolution {
  attackerId: ActorId;
  targetId: ActorId;
  hitChance: number;
  roll: number;
  hit: boolean;
  critical: boolean;
  damage: number;
  targetHpAfter: number;
  targetDied: boolean;
}

export interface ValidatedAction {
  actorId: ActorId;
  request: ActionRequest;
  cost: number;
  /** Resolved destination for moves, resolved cover kind for take_cover */
  destination?: Position;
  coverKind?: CoverKind;
  valid: true;
}

export interface RejectedAction {
  status: 'not_allowed';
  actorId: ActorId | null;
  request: ActionRequest;
  reason: string;
}

export interface AcceptedAction {
  status: 'accepted';
  actorId: ActorId;
  request: ActionRequest;
  apRemaining: number;
  attack?: AttackResolution;
  turnEnded: boolean;
}

export type ActionResult = AcceptedAction | RejectedAction;
