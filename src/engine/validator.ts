// engine/validator.ts — Action validation (AP, legal moves, legal targets, cover)

import type {
  ActionRequest,
  CoverKind,
  Position,
  RejectedAction,
  ValidatedAction,
} from '../types/index.js';
import { samePosition } from '../types/index.js';
import type { CombatRules } from '../shared/rules.js';
import type { CombatActor } from './actor.js';

/** What validation and the AI need to see of the encounter. */
export interface Battlefield {
  readonly rules: CombatRules;
  findActor(id: string): CombatActor | undefined;
  validMoves(actor: CombatActor): Position[];
  validTargets(actor: CombatActor): CombatActor[];
  livingHostiles(actor: CombatActor): CombatActor[];
  coverAdjacentTo(position: Position): CoverKind;
}

const COVER_RANK: Record<CoverKind, number> = { none: 0, half: 1, full: 2 };

export class ActionValidator {
  validate(
    actor: CombatActor,
    request: ActionRequest,
    field: Battlefield,
  ): ValidatedAction | RejectedAction {
    if (!actor.alive) return this.reject(actor, request, 'Actor is dead');

    switch (request.type) {
      case 'move':
        return this.validateMove(actor, request, field);
      case 'attack':
        return this.validateAttack(actor, request, field);
      case 'take_cover':
        return this.validateTakeCover(actor, request, field);
      case 'leave_cover':
        if (!actor.inCover) return this.reject(actor, request, 'Not in cover');
        return this.approve(actor, request, field.rules.leaveCoverCost);
      case 'end_turn':
        return this.approve(actor, request, 0);
      default:
        return this.reject(actor, request, 'Unknown action type');
    }
  }

  private validateMove(
    actor: CombatActor,
    request: Extract<ActionRequest, { type: 'move' }>,
    field: Battlefield,
  ): ValidatedAction | RejectedAction {
    if (!Number.isInteger(request.dx) || !Number.isInteger(request.dy)) {
      return this.reject(actor, request, 'Move offsets must be integers');
    }
    if (request.dx === 0 && request.dy === 0) {
      return this.reject(actor, request, 'Already there');
    }

    const cost = field.rules.moveCost;
    if (actor.ap < cost) return this.reject(actor, request, 'Not enough AP');

    const from = actor.position;
    const destination = { x: from.x + request.dx, y: from.y + request.dy };
    const legal = field.validMoves(actor).some((p) => samePosition(p, destination));
    if (!legal) {
      return this.reject(actor, request, `Cannot move to (${destination.x}, ${destination.y})`);
    }

    return { ...this.approve(actor, request, cost), destination };
  }

  private validateAttack(
    actor: CombatActor,
    request: Extract<ActionRequest, { type: 'attack' }>,
    field: Battlefield,
  ): ValidatedAction | RejectedAction {
    if (request.targetId === actor.id) return this.reject(actor, request, 'Cannot attack yourself');

    const target = field.findActor(request.targetId);
    if (!target) return this.reject(actor, request, 'Target not found');

    const cost = field.rules.attackCost;
    if (actor.ap < cost) return this.reject(actor, request, 'Not enough AP');

    if (!field.validTargets(actor).some((t) => t.id === target.id)) {
      if (target.team === actor.team) return this.reject(actor, request, 'Cannot attack an ally');
      if (!target.alive) return this.reject(actor, request, 'Target is dead');
      return this.reject(actor, request, 'Target out of range');
    }

    return this.approve(actor, request, cost);
  }

  private validateTakeCover(
    actor: CombatActor,
    request: Extract<ActionRequest, { type: 'take_cover' }>,
    field: Battlefield,
  ): ValidatedAction | RejectedAction {
    const coverKind = field.coverAdjacentTo(actor.position);
    if (coverKind === 'none') return this.reject(actor, request, 'No cover nearby');
    if (COVER_RANK[coverKind] <= COVER_RANK[actor.coverKind]) {
      return this.reject(actor, request, 'Already in cover');
    }

    const cost = field.rules.takeCoverCost;
    if (actor.ap < cost) return this.reject(actor, request, 'Not enough AP');

    return { ...this.approve(actor, request, cost), coverKind };
  }

  private approve(actor: CombatActor, request: ActionRequest, cost: number): ValidatedAction {
    return { actorId: actor.id, request, cost, valid: true };
  }

  private reject(actor: CombatActor, request: ActionRequest, reason: string): RejectedAction {
    return { status: 'not_allowed', actorId: actor.id, request, reason };
  }
}
