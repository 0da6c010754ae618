// engine/opponent-controller.ts — Simple AI: attack the closest target in range, else step toward the closest hostile

import type { ActionRequest } from '../types/index.js';
import { distance, samePosition } from '../types/index.js';
import { sign } from '../shared/utils.js';
import type { CombatActor } from './actor.js';
import type { Battlefield } from './validator.js';

export class OpponentController {
  /**
   * One decision for `actor`. No pathfinding and no threat ranking; a blocked step
   * ends the turn instead of searching for a detour.
   */
  decide(actor: CombatActor, field: Battlefield): ActionRequest {
    const { attackCost, moveCost } = field.rules;

    const targets = field.validTargets(actor);
    if (targets.length > 0 && actor.ap >= attackCost) {
      const target = this.closest(actor, targets);
      if (target) return { type: 'attack', targetId: target.id };
    }

    if (actor.ap >= moveCost) {
      const target = this.closest(actor, field.livingHostiles(actor));
      if (target) {
        const from = actor.position;
        const to = target.position;
        const dx = sign(to.x - from.x);
        const dy = sign(to.y - from.y);
        const destination = { x: from.x + dx, y: from.y + dy };

        if ((dx !== 0 || dy !== 0) && field.validMoves(actor).some((p) => samePosition(p, destination))) {
          return { type: 'move', dx, dy };
        }
      }
    }

    return { type: 'end_turn' };
  }

  /** Ties go to the earlier roster entry. */
  private closest(from: CombatActor, candidates: CombatActor[]): CombatActor | undefined {
    let best: CombatActor | undefined;
    let bestDistance = Infinity;
    for (const candidate of candidates) {
      const d = distance(from.position, candidate.position);
      if (d < bestDistance) {
        best = candidate;
        bestDistance = d;
      }
    }
    return best;
  }
}
