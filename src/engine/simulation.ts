// engine/simulation.ts — Drives an encounter to the end with the AI on both sides

import type { EncounterSummary, Outcome } from '../types/index.js';
import type { CombatEncounter } from './encounter.js';

export interface SimulationOptions {
  maxRounds: number;
  /** Player side tries a solo escape once per round while it is offered */
  escapeWhenAvailable?: boolean;
}

export interface SimulationResult {
  outcome: Outcome | null;
  rounds: number;
  timedOut: boolean;
  summary: EncounterSummary;
  log: string[];
}

export function simulateEncounter(encounter: CombatEncounter, opts: SimulationOptions): SimulationResult {
  let lastEscapeRound = 0;

  while (encounter.active && encounter.round <= opts.maxRounds) {
    const current = encounter.currentActor;
    if (!current) break;

    if (current.team === 'opponent') {
      encounter.runOpponentTurn();
      continue;
    }

    if (opts.escapeWhenAvailable && encounter.escapeAvailable && lastEscapeRound !== encounter.round) {
      lastEscapeRound = encounter.round;
      encounter.attemptEscape();
      continue;
    }

    const request = encounter.suggestAction();
    if (!request) break;
    const result = encounter.submit(request);
    if (result.status === 'not_allowed' && encounter.currentActor?.id === current.id) {
      encounter.nextTurn();
    }
  }

  return {
    outcome: encounter.outcome,
    rounds: encounter.round,
    timedOut: encounter.active,
    summary: encounter.summary(),
    log: encounter.log,
  };
}
