// shared/rules.ts — Tunable rule set for one encounter

import {
  AP_BASIC_ATTACK,
  AP_LEAVE_COVER,
  AP_MOVE,
  AP_TAKE_COVER,
  ARMOR_REDUCTION_MULTIPLIER,
  BASE_MOVEMENT_RANGE,
  COVER_FULL,
  COVER_HALF,
  ESCAPE_MIN_ROUND,
  GRID_HEIGHT,
  GRID_WIDTH,
} from './constants.js';

export interface CombatRules {
  gridWidth: number;
  gridHeight: number;
  baseMovementRange: number;
  moveCost: number;
  attackCost: number;
  takeCoverCost: number;
  leaveCoverCost: number;
  coverHalfPenalty: number;
  coverFullPenalty: number;
  armorReductionMultiplier: number;
  escapeMinRound: number;
}

export const DEFAULT_RULES: Readonly<CombatRules> = {
  gridWidth: GRID_WIDTH,
  gridHeight: GRID_HEIGHT,
  baseMovementRange: BASE_MOVEMENT_RANGE,
  moveCost: AP_MOVE,
  attackCost: AP_BASIC_ATTACK,
  takeCoverCost: AP_TAKE_COVER,
  leaveCoverCost: AP_LEAVE_COVER,
  coverHalfPenalty: COVER_HALF,
  coverFullPenalty: COVER_FULL,
  armorReductionMultiplier: ARMOR_REDUCTION_MULTIPLIER,
  escapeMinRound: ESCAPE_MIN_ROUND,
};

export function resolveRules(overrides: Partial<CombatRules> = {}): CombatRules {
  return { ...DEFAULT_RULES, ...overrides };
}
