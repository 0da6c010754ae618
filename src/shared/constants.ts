// shared/constants.ts — All combat constants

export const MAX_ACTION_POINTS = 3;
export const DODGE_CAP = 20;
export const BASE_MOVEMENT_RANGE = 4;

export const DEFAULT_ARMOR = 15;
export const DEFAULT_MORALE = 100;

export const GRID_WIDTH = 20;
export const GRID_HEIGHT = 15;

export const AP_MOVE = 1;
export const AP_BASIC_ATTACK = 2;
export const AP_TAKE_COVER = 1;
export const AP_LEAVE_COVER = 0;

export const HIT_CHANCE_MIN = 5;
export const HIT_CHANCE_MAX = 95;
export const COVER_HALF = 25;
export const COVER_FULL = 40;

export const DAMAGE_VARIANCE_MIN = 0.85;
export const DAMAGE_VARIANCE_MAX = 1.15;
export const ARMOR_REDUCTION_MULTIPLIER = 1.0;
export const COVER_DAMAGE_FACTOR = { half: 0.75, full: 0.6 } as const;
export const MIN_DAMAGE = 1;

export const MORALE_SHOCK = [
  { hpFraction: 0.3, moraleLoss: 20 },
  { hpFraction: 0.15, moraleLoss: 10 },
] as const;

export const ESCAPE_MIN_ROUND = 3;
export const ESCAPE_LOW_HP_PERCENT = 50;
export const ESCAPE_OUTNUMBERED_RATIO = 2;
export const ESCAPE_SACRIFICE_CHANCE = 93;
export const ESCAPE_BASE_CHANCE = 45;
export const ESCAPE_PER_REFLEX = 2;
export const ESCAPE_MORALE_PENALTY = 20;
export const ESCAPE_FAIL_DAMAGE_PERCENT = 0.2;

export const RECENT_LOG_LIMIT = 20;
