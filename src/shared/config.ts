// shared/config.ts — Runtime config + defaults + env var loading

import type { CombatRules } from './rules.js';
import { resolveRules } from './rules.js';

export interface EngineConfig {
  seed: number;
  maxRounds: number;
  rules: CombatRules;
}

const DEFAULTS = {
  seed: 42,
  maxRounds: 30,
} as const;

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(
  overrides: { seed?: number; maxRounds?: number } = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const seed = overrides.seed ?? readInt(env, 'BREACH_SEED') ?? DEFAULTS.seed;
  const maxRounds = overrides.maxRounds ?? readInt(env, 'BREACH_MAX_ROUNDS') ?? DEFAULTS.maxRounds;
  if (maxRounds < 1) {
    throw new Error(`maxRounds must be at least 1 (got ${maxRounds})`);
  }

  const ruleOverrides: Partial<CombatRules> = {};
  const gridWidth = readInt(env, 'BREACH_GRID_WIDTH');
  const gridHeight = readInt(env, 'BREACH_GRID_HEIGHT');
  if (gridWidth !== undefined) ruleOverrides.gridWidth = gridWidth;
  if (gridHeight !== undefined) ruleOverrides.gridHeight = gridHeight;

  const rules = resolveRules(ruleOverrides);
  if (rules.gridWidth < 1 || rules.gridHeight < 1) {
    throw new Error(`Grid must be at least 1x1 (got ${rules.gridWidth}x${rules.gridHeight})`);
  }

  return { seed, maxRounds, rules };
}
