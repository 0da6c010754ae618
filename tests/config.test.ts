// tests/config.test.ts — Tests for env-driven engine configuration

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/shared/config.js';
import { DEFAULT_RULES } from '../src/shared/rules.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({}, {});
    expect(config.seed).toBe(42);
    expect(config.maxRounds).toBe(30);
    expect(config.rules).toEqual(DEFAULT_RULES);
  });

  it('reads BREACH_* variables', () => {
    const config = loadConfig({}, {
      BREACH_SEED: '7',
      BREACH_MAX_ROUNDS: '12',
      BREACH_GRID_WIDTH: '10',
      BREACH_GRID_HEIGHT: '8',
    });
    expect(config.seed).toBe(7);
    expect(config.maxRounds).toBe(12);
    expect(config.rules.gridWidth).toBe(10);
    expect(config.rules.gridHeight).toBe(8);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ seed: 99 }, { BREACH_SEED: '7' });
    expect(config.seed).toBe(99);
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({}, { BREACH_SEED: '' }).seed).toBe(42);
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({}, { BREACH_SEED: 'abc' })).toThrow('BREACH_SEED must be an integer (got "abc")');
    expect(() => loadConfig({ maxRounds: 0 }, {})).toThrow('maxRounds must be at least 1 (got 0)');
    expect(() => loadConfig({}, { BREACH_GRID_WIDTH: '0' })).toThrow('Grid must be at least 1x1 (got 0x15)');
  });
});
