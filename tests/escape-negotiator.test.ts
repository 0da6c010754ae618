// tests/escape-negotiator.test.ts — Tests for escape availability and escape rolls

import { describe, it, expect } from 'vitest';
import { EscapeNegotiator } from '../src/engine/escape-negotiator.js';
import { makeActor, attrs, ScriptedRng, die } from './helpers.js';

describe('EscapeNegotiator.assess', () => {
  it('never offers escape before round 3', () => {
    const negotiator = new EscapeNegotiator(3, 2);
    const players = [makeActor({ id: 'p1', team: 'player', hp: 10 }), makeActor({ id: 'p2', team: 'player', hp: 0 })];
    const opponents = [makeActor({ id: 'o1', team: 'opponent' }), makeActor({ id: 'o2', team: 'opponent' })];

    expect(negotiator.assess(1, players, opponents).available).toBe(false);
    expect(negotiator.assess(2, players, opponents).available).toBe(false);
    expect(negotiator.assess(3, players, opponents)).toEqual({
      round: 3,
      available: true,
      reasons: ['low_hp', 'casualties', 'outnumbered'],
      averageHpPercent: 10,
    });
  });

  it('offers escape when average hp drops below half', () => {
    const negotiator = new EscapeNegotiator(3, 2);
    const players = [makeActor({ id: 'p1', team: 'player', hp: 40 }), makeActor({ id: 'p2', team: 'player', hp: 50 })];
    const opponents = [makeActor({ id: 'o1', team: 'opponent' })];

    const assessment = negotiator.assess(3, players, opponents);
    expect(assessment.reasons).toEqual(['low_hp']);
    expect(assessment.averageHpPercent).toBe(45);
  });

  it('offers escape after a casualty', () => {
    const negotiator = new EscapeNegotiator(3, 3);
    const players = [makeActor({ id: 'p1', team: 'player' }), makeActor({ id: 'p2', team: 'player' })];
    const opponents = [makeActor({ id: 'o1', team: 'opponent' })];

    expect(negotiator.assess(4, players, opponents).reasons).toEqual(['casualties']);
  });

  it('offers escape when outnumbered two to one', () => {
    const negotiator = new EscapeNegotiator(3, 1);
    const players = [makeActor({ id: 'p1', team: 'player' })];
    const opponents = [makeActor({ id: 'o1', team: 'opponent' }), makeActor({ id: 'o2', team: 'opponent' })];

    expect(negotiator.assess(3, players, opponents).reasons).toEqual(['outnumbered']);
  });

  it('withholds escape from a healthy, even fight', () => {
    const negotiator = new EscapeNegotiator(3, 2);
    const players = [makeActor({ id: 'p1', team: 'player' }), makeActor({ id: 'p2', team: 'player' })];
    const opponents = [makeActor({ id: 'o1', team: 'opponent' }), makeActor({ id: 'o2', team: 'opponent' })];

    expect(negotiator.assess(5, players, opponents)).toEqual({
      round: 5,
      available: false,
      reasons: [],
      averageHpPercent: 100,
    });
  });
});

describe('EscapeNegotiator rolls', () => {
  const negotiator = new EscapeNegotiator(3, 2);

  it('uses 93% with a sacrifice', () => {
    const leader = makeActor({ id: 'p1', team: 'player' });
    expect(negotiator.escapeChance(leader, true)).toBe(93);
  });

  it('uses 45% plus 2 per reflex point alone, capped at 95', () => {
    expect(negotiator.escapeChance(makeActor({ id: 'p1', team: 'player', attributes: attrs({ reflexes: 6 }) }), false)).toBe(57);
    expect(negotiator.escapeChance(makeActor({ id: 'p1', team: 'player', attributes: attrs({ reflexes: 30 }) }), false)).toBe(95);
  });

  it('succeeds on a roll at or below the chance', () => {
    const leader = makeActor({ id: 'p1', team: 'player' });
    expect(negotiator.roll(leader, true, new ScriptedRng([die(93)]))).toEqual({ chance: 93, roll: 93, success: true });
    expect(negotiator.roll(leader, true, new ScriptedRng([die(94)]))).toEqual({ chance: 93, roll: 94, success: false });
  });

  it('charges 20% of the leader maxHp on a failed solo escape', () => {
    expect(negotiator.failurePenalty(makeActor({ id: 'p1', team: 'player', maxHp: 150 }))).toBe(30);
    expect(negotiator.failurePenalty(makeActor({ id: 'p1', team: 'player', maxHp: 99 }))).toBe(19);
  });
});
