// types/core.ts — Fundamental types

export type ActorId = string;
export type Round = number;

export type Team = 'player' | 'opponent';

export interface Position {
  x: number;
  y: number;
}

/** Grid distance used for weapon range, movement and AI target selection. */
export function distance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function otherTeam(team: Team): Team {
  return team === 'player' ? 'opponent' : 'player';
}
