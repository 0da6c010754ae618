// data/scenarios.ts — Prebuilt encounters (demo skirmish for the CLI)

import type { CoverTile, Position, Team } from '../types/index.js';

export interface ScenarioSlot {
  name: string;
  archetypeId: string;
  team: Team;
  position: Position;
}

export interface Scenario {
  scenarioId: string;
  slots: ScenarioSlot[];
  cover: CoverTile[];
}

export const DEMO_SKIRMISH: Scenario = {
  scenarioId: 'demo_skirmish',
  slots: [
    { name: 'Vex', archetypeId: 'operative', team: 'player', position: { x: 2, y: 7 } },
    { name: 'Jonah', archetypeId: 'bruiser', team: 'player', position: { x: 3, y: 7 } },
    { name: 'Gang Grunt 1', archetypeId: 'grunt', team: 'opponent', position: { x: 17, y: 6 } },
    { name: 'Gang Grunt 2', archetypeId: 'grunt', team: 'opponent', position: { x: 17, y: 8 } },
    { name: 'Gang Elite', archetypeId: 'elite', team: 'opponent', position: { x: 18, y: 7 } },
  ],
  cover: [
    { x: 4, y: 6, kind: 'half' },
    { x: 4, y: 8, kind: 'full' },
    { x: 15, y: 7, kind: 'half' },
  ],
};
