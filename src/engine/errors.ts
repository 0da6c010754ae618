// engine/errors.ts — Construction-time failures (everything else is a result value)

export type InvalidEncounterCode = 'empty_roster' | 'no_living_actor' | 'duplicate_actor_id' | 'wrong_team';

export class InvalidEncounterError extends Error {
  code: InvalidEncounterCode;

  constructor(message: string, code: InvalidEncounterCode) {
    super(message);
    this.name = 'InvalidEncounterError';
    this.code = code;
  }
}
