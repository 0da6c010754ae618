// engine/encounter.ts — Encounter state machine: rosters, turn order, actions, escape, victory

import type {
  ActionRequest,
  ActionResult,
  ActorId,
  ActorView,
  AttackResolution,
  CombatEvent,
  CoverKind,
  CoverTile,
  DamageTaken,
  EncounterPhase,
  EncounterSnapshot,
  EncounterSummary,
  EscapeAssessment,
  EscapeResult,
  Outcome,
  Position,
  RejectedAction,
  Team,
  TeamSummary,
  ValidatedAction,
} from '../types/index.js';
import { distance, otherTeam } from '../types/index.js';
import type { CombatRules } from '../shared/rules.js';
import { resolveRules } from '../shared/rules.js';
import { ESCAPE_MORALE_PENALTY, RECENT_LOG_LIMIT } from '../shared/constants.js';
import { generateEncounterId } from '../shared/utils.js';
import type { CombatActor } from './actor.js';
import { DamageResolver } from './damage-resolver.js';
import { EscapeNegotiator } from './escape-negotiator.js';
import { InvalidEncounterError } from './errors.js';
import { OpponentController } from './opponent-controller.js';
import type { Rng } from './rng.js';
import { MathRng, SeededRng } from './rng.js';
import { TurnScheduler } from './turn-scheduler.js';
import type { InitiativeEntry } from './turn-scheduler.js';
import { ActionValidator } from './validator.js';
import type { Battlefield } from './validator.js';

export interface EncounterOptions {
  id?: string;
  /** Takes precedence over `seed` */
  rng?: Rng;
  seed?: number;
  rules?: Partial<CombatRules>;
  cover?: CoverTile[];
  controller?: OpponentController;
}

/**
 * Owns both rosters in one arena array. Everything outside refers to actors by id,
 * the turn order by arena index; callers only ever receive ActorView copies.
 */
export class CombatEncounter {
  readonly id: string;
  readonly rules: CombatRules;

  private readonly arena: CombatActor[];
  private readonly indexById: Map<ActorId, number> = new Map();
  private readonly playerCount: number;
  private readonly cover: CoverTile[];
  private readonly rng: Rng;
  private readonly resolver: DamageResolver;
  private readonly validator = new ActionValidator();
  private readonly negotiator: EscapeNegotiator;
  private readonly controller: OpponentController;
  private readonly scheduler: TurnScheduler;
  private readonly field: Battlefield;

  private _phase: EncounterPhase = 'initializing';
  private _outcome: Outcome | null = null;
  private escape: EscapeAssessment;
  private lastEscapeRound: number | null = null;
  private readonly _log: string[] = [];
  private readonly _events: CombatEvent[] = [];

  constructor(playerTeam: CombatActor[], opponentTeam: CombatActor[], options: EncounterOptions = {}) {
    // All checks run before any roll or mutation
    validateRoster(playerTeam, 'player');
    validateRoster(opponentTeam, 'opponent');

    // The encounter owns its actors; callers keep no live handle
    this.arena = [...playerTeam, ...opponentTeam].map((actor) => actor.clone());
    this.arena.forEach((actor, index) => {
      if (this.indexById.has(actor.id)) {
        throw new InvalidEncounterError(`Duplicate actor id: ${actor.id}`, 'duplicate_actor_id');
      }
      this.indexById.set(actor.id, index);
    });

    this.id = options.id ?? generateEncounterId();
    this.rules = resolveRules(options.rules);
    this.playerCount = playerTeam.length;
    this.cover = (options.cover ?? []).map((tile) => ({ ...tile }));
    this.rng = options.rng ?? (options.seed !== undefined ? new SeededRng(options.seed) : new MathRng());
    this.resolver = new DamageResolver(this.rules);
    this.negotiator = new EscapeNegotiator(this.rules.escapeMinRound, this.playerCount);
    this.controller = options.controller ?? new OpponentController();
    this.field = this.createBattlefield();
    this.escape = this.negotiator.assess(1, this.team('player'), this.team('opponent'));

    const entries: InitiativeEntry[] = [];
    this.arena.forEach((actor, index) => {
      if (!actor.alive) return;
      const initiative = actor.rollInitiative(this.rng);
      entries.push({ index, initiative });
    });
    this.scheduler = new TurnScheduler(entries);

    this.addLog('=== COMBAT START ===');
    for (const index of this.scheduler.order) {
      const actor = this.actorAt(index);
      const entry = entries.find((e) => e.index === index);
      const initiative = entry ? entry.initiative : 0;
      this.addLog(`${actor.name} rolled initiative: ${initiative}`);
      this._events.push({ type: 'initiative', actorId: actor.id, initiative });
    }

    this._phase = 'in_progress';
    this._events.push({ type: 'round_start', round: 1 });
    this.beginTurn(this.scheduler.current());
  }

  // --- State queries ---

  get phase(): EncounterPhase {
    return this._phase;
  }

  get active(): boolean {
    return this._phase === 'in_progress';
  }

  get outcome(): Outcome | null {
    return this._outcome;
  }

  get round(): number {
    return this.scheduler.round;
  }

  get escapeAvailable(): boolean {
    return this.escape.available;
  }

  get escapeAssessment(): EscapeAssessment {
    return { ...this.escape, reasons: [...this.escape.reasons] };
  }

  get currentActor(): ActorView | null {
    return this.activeActor()?.toView() ?? null;
  }

  get turnOrder(): ActorId[] {
    return this.scheduler.order.map((index) => this.actorAt(index).id);
  }

  get actors(): ActorView[] {
    return this.arena.map((actor) => actor.toView());
  }

  get log(): string[] {
    return [...this._log];
  }

  get events(): CombatEvent[] {
    return [...this._events];
  }

  recentLog(limit: number = RECENT_LOG_LIMIT): string[] {
    return limit > 0 ? this._log.slice(-limit) : [];
  }

  teamView(team: Team): ActorView[] {
    return this.team(team).map((actor) => actor.toView());
  }

  getActor(id: ActorId): ActorView | undefined {
    return this.findActor(id)?.toView();
  }

  getValidMoves(actorId: ActorId): Position[] {
    const actor = this.findActor(actorId);
    return actor ? this.validMoves(actor) : [];
  }

  getValidTargets(actorId: ActorId): ActorView[] {
    const actor = this.findActor(actorId);
    return actor ? this.validTargets(actor).map((t) => t.toView()) : [];
  }

  /** What the AI would do for the current actor; the player side uses it as autopilot. */
  suggestAction(): ActionRequest | null {
    const actor = this.activeActor();
    return actor ? this.controller.decide(actor, this.field) : null;
  }

  snapshot(): EncounterSnapshot {
    return {
      id: this.id,
      phase: this._phase,
      round: this.round,
      active: this.active,
      outcome: this._outcome,
      currentActorId: this.activeActor()?.id ?? null,
      turnOrder: this.turnOrder,
      escapeAvailable: this.escape.available,
      actors: this.actors,
    };
  }

  summary(): EncounterSummary {
    return {
      id: this.id,
      outcome: this._outcome,
      rounds: this.round,
      player: this.teamSummary('player'),
      opponent: this.teamSummary('opponent'),
    };
  }

  // --- Turn flow ---

  nextTurn(): void {
    if (!this.active) return;

    this.actorAt(this.scheduler.current()).endTurn();

    const next = this.scheduler.advance({
      isAlive: (index) => this.actorAt(index).alive,
      onRoundStart: (round) => this.startRound(round),
    });
    if (next !== null) this.beginTurn(next);

    this.checkVictory();
  }

  /** Player-side action for the current actor. */
  submit(request: ActionRequest): ActionResult {
    const actor = this.activeActor();
    if (!actor) return this.refuse(null, request, 'Combat is over');
    if (actor.team !== 'player') return this.refuse(actor.id, request, 'Not a player-team turn');
    return this.perform(actor, request);
  }

  /** One AI decision for the current opponent actor. */
  runOpponentTurn(): ActionResult {
    const actor = this.activeActor();
    const idle: ActionRequest = { type: 'end_turn' };
    if (!actor) return this.refuse(null, idle, 'Combat is over');
    if (actor.team !== 'opponent') return this.refuse(actor.id, idle, 'Not an opponent-team turn');

    const result = this.perform(actor, this.controller.decide(actor, this.field));
    // A refused decision must not leave the AI stuck on the same turn
    if (result.status === 'not_allowed' && this.activeActor() === actor) {
      this.nextTurn();
    }
    return result;
  }

  /** Plays opponent turns until a player actor is up or combat ends. */
  resolveOpponentTurns(): ActionResult[] {
    const results: ActionResult[] = [];
    while (this.activeActor()?.team === 'opponent') {
      results.push(this.runOpponentTurn());
    }
    return results;
  }

  attemptEscape(sacrificeId?: ActorId): EscapeResult {
    const actor = this.activeActor();
    if (!actor) return this.refuseEscape(null, 'Combat is over');
    if (actor.team !== 'player') return this.refuseEscape(actor.id, 'Not a player-team turn');
    if (!this.escape.available) return this.refuseEscape(actor.id, 'Escape not available yet');
    if (this.lastEscapeRound === this.round) {
      return this.refuseEscape(actor.id, 'Escape already attempted this round');
    }

    let sacrifice: CombatActor | undefined;
    if (sacrificeId !== undefined) {
      sacrifice = this.findActor(sacrificeId);
      if (!sacrifice || sacrifice.team !== 'player') {
        return this.refuseEscape(actor.id, 'Sacrifice must be a player-team actor');
      }
      if (!sacrifice.alive) return this.refuseEscape(actor.id, 'Sacrifice is already dead');
    }

    // Leader is roster slot 0, alive or not; the roster is never empty
    const leader = this.team('player')[0] ?? actor;
    this.lastEscapeRound = this.round;

    const { chance, roll, success } = this.negotiator.roll(leader, sacrifice !== undefined, this.rng);
    const sacrificedId = sacrifice?.id ?? null;

    if (sacrifice) {
      this.addLog(`${sacrifice.name} stays behind to cover the retreat! (${chance}% chance, rolled ${roll})`);
      sacrifice.kill();
      this.addLog(`${sacrifice.name} has been defeated!`);
      this._events.push({ type: 'death', actorId: sacrifice.id, killedBy: null });
    } else {
      this.addLog(`Attempting solo escape... (${chance}% chance, rolled ${roll})`);
    }

    this._events.push({ type: 'escape_attempt', success, chance, roll, sacrificedId });

    const survivors = this.team('player').some((a) => a.alive);
    if (success && survivors) {
      for (const member of this.team('player')) {
        if (member.alive) member.loseMorale(ESCAPE_MORALE_PENALTY);
      }
      this.addLog('Escape successful! Retreated from combat.');
      this.terminate('fled', '=== FLED ===');
      return { status: 'resolved', success, chance, roll, sacrificedId, penaltyDamage: 0 };
    }

    let penaltyDamage = 0;
    if (!survivors) {
      this.addLog('Nobody is left to retreat.');
    } else if (sacrifice) {
      this.addLog(`Escape FAILED! ${sacrifice.name} fell in vain.`);
    } else {
      penaltyDamage = this.negotiator.failurePenalty(leader);
      this.addLog(`Escape FAILED! ${leader.name} takes ${penaltyDamage} damage.`);
      this.applyDamage(leader, penaltyDamage, null);
    }

    this.checkVictory();
    if (this.active && !actor.alive) this.nextTurn();

    return { status: 'resolved', success, chance, roll, sacrificedId, penaltyDamage };
  }

  // --- Internals ---

  private perform(actor: CombatActor, request: ActionRequest): ActionResult {
    const checked = this.validator.validate(actor, request, this.field);
    if (!('valid' in checked)) {
      return this.recordRefusal(checked);
    }

    actor.spendAp(checked.cost);
    const attack = this.apply(actor, checked);
    const apRemaining = actor.ap;

    let turnEnded = false;
    if (this.active && (request.type === 'end_turn' || actor.ap === 0)) {
      this.nextTurn();
      turnEnded = true;
    }

    return { status: 'accepted', actorId: actor.id, request, apRemaining, attack, turnEnded };
  }

  private apply(actor: CombatActor, action: ValidatedAction): AttackResolution | undefined {
    const { request } = action;
    switch (request.type) {
      case 'move': {
        const from = actor.position;
        const to = action.destination ?? from;
        actor.moveTo(to);
        this.addLog(`${actor.name} moved to (${to.x}, ${to.y})`);
        this._events.push({ type: 'move', actorId: actor.id, from, to });
        return undefined;
      }
      case 'attack': {
        const target = this.findActor(request.targetId);
        return target ? this.resolveAttack(actor, target) : undefined;
      }
      case 'take_cover': {
        const kind = action.coverKind ?? 'none';
        actor.setCover(kind);
        this.addLog(`${actor.name} takes ${kind} cover`);
        this._events.push({ type: 'cover', actorId: actor.id, coverKind: kind });
        return undefined;
      }
      case 'leave_cover':
        actor.setCover('none');
        this.addLog(`${actor.name} leaves cover`);
        this._events.push({ type: 'cover', actorId: actor.id, coverKind: 'none' });
        return undefined;
      case 'end_turn':
        return undefined;
    }
  }

  private resolveAttack(attacker: CombatActor, target: CombatActor): AttackResolution {
    const outcome = this.resolver.resolve(attacker, target, this.rng);

    if (!outcome.hit) {
      this.addLog(`${attacker.name} misses ${target.name}! (needed ${outcome.hitChance}, rolled ${outcome.roll})`);
      this._events.push({
        type: 'attack',
        attackerId: attacker.id,
        targetId: target.id,
        hit: false,
        critical: false,
        damage: 0,
        targetHpAfter: target.hp,
      });
      return {
        attackerId: attacker.id,
        targetId: target.id,
        hitChance: outcome.hitChance,
        roll: outcome.roll,
        hit: false,
        critical: false,
        damage: 0,
        targetHpAfter: target.hp,
        targetDied: false,
      };
    }

    const critText = outcome.critical ? ' (critical)' : '';
    this.addLog(`${attacker.name} hits ${target.name} for ${outcome.damage} damage${critText}!`);
    this._events.push({
      type: 'attack',
      attackerId: attacker.id,
      targetId: target.id,
      hit: true,
      critical: outcome.critical,
      damage: outcome.damage,
      targetHpAfter: Math.max(0, target.hp - outcome.damage),
    });
    const taken = this.applyDamage(target, outcome.damage, attacker.id);

    return {
      attackerId: attacker.id,
      targetId: target.id,
      hitChance: outcome.hitChance,
      roll: outcome.roll,
      hit: true,
      critical: outcome.critical,
      damage: outcome.damage,
      targetHpAfter: taken.hpAfter,
      targetDied: taken.died,
    };
  }

  /** Every HP loss goes through here so the victory check never lags behind a death. */
  private applyDamage(target: CombatActor, amount: number, sourceId: ActorId | null): DamageTaken {
    const taken = target.applyDamage(amount);
    if (taken.died) {
      this.addLog(`${target.name} has been defeated!`);
      this._events.push({ type: 'death', actorId: target.id, killedBy: sourceId });
    }
    this.checkVictory();
    return taken;
  }

  private startRound(round: number): void {
    this.addLog(`=== Round ${round} ===`);
    this._events.push({ type: 'round_start', round });

    // Evaluate, then commit; nothing reads the flag in between
    const assessment = this.negotiator.assess(round, this.team('player'), this.team('opponent'));
    const wasAvailable = this.escape.available;
    this.escape = assessment;

    if (assessment.available && !wasAvailable) {
      this.addLog(`ESCAPE AVAILABLE (${assessment.reasons.join(', ')})`);
      this._events.push({ type: 'escape_available', round, reasons: [...assessment.reasons] });
    }
  }

  private beginTurn(index: number): void {
    const actor = this.actorAt(index);
    actor.startTurn();
    this.addLog(`>>> ${actor.name}'s turn (${actor.team}) <<<`);
    this._events.push({ type: 'turn_start', round: this.round, actorId: actor.id });
  }

  private checkVictory(): void {
    if (!this.active) return;

    const playerAlive = this.team('player').some((a) => a.alive);
    const opponentAlive = this.team('opponent').some((a) => a.alive);

    if (!playerAlive) {
      this.terminate('defeat', '=== DEFEAT ===');
    } else if (!opponentAlive) {
      this.terminate('victory', '=== VICTORY ===');
    }
  }

  private terminate(outcome: Outcome, banner: string): void {
    this._phase = 'terminated';
    this._outcome = outcome;
    this.addLog(banner);
    this._events.push({ type: 'combat_end', outcome, round: this.round });
  }

  private refuse(actorId: ActorId | null, request: ActionRequest, reason: string): RejectedAction {
    return this.recordRefusal({ status: 'not_allowed', actorId, request, reason });
  }

  private recordRefusal(rejected: RejectedAction): RejectedAction {
    this.addLog(`Action refused (${rejected.request.type}): ${rejected.reason}`);
    this._events.push({ type: 'rejected', actorId: rejected.actorId, reason: rejected.reason });
    return rejected;
  }

  private refuseEscape(actorId: ActorId | null, reason: string): EscapeResult {
    this.addLog(`Escape refused: ${reason}`);
    this._events.push({ type: 'rejected', actorId, reason });
    return { status: 'not_allowed', reason };
  }

  private addLog(message: string): void {
    this._log.push(message);
  }

  private activeActor(): CombatActor | undefined {
    if (!this.active) return undefined;
    return this.actorAt(this.scheduler.current());
  }

  private actorAt(index: number): CombatActor {
    const actor = this.arena[index];
    if (!actor) {
      throw new Error(`No actor at arena index ${index}`);
    }
    return actor;
  }

  private findActor(id: ActorId): CombatActor | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.arena[index];
  }

  private team(team: Team): CombatActor[] {
    return team === 'player' ? this.arena.slice(0, this.playerCount) : this.arena.slice(this.playerCount);
  }

  private teamSummary(team: Team): TeamSummary {
    const members = this.team(team);
    return {
      team,
      survivors: members.filter((a) => a.alive).map((a) => a.id),
      casualties: members.filter((a) => !a.alive).map((a) => a.id),
    };
  }

  private validMoves(actor: CombatActor): Position[] {
    if (!actor.alive) return [];

    const { gridWidth, gridHeight, baseMovementRange } = this.rules;
    const range = actor.movementRange(baseMovementRange);
    const origin = actor.position;
    const moves: Position[] = [];

    for (let dx = -range; dx <= range; dx++) {
      for (let dy = -range; dy <= range; dy++) {
        if (dx === 0 && dy === 0) continue;
        if (Math.abs(dx) + Math.abs(dy) > range) continue;

        const x = origin.x + dx;
        const y = origin.y + dy;
        if (x < 0 || x >= gridWidth || y < 0 || y >= gridHeight) continue;

        const occupied = this.arena.some((other) => {
          if (other === actor || !other.alive) return false;
          const p = other.position;
          return p.x === x && p.y === y;
        });
        if (!occupied) moves.push({ x, y });
      }
    }

    return moves;
  }

  private validTargets(actor: CombatActor): CombatActor[] {
    if (!actor.alive) return [];
    const origin = actor.position;
    return this.arena.filter(
      (other) =>
        other.team !== actor.team &&
        other.alive &&
        distance(origin, other.position) <= actor.weapon.range,
    );
  }

  private coverAdjacentTo(position: Position): CoverKind {
    let best: CoverKind = 'none';
    for (const tile of this.cover) {
      if (distance(position, tile) > 1) continue;
      if (tile.kind === 'full') return 'full';
      best = 'half';
    }
    return best;
  }

  private createBattlefield(): Battlefield {
    return {
      rules: this.rules,
      findActor: (id) => this.findActor(id),
      validMoves: (actor) => this.validMoves(actor),
      validTargets: (actor) => this.validTargets(actor),
      livingHostiles: (actor) => this.team(otherTeam(actor.team)).filter((other) => other.alive),
      coverAdjacentTo: (position) => this.coverAdjacentTo(position),
    };
  }
}

function validateRoster(roster: CombatActor[], team: Team): void {
  if (roster.length === 0) {
    throw new InvalidEncounterError(`The ${team} roster is empty`, 'empty_roster');
  }
  for (const actor of roster) {
    if (actor.team !== team) {
      throw new InvalidEncounterError(`${actor.name} is not on the ${team} team`, 'wrong_team');
    }
  }
  if (!roster.some((actor) => actor.alive)) {
    throw new InvalidEncounterError(`The ${team} roster has no living actor`, 'no_living_actor');
  }
}
