// engine/actor.ts — Combat actor: attributes, derived numbers, guarded mutators

import type {
  ActorId,
  Attributes,
  ActorView,
  CoverKind,
  DamageTaken,
  Position,
  Team,
  Weapon,
} from '../types/index.js';
import { clamp } from '../shared/utils.js';
import { DODGE_CAP, MORALE_SHOCK } from '../shared/constants.js';
import type { Rng } from './rng.js';

export interface CombatActorInit {
  id: ActorId;
  name: string;
  team: Team;
  position: Position;
  attributes: Attributes;
  maxHp: number;
  hp: number;
  armor: number;
  morale: number;
  maxAp: number;
  weapon: Weapon;
  cover: CoverKind;
}

/**
 * All mutation goes through methods that keep 0 <= hp <= maxHp,
 * 0 <= ap <= maxAp and alive === hp > 0.
 */
export class CombatActor {
  readonly id: ActorId;
  readonly name: string;
  readonly team: Team;
  readonly attributes: Readonly<Attributes>;
  readonly maxHp: number;
  readonly maxAp: number;
  readonly armor: number;
  readonly weapon: Readonly<Weapon>;

  private _position: Position;
  private _hp: number;
  private _morale: number;
  private _ap: number;
  private _hasActed = false;
  private _hasMoved = false;
  private _coverKind: CoverKind;

  constructor(init: CombatActorInit) {
    this.id = init.id;
    this.name = init.name;
    this.team = init.team;
    this.attributes = Object.freeze({ ...init.attributes });
    this.maxHp = Math.max(1, Math.floor(init.maxHp));
    this.maxAp = Math.max(0, Math.floor(init.maxAp));
    this.armor = clamp(init.armor, 0, 100);
    this.weapon = Object.freeze({ ...init.weapon });
    this._position = { ...init.position };
    this._hp = clamp(Math.floor(init.hp), 0, this.maxHp);
    this._morale = clamp(init.morale, 0, 100);
    this._ap = this.maxAp;
    this._coverKind = init.cover;
  }

  get position(): Position {
    return { ...this._position };
  }

  get hp(): number {
    return this._hp;
  }

  get morale(): number {
    return this._morale;
  }

  get ap(): number {
    return this._ap;
  }

  get alive(): boolean {
    return this._hp > 0;
  }

  get hasActed(): boolean {
    return this._hasActed;
  }

  get hasMoved(): boolean {
    return this._hasMoved;
  }

  get inCover(): boolean {
    return this._coverKind !== 'none';
  }

  get coverKind(): CoverKind {
    return this._coverKind;
  }

  // --- Derived numbers ---

  rollInitiative(rng: Rng): number {
    return this.attributes.reflexes * 2 + rng.nextInt(1, 10);
  }

  dodgeChance(): number {
    return Math.min(DODGE_CAP, this.attributes.reflexes * 3);
  }

  critChance(): number {
    return this.attributes.cool * 2;
  }

  moraleModifier(): number {
    return 1.0 + (this._morale - 50) / 200;
  }

  movementRange(baseMovementRange: number): number {
    return baseMovementRange + Math.floor(this.attributes.reflexes / 4);
  }

  hpPercentage(): number {
    return (this._hp / this.maxHp) * 100;
  }

  // --- Mutators ---

  applyDamage(amount: number): DamageTaken {
    const dealt = Math.min(this._hp, Math.max(0, Math.floor(amount)));
    if (dealt === 0) {
      return { dealt: 0, hpAfter: this._hp, died: false, moraleLost: 0 };
    }

    this._hp -= dealt;

    let moraleLost = 0;
    const shock = MORALE_SHOCK.find((s) => amount >= this.maxHp * s.hpFraction);
    if (shock) {
      moraleLost = Math.min(this._morale, shock.moraleLoss);
      this._morale -= moraleLost;
    }

    return { dealt, hpAfter: this._hp, died: this._hp === 0, moraleLost };
  }

  /** Removes the actor from play outright (sacrifice). */
  kill(): void {
    this._hp = 0;
    this._ap = 0;
  }

  loseMorale(amount: number): void {
    this._morale = clamp(this._morale - amount, 0, 100);
  }

  spendAp(cost: number): boolean {
    if (cost < 0 || cost > this._ap) return false;
    this._ap -= cost;
    return true;
  }

  moveTo(position: Position): void {
    this._position = { ...position };
    this._hasMoved = true;
    this._coverKind = 'none';
  }

  setCover(kind: CoverKind): void {
    this._coverKind = kind;
  }

  startTurn(): void {
    this._ap = this.maxAp;
    this._hasActed = false;
    this._hasMoved = false;
  }

  endTurn(): void {
    this._hasActed = true;
  }

  /** Independent copy with the same state, for an owner that must not share the instance. */
  clone(): CombatActor {
    const copy = new CombatActor({
      id: this.id,
      name: this.name,
      team: this.team,
      position: this._position,
      attributes: this.attributes,
      maxHp: this.maxHp,
      hp: this._hp,
      armor: this.armor,
      morale: this._morale,
      maxAp: this.maxAp,
      weapon: this.weapon,
      cover: this._coverKind,
    });
    copy._ap = this._ap;
    copy._hasActed = this._hasActed;
    copy._hasMoved = this._hasMoved;
    return copy;
  }

  toView(): ActorView {
    return {
      id: this.id,
      name: this.name,
      team: this.team,
      position: this.position,
      attributes: { ...this.attributes },
      hp: this._hp,
      maxHp: this.maxHp,
      hpPercentage: this.hpPercentage(),
      armor: this.armor,
      morale: this._morale,
      ap: this._ap,
      maxAp: this.maxAp,
      weapon: { ...this.weapon },
      alive: this.alive,
      hasActed: this._hasActed,
      hasMoved: this._hasMoved,
      inCover: this.inCover,
      coverKind: this._coverKind,
    };
  }
}
