// engine/turn-scheduler.ts — Initiative order, cursor and round counter

export interface InitiativeEntry {
  index: number;
  initiative: number;
}

export interface AdvanceHooks {
  isAlive: (index: number) => boolean;
  /** Runs when the cursor wraps, after the round counter has moved */
  onRoundStart: (round: number) => void;
}

/**
 * Holds arena indices, never actor objects. The order is fixed at construction;
 * dead actors are skipped by the cursor, never removed.
 */
export class TurnScheduler {
  readonly order: readonly number[];
  private cursor = 0;
  private _round = 1;

  constructor(entries: InitiativeEntry[]) {
    if (entries.length === 0) {
      throw new Error('TurnScheduler needs at least one entry');
    }
    // Array.prototype.sort is stable: equal initiative keeps registration order
    this.order = [...entries]
      .sort((a, b) => b.initiative - a.initiative)
      .map((e) => e.index);
  }

  get round(): number {
    return this._round;
  }

  get cursorPosition(): number {
    return this.cursor;
  }

  current(): number {
    const index = this.order[this.cursor];
    if (index === undefined) {
      throw new Error(`Turn cursor out of range: ${this.cursor}`);
    }
    return index;
  }

  /**
   * Moves to the next living actor; passing the end of the order starts a new round.
   * Returns null when a whole lap finds nobody alive.
   */
  advance(hooks: AdvanceHooks): number | null {
    for (let step = 0; step < this.order.length; step++) {
      this.cursor++;
      if (this.cursor >= this.order.length) {
        this.cursor = 0;
        this._round++;
        hooks.onRoundStart(this._round);
      }

      const index = this.current();
      if (hooks.isAlive(index)) return index;
    }
    return null;
  }
}
