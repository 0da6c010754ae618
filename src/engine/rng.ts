// engine/rng.ts — Injectable random source; SeededRng is deterministic (Mulberry32)

export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max] inclusive */
  nextInt(min: number, max: number): number;
  /** Uniform float in [min, max) */
  nextFloat(min: number, max: number): number;
  /** True with probability p (0..1) */
  chance(p: number): boolean;
}

/**
 * Base class deriving the ranged helpers from `next()`, so a test double only
 * has to supply the raw stream.
 */
export abstract class RngBase implements Rng {
  abstract next(): number;

  nextInt(min: number, max: number): number {
    const lo = Math.ceil(Math.min(min, max));
    const hi = Math.floor(Math.max(min, max));
    return lo + Math.floor(this.next() * (hi - lo + 1));
  }

  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  chance(p: number): boolean {
    return this.next() < p;
  }
}

export class SeededRng extends RngBase {
  private state: number;

  constructor(seed: number) {
    super();
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  }
}

/** Non-reproducible source for callers that do not care about replay. */
export class MathRng extends RngBase {
  next(): number {
    return Math.random();
  }
}
