/**
 * Seedable pseudo-random number generator (mulberry32).
 * Used by the battery emitter to produce reproducible voltage noise.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns a float in [-amplitude, amplitude). */
  jitter(amplitude: number): number {
    return (this.next() * 2 - 1) * amplitude;
  }
}

export type Clock = () => Date;

/**
 * Manually driven clock for tests and simulations.
 * `now()` returns the current instant and then advances by `tickMs`
 * (0 by default, so repeated reads see the same instant).
 */
export class DeterministicClock {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  /** Bound `now` usable wherever a `Clock` is expected. */
  readonly asClock: Clock = () => this.now();
}

/** Wall-clock implementation for live mode. */
export function wallClockNow(): Date {
  return new Date();
}
