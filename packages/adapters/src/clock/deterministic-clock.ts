/** Source of "now" for anything that stamps telemetry. */
export type Clock = () => Date;

/** Wall-clock implementation for live ingestion. */
export function wallClockNow(): Date {
  return new Date();
}

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Drives the bridge simulator so a run can be reproduced from its seed.
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

  /** Returns a float in [min, max). */
  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }
}

/**
 * Deterministic clock for tests.
 * Advances by `tickMs` each call to `now()` starting from `epochMs`.
 */
export class DeterministicClock {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  /** Bound `now`, usable wherever a {@link Clock} is expected. */
  asClock(): Clock {
    return () => this.now();
  }
}
