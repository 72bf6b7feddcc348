import type { Clock, Rng } from '@cellsim/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Lets tests pin position jitter and temperature noise.
 */
export class SeededRng implements Rng {
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
}

/** Rng backed by Math.random, for live runs. */
export const mathRng: Rng = { next: () => Math.random() };

/**
 * Manually driven clock. `now()` returns the current value without
 * advancing; tests move it with `advance`.
 */
export class DeterministicClock implements Clock {
  private currentMs: number;

  constructor(epochMs: number) {
    this.currentMs = epochMs;
  }

  now(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

/** Wall-clock implementation for live mode. */
export const systemClock: Clock = { now: () => Date.now() };

/** Normal sample (Box–Muller). */
export function gaussian(rng: Rng, mean: number, sd: number): number {
  const u1 = 1 - rng.next();
  const u2 = rng.next();
  return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
