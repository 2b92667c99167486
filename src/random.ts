/**
 * Randomness helpers. Everything that rolls dice takes an Rng so tests can
 * pin the outcome.
 */

/** Returns a float in [0, 1), like Math.random. */
export type Rng = () => number;

export interface Interval {
  minMs: number;
  maxMs: number;
}

export interface Range {
  min: number;
  max: number;
}

// Guard against an Rng that returns exactly 1
function unit(random: Rng): number {
  const r = random();
  return r >= 1 ? 1 - Number.EPSILON : Math.max(0, r);
}

export function uniform(random: Rng, min: number, max: number): number {
  return min + unit(random) * (max - min);
}

export function pickIndex(random: Rng, length: number): number {
  return Math.floor(unit(random) * length);
}

export function pick<T>(random: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[pickIndex(random, items.length)];
}

export function rollInterval(random: Rng, interval: Interval): number {
  return uniform(random, interval.minMs, interval.maxMs);
}
