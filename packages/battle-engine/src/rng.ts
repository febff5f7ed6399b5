/**
 * Injectable random sources.
 *
 * Every roll the engine makes (damage jitter, critical hits, policy coin
 * flips, loot drops) goes through a `RandomSource` so a seeded source makes a
 * whole encounter reproducible.
 */

export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;
}

function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

export function createSeededRandom(seed: string | number): RandomSource {
  let current = (typeof seed === "number" ? seed : hashSeed(seed)) >>> 0;
  return {
    next: () => {
      current = (current + 0x6d2b79f5) | 0;
      let t = Math.imul(current ^ (current >>> 15), 1 | current);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export const mathRandom: RandomSource = { next: () => Math.random() };

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

export function pick<T>(rng: RandomSource, options: readonly T[]): T | undefined {
  if (options.length === 0) return undefined;
  return options[Math.floor(rng.next() * options.length)];
}
