export const STAT_KEYS = [
  "health",
  "max_health",
  "energy",
  "max_energy",
  "attack",
  "defense",
  "speed",
  "experience",
] as const;

export type StatKey = (typeof STAT_KEYS)[number];

/** Fixed-size table with one entry per stat; there is no "missing" stat. */
export type StatTable = Record<StatKey, number>;

export type StatBonuses = Partial<Record<StatKey, number>>;

/**
 * Stats a temporary modifier or equipment bonus may move. Current health and
 * energy are pools: buffs raise their maxima instead.
 */
export const MODIFIABLE_STATS = ["max_health", "max_energy", "attack", "defense", "speed"] as const;

export type ModifiableStat = (typeof MODIFIABLE_STATS)[number];
