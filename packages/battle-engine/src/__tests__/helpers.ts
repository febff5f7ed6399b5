import type { RandomSource } from "../rng.js";

/** Replays the given rolls in order, wrapping around. */
export function sequence(...values: number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[index % values.length] ?? 0;
      index++;
      return value;
    },
  };
}
