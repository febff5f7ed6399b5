import { describe, expect, it } from "vitest";
import { chance, createSeededRandom, pick, uniform } from "../rng.js";
import { sequence } from "./helpers.js";

describe("createSeededRandom", () => {
  it("replays the same rolls for the same seed", () => {
    const a = createSeededRandom("seed-1");
    const b = createSeededRandom("seed-1");
    const rollsA = Array.from({ length: 5 }, () => a.next());
    const rollsB = Array.from({ length: 5 }, () => b.next());
    expect(rollsA).toEqual(rollsB);
  });

  it("diverges for different seeds", () => {
    const a = createSeededRandom("seed-1");
    const b = createSeededRandom("seed-2");
    expect(a.next()).not.toBe(b.next());
  });

  it("stays within [0, 1)", () => {
    const rng = createSeededRandom(42);
    for (let i = 0; i < 500; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("helpers", () => {
  it("maps rolls onto ranges and choices", () => {
    expect(uniform(sequence(0), 0.8, 1.2)).toBe(0.8);
    expect(chance(sequence(0.29), 0.3)).toBe(true);
    expect(chance(sequence(0.3), 0.3)).toBe(false);
    expect(pick(sequence(0.75), ["a", "b"])).toBe("b");
    expect(pick(sequence(0.75), [])).toBeUndefined();
  });
});
