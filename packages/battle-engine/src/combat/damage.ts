import type { Combatant } from "../types/combatants.js";
import type { BattleConfig } from "../types/config.js";
import type { RandomSource } from "../rng.js";
import { chance, uniform } from "../rng.js";
import { effectiveStat } from "../stats.js";

export interface DamageRoll {
  amount: number;
  critical: boolean;
}

type DamageConfig = Pick<
  BattleConfig,
  "critBaseChance" | "critChancePerSpeed" | "critMultiplier" | "jitterMin" | "jitterMax"
>;

/** Defense counts double while the target is defending. */
export function effectiveDefense(target: Combatant): number {
  const defense = effectiveStat(target, "defense");
  return target.defending ? defense * 2 : defense;
}

export function criticalChance(attacker: Combatant, config: DamageConfig): number {
  return config.critBaseChance + effectiveStat(attacker, "speed") * config.critChancePerSpeed;
}

/**
 * Rolls one hit: `max(1, attack × multiplier − defense)`, scaled by jitter,
 * floored, never below 1, then the critical multiplier. Jitter is rolled
 * before the critical check.
 */
export function rollDamage(
  attacker: Combatant,
  target: Combatant,
  rng: RandomSource,
  config: DamageConfig,
  multiplier = 1,
): DamageRoll {
  const attack = Math.floor(effectiveStat(attacker, "attack") * multiplier);
  const base = Math.max(1, attack - effectiveDefense(target));
  const jittered = Math.max(1, Math.floor(base * uniform(rng, config.jitterMin, config.jitterMax)));

  const critical = chance(rng, criticalChance(attacker, config));
  const amount = critical ? Math.max(1, Math.floor(jittered * config.critMultiplier)) : jittered;
  return { amount, critical };
}
