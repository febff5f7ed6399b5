import type { Combatant } from "./types/combatants.js";
import type { ModifiableStat, StatBonuses, StatKey, StatTable } from "./types/stats.js";
import { MODIFIABLE_STATS, STAT_KEYS } from "./types/stats.js";

type Pool = "health" | "energy";

export function createStatTable(values: StatBonuses = {}): StatTable {
  return {
    health: values.health ?? 0,
    max_health: values.max_health ?? 0,
    energy: values.energy ?? 0,
    max_energy: values.max_energy ?? 0,
    attack: values.attack ?? 0,
    defense: values.defense ?? 0,
    speed: values.speed ?? 0,
    experience: values.experience ?? 0,
  };
}

export function isStatKey(value: string): value is StatKey {
  return STAT_KEYS.some((key) => key === value);
}

export function isModifiableStat(stat: StatKey): stat is ModifiableStat {
  return MODIFIABLE_STATS.some((key) => key === stat);
}

function equipmentBonus(combatant: Combatant, stat: StatKey): number {
  if (combatant.kind !== "player" || !isModifiableStat(stat)) return 0;
  return combatant.equipment.getTotalBonuses()[stat];
}

/** The most a pool can hold: its maximum including equipment. */
function capOf(combatant: Combatant, pool: Pool): number {
  return effectiveStat(combatant, pool === "health" ? "max_health" : "max_energy");
}

/**
 * Base plus temporary modifier, floored at 0. Health and energy are
 * additionally capped by their effective maxima.
 */
export function getStat(combatant: Combatant, stat: StatKey): number {
  const raw = Math.max(0, combatant.stats[stat] + combatant.modifiers[stat]);
  if (stat === "health" || stat === "energy") return Math.min(raw, capOf(combatant, stat));
  return raw;
}

/** getStat plus, for players, the equipment bonus. Combat reads stats through this. */
export function effectiveStat(combatant: Combatant, stat: StatKey): number {
  const bonus = equipmentBonus(combatant, stat);
  return bonus === 0 ? getStat(combatant, stat) : Math.max(0, getStat(combatant, stat) + bonus);
}

export function setStat(combatant: Combatant, stat: StatKey, value: number): void {
  const next = Math.max(0, value);

  switch (stat) {
    case "health": {
      if (!combatant.alive) {
        combatant.stats.health = 0;
        return;
      }
      combatant.stats.health = Math.min(next, capOf(combatant, "health"));
      if (getStat(combatant, "health") === 0) {
        combatant.alive = false;
      }
      return;
    }
    case "energy":
      combatant.stats.energy = Math.min(next, capOf(combatant, "energy"));
      return;
    case "max_health":
      combatant.stats.max_health = next;
      if (combatant.stats.health > capOf(combatant, "health")) setStat(combatant, "health", combatant.stats.health);
      return;
    case "max_energy":
      combatant.stats.max_energy = next;
      combatant.stats.energy = Math.min(combatant.stats.energy, capOf(combatant, "energy"));
      return;
    default:
      combatant.stats[stat] = next;
  }
}

export function modifyStat(combatant: Combatant, stat: StatKey, delta: number): void {
  setStat(combatant, stat, combatant.stats[stat] + delta);
}

/** Pools and experience take no modifiers; such calls are ignored. */
export function addTemporaryModifier(combatant: Combatant, stat: StatKey, amount: number): void {
  if (isModifiableStat(stat)) combatant.modifiers[stat] += amount;
}

export function removeTemporaryModifier(combatant: Combatant, stat: StatKey, amount: number): void {
  if (isModifiableStat(stat)) combatant.modifiers[stat] -= amount;
}

export interface DamageOptions {
  /** Fixed-amount damage (damage-over-time ticks) skips the defense reduction. */
  ignoreDefense?: boolean;
}

/** Returns the health actually removed; 0 when the combatant is already down. */
export function takeDamage(combatant: Combatant, amount: number, options: DamageOptions = {}): number {
  if (!combatant.alive) return 0;

  const defense = options.ignoreDefense ? 0 : effectiveStat(combatant, "defense");
  const reduced = Math.max(1, Math.floor(amount) - defense);
  const before = getStat(combatant, "health");
  const after = Math.max(0, before - reduced);

  combatant.stats.health = after;
  if (after === 0) {
    combatant.alive = false;
  }
  return before - after;
}

export function heal(combatant: Combatant, amount: number): number {
  if (!combatant.alive || amount <= 0) return 0;

  const current = getStat(combatant, "health");
  const missing = capOf(combatant, "health") - current;
  const healed = Math.min(Math.floor(amount), Math.max(0, missing));
  setStat(combatant, "health", current + healed);
  return healed;
}

export function restoreEnergy(combatant: Combatant, amount: number): number {
  if (amount <= 0) return 0;

  const current = getStat(combatant, "energy");
  const missing = capOf(combatant, "energy") - current;
  const restored = Math.min(Math.floor(amount), Math.max(0, missing));
  setStat(combatant, "energy", current + restored);
  return restored;
}

export function spendEnergy(combatant: Combatant, amount: number): boolean {
  const current = getStat(combatant, "energy");
  if (current < amount) return false;
  setStat(combatant, "energy", current - amount);
  return true;
}

export function healthFraction(combatant: Combatant): number {
  const max = capOf(combatant, "health");
  return max > 0 ? getStat(combatant, "health") / max : 0;
}

export function energyFraction(combatant: Combatant): number {
  const max = capOf(combatant, "energy");
  return max > 0 ? getStat(combatant, "energy") / max : 0;
}

/**
 * Clears flags, modifiers and effects that only live for one encounter.
 * Effects go with the modifiers they installed, so nothing is undone twice.
 */
export function resetCombatState(combatant: Combatant): void {
  combatant.stunned = false;
  combatant.defending = false;
  combatant.modifiers = createStatTable();
  combatant.effects = [];
}
