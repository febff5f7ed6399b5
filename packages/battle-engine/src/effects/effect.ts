/**
 * effect.ts
 *
 * Timed modifications a combatant carries between turns. Each effect follows
 * one contract:
 * - apply: install the immediate consequence when the effect is added
 * - tick: the per-turn consequence, fired once per processing pass
 * - remove: undo whatever apply installed
 */

import type { Combatant, StatusFlag } from "../types/combatants.js";
import { addTemporaryModifier, heal, isStatKey, removeTemporaryModifier, takeDamage } from "../stats.js";

export type EffectCategory = "buff" | "debuff" | "damage_over_time" | "heal_over_time" | "status";
export type EffectTarget = "self" | "enemy" | "ally" | "all";
export type EffectKind = "stat_modifier" | "damage_over_time" | "heal_over_time" | "status" | "custom";

export interface EffectOptions {
  description?: string;
  target?: EffectTarget;
  stackable?: boolean;
  dispellable?: boolean;
}

export interface EffectTickOutcome {
  damage: number;
  healing: number;
}

const NO_TICK: EffectTickOutcome = { damage: 0, healing: 0 };

export abstract class Effect {
  abstract readonly kind: EffectKind;
  readonly name: string;
  readonly category: EffectCategory;
  readonly maxDuration: number;
  readonly description: string;
  readonly target: EffectTarget;
  readonly stackable: boolean;
  readonly dispellable: boolean;
  /** Opaque payload for bespoke effects and running totals. */
  readonly data: Record<string, unknown> = {};
  duration: number;

  constructor(name: string, category: EffectCategory, duration: number, options: EffectOptions = {}) {
    if (!Number.isInteger(duration) || duration < 0) {
      throw new Error(`[engine invariant] effect "${name}" needs a non-negative integer duration, got ${duration}`);
    }
    this.name = name;
    this.category = category;
    this.duration = duration;
    this.maxDuration = duration;
    this.description = options.description ?? "";
    this.target = options.target ?? "self";
    this.stackable = options.stackable ?? false;
    this.dispellable = options.dispellable ?? true;
  }

  apply(_target: Combatant): void {}

  tick(_target: Combatant): EffectTickOutcome {
    return NO_TICK;
  }

  remove(_target: Combatant): void {}

  /**
   * Same-named stackable effects may coexist. The effect engine does not call
   * this to merge duplicates; hosts that want refresh semantics can.
   */
  canStackWith(other: Effect): boolean {
    return this.stackable && other.stackable && this.name === other.name;
  }
}

export class StatModifierEffect extends Effect {
  readonly kind = "stat_modifier";
  readonly modifiers: Readonly<Record<string, number>>;
  private applied = false;

  constructor(
    name: string,
    category: "buff" | "debuff",
    duration: number,
    modifiers: Record<string, number>,
    options: EffectOptions = {},
  ) {
    super(name, category, duration, options);
    this.modifiers = { ...modifiers };
  }

  override apply(target: Combatant): void {
    if (this.applied) return;
    for (const [stat, amount] of Object.entries(this.modifiers)) {
      // Keys outside the stat table, and the health and energy pools, are ignored.
      if (isStatKey(stat)) addTemporaryModifier(target, stat, amount);
    }
    this.applied = true;
  }

  override remove(target: Combatant): void {
    if (!this.applied) return;
    for (const [stat, amount] of Object.entries(this.modifiers)) {
      if (isStatKey(stat)) removeTemporaryModifier(target, stat, amount);
    }
    this.applied = false;
  }
}

export class DamageOverTimeEffect extends Effect {
  readonly kind = "damage_over_time";
  readonly damagePerTick: number;
  readonly damageType: string;
  totalDamageDealt = 0;

  constructor(name: string, duration: number, damagePerTick: number, damageType = "physical", options: EffectOptions = {}) {
    super(name, "damage_over_time", duration, options);
    this.damagePerTick = damagePerTick;
    this.damageType = damageType;
  }

  override tick(target: Combatant): EffectTickOutcome {
    if (!target.alive) return NO_TICK;
    const dealt = takeDamage(target, this.damagePerTick, { ignoreDefense: true });
    this.totalDamageDealt += dealt;
    return { damage: dealt, healing: 0 };
  }
}

export class HealOverTimeEffect extends Effect {
  readonly kind = "heal_over_time";
  readonly healPerTick: number;
  totalHealingDone = 0;

  constructor(name: string, duration: number, healPerTick: number, options: EffectOptions = {}) {
    super(name, "heal_over_time", duration, options);
    this.healPerTick = healPerTick;
  }

  override tick(target: Combatant): EffectTickOutcome {
    if (!target.alive) return NO_TICK;
    const healed = heal(target, this.healPerTick);
    this.totalHealingDone += healed;
    return { damage: 0, healing: healed };
  }
}

export class StatusEffect extends Effect {
  readonly kind = "status";
  readonly changes: Readonly<Partial<Record<StatusFlag, boolean>>>;
  private originals: Partial<Record<StatusFlag, boolean>> = {};

  constructor(name: string, duration: number, changes: Partial<Record<StatusFlag, boolean>>, options: EffectOptions = {}) {
    super(name, "status", duration, options);
    this.changes = { ...changes };
  }

  override apply(target: Combatant): void {
    for (const flag of STATUS_FLAGS) {
      const value = this.changes[flag];
      if (value === undefined) continue;
      // Overlapping statuses share the value from before the first of them.
      const controller = controllingStatus(target, flag);
      this.originals[flag] = controller ? controller.originals[flag] : target[flag];
      target[flag] = value;
    }
  }

  /** Expects the effect to be detached already: the latest remaining status on a flag takes it over. */
  override remove(target: Combatant): void {
    for (const flag of STATUS_FLAGS) {
      const original = this.originals[flag];
      if (original === undefined) continue;
      const controller = controllingStatus(target, flag);
      const value = controller?.changes[flag];
      target[flag] = value ?? original;
    }
    this.originals = {};
  }
}

const STATUS_FLAGS: readonly StatusFlag[] = ["stunned", "defending"];

function controllingStatus(target: Combatant, flag: StatusFlag): StatusEffect | undefined {
  for (let index = target.effects.length - 1; index >= 0; index -= 1) {
    const effect = target.effects[index];
    if (effect instanceof StatusEffect && effect.changes[flag] !== undefined) return effect;
  }
  return undefined;
}

export interface CustomEffectHooks {
  apply?: (target: Combatant, effect: CustomEffect) => void;
  tick?: (target: Combatant, effect: CustomEffect) => EffectTickOutcome | undefined;
  remove?: (target: Combatant, effect: CustomEffect) => void;
}

export class CustomEffect extends Effect {
  readonly kind = "custom";
  private readonly hooks: CustomEffectHooks;

  constructor(name: string, category: EffectCategory, duration: number, hooks: CustomEffectHooks, options: EffectOptions = {}) {
    super(name, category, duration, options);
    this.hooks = hooks;
  }

  override apply(target: Combatant): void {
    this.hooks.apply?.(target, this);
  }

  override tick(target: Combatant): EffectTickOutcome {
    return this.hooks.tick?.(target, this) ?? NO_TICK;
  }

  override remove(target: Combatant): void {
    this.hooks.remove?.(target, this);
  }
}
