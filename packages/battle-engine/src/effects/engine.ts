import type { Combatant } from "../types/combatants.js";
import type { Effect, EffectCategory, EffectKind } from "./effect.js";

export interface EffectTickReport {
  effect: string;
  kind: EffectKind;
  damage: number;
  healing: number;
  remaining: number;
  expired: boolean;
}

/** Applies the effect and appends it; same-named effects accumulate. */
export function addEffect(holder: Combatant, effect: Effect): void {
  effect.apply(holder);
  holder.effects.push(effect);
}

export function removeEffect(holder: Combatant, effect: Effect): boolean {
  const index = holder.effects.indexOf(effect);
  if (index < 0) return false;
  holder.effects.splice(index, 1);
  effect.remove(holder);
  return true;
}

/**
 * One processing pass: tick every active effect, decrement its duration, and
 * remove the ones that reach zero in this same pass.
 */
export function processEffects(holder: Combatant): EffectTickReport[] {
  const reports: EffectTickReport[] = [];

  for (const effect of [...holder.effects]) {
    // A bespoke tick may have removed a sibling already.
    if (!holder.effects.includes(effect)) continue;

    const outcome = effect.tick(holder);
    effect.duration = Math.max(0, effect.duration - 1);
    const expired = effect.duration === 0;
    if (expired) {
      removeEffect(holder, effect);
    }

    reports.push({
      effect: effect.name,
      kind: effect.kind,
      damage: outcome.damage,
      healing: outcome.healing,
      remaining: effect.duration,
      expired,
    });
  }

  return reports;
}

export function findEffects(holder: Combatant, name: string): Effect[] {
  return holder.effects.filter((effect) => effect.name === name);
}

export function hasEffect(holder: Combatant, name: string): boolean {
  return holder.effects.some((effect) => effect.name === name);
}

/** Removes dispellable effects, optionally only those of one category. */
export function dispelEffects(holder: Combatant, category?: EffectCategory): Effect[] {
  const dispelled = holder.effects.filter(
    (effect) => effect.dispellable && (category === undefined || effect.category === category),
  );
  for (const effect of dispelled) {
    removeEffect(holder, effect);
  }
  return dispelled;
}
