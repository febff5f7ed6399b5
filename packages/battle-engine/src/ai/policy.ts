import type { NpcAction } from "../types/actions.js";
import type { NpcCombatant, NpcTier } from "../types/combatants.js";
import type { BattleConfig } from "../types/config.js";
import { DEFAULT_BATTLE_CONFIG } from "../types/config.js";
import type { RandomSource } from "../rng.js";
import { chance, pick } from "../rng.js";
import { getStat, healthFraction } from "../stats.js";
import { assertNever } from "../internal/invariant.js";

const SPECIAL_TIERS: readonly NpcTier[] = ["elite", "mini_boss", "boss"];
const AREA_TIERS: readonly NpcTier[] = ["mini_boss", "boss"];

/** Tier- and energy-gated action set; attack and defend are always present. */
export function availableNpcActions(
  npc: NpcCombatant,
  config: Pick<BattleConfig, "npcHealEnergyThreshold"> = DEFAULT_BATTLE_CONFIG,
): NpcAction[] {
  const actions: NpcAction[] = ["attack", "defend"];
  if (SPECIAL_TIERS.includes(npc.tier)) actions.push("special_attack");
  if (AREA_TIERS.includes(npc.tier)) actions.push("area_attack");
  if (getStat(npc, "energy") > config.npcHealEnergyThreshold) actions.push("heal");
  return actions;
}

export function isOffCooldown(npc: NpcCombatant, ability: NpcAction): boolean {
  return (npc.cooldowns[ability] ?? 0) <= 0;
}

export function startCooldown(npc: NpcCombatant, ability: NpcAction, turns: number): void {
  npc.cooldowns[ability] = turns;
}

function tickCooldowns(npc: NpcCombatant): void {
  for (const [ability, remaining] of Object.entries(npc.cooldowns)) {
    npc.cooldowns[ability] = Math.max(0, remaining - 1);
  }
}

/**
 * Picks the next action for a non-player combatant from its behavior tag.
 * Every consultation counts down the combatant's cooldowns by one first.
 */
export function chooseNpcAction(
  npc: NpcCombatant,
  rng: RandomSource,
  config: Pick<BattleConfig, "npcHealEnergyThreshold"> = DEFAULT_BATTLE_CONFIG,
): NpcAction {
  tickCooldowns(npc);

  const available = availableNpcActions(npc, config);
  const has = (action: NpcAction) => available.includes(action);
  const ready = (action: NpcAction) => has(action) && isOffCooldown(npc, action);
  const fraction = healthFraction(npc);

  switch (npc.behavior) {
    case "aggressive":
      if (has("attack")) return "attack";
      if (ready("special_attack")) return "special_attack";
      return "defend";

    case "defensive":
      if (fraction < 0.3) return "defend";
      return has("attack") ? "attack" : "defend";

    case "healer":
      if (fraction < 0.5 && has("heal")) return "heal";
      return has("attack") ? "attack" : "defend";

    case "spellcaster":
      if (ready("special_attack")) return "special_attack";
      return has("attack") ? "attack" : "defend";

    case "balanced": {
      if (fraction < 0.25 && has("heal")) return "heal";
      if (ready("special_attack") && chance(rng, 0.3)) return "special_attack";
      return pick<NpcAction>(rng, ["attack", "defend"]) ?? "attack";
    }

    default:
      return assertNever(npc.behavior, "policy.chooseNpcAction unknown behavior");
  }
}
