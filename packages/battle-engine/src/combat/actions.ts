import type { NpcAction, PlayerAction, ResolvedAction } from "../types/actions.js";
import type { Combatant, NpcCombatant, PlayerClass, PlayerCombatant } from "../types/combatants.js";
import type { BattleConfig } from "../types/config.js";
import type { RandomSource } from "../rng.js";
import { getStat, heal, spendEnergy, takeDamage } from "../stats.js";
import { availableNpcActions, isOffCooldown, startCooldown } from "../ai/policy.js";
import { assertNever } from "../internal/invariant.js";
import { rollDamage } from "./damage.js";
import { alliesOf, opponentsOf, weakestOpponent } from "./turnOrder.js";

export interface ActionContext {
  participants: readonly Combatant[];
  rng: RandomSource;
  config: BattleConfig;
}

export interface ActionOutcome {
  action: ResolvedAction;
  success: boolean;
  targetIds: string[];
  damageDealt: number;
  healingDone: number;
  critical: boolean;
  effectsApplied: string[];
  message: string;
  fled: boolean;
}

export const CLASS_ABILITY_NAMES: Record<PlayerClass, string> = {
  warrior: "berserker_rage",
  mage: "fireball",
  rogue: "sneak_attack",
  cleric: "heal",
};

function outcome(action: ResolvedAction, message: string, patch: Partial<ActionOutcome> = {}): ActionOutcome {
  return {
    action,
    success: true,
    targetIds: [],
    damageDealt: 0,
    healingDone: 0,
    critical: false,
    effectsApplied: [],
    message,
    fled: false,
    ...patch,
  };
}

function failed(action: ResolvedAction, message: string): ActionOutcome {
  return outcome(action, message, { success: false });
}

interface Hit {
  damage: number;
  critical: boolean;
}

/** Rolls and applies one hit. A defending target's guard is spent on it. */
function strike(attacker: Combatant, target: Combatant, ctx: ActionContext, multiplier: number): Hit {
  const roll = rollDamage(attacker, target, ctx.rng, ctx.config, multiplier);
  const damage = takeDamage(target, roll.amount);
  target.defending = false;
  return { damage, critical: roll.critical };
}

function describeHit(attacker: Combatant, target: Combatant, hit: Hit, verb: string): string {
  const prefix = hit.critical ? "Critical hit! " : "";
  const suffix = target.alive ? "" : ` ${target.name} is defeated.`;
  return `${prefix}${attacker.name} ${verb} ${target.name} for ${hit.damage} damage.${suffix}`;
}

function defend(actor: Combatant, note = ""): ActionOutcome {
  actor.defending = true;
  return outcome("defend", `${actor.name} takes a defensive stance.${note}`);
}

function findOpponent(actor: Combatant, ctx: ActionContext, targetId: string | undefined): Combatant | undefined {
  if (targetId === undefined) return weakestOpponent(actor, ctx.participants);
  return opponentsOf(actor, ctx.participants).find((candidate) => candidate.id === targetId);
}

function attack(actor: Combatant, ctx: ActionContext, targetId?: string): ActionOutcome {
  const target = findOpponent(actor, ctx, targetId);
  if (!target) {
    if (targetId !== undefined) return failed("attack", `${actor.name} has no target named ${targetId}.`);
    return defend(actor, " No one is left to attack.");
  }

  const hit = strike(actor, target, ctx, 1);
  return outcome("attack", describeHit(actor, target, hit, "attacks"), {
    targetIds: [target.id],
    damageDealt: hit.damage,
    critical: hit.critical,
  });
}

function useItem(player: PlayerCombatant, itemName: string): ActionOutcome {
  if (!player.inventory.use(itemName, player)) {
    return failed("use_item", `${player.name} cannot use ${itemName}.`);
  }
  return outcome("use_item", `${player.name} uses ${itemName}.`, {
    targetIds: [player.id],
    effectsApplied: [itemName],
  });
}

function classAbility(player: PlayerCombatant, ctx: ActionContext, targetId?: string): ActionOutcome {
  const ability = CLASS_ABILITY_NAMES[player.playerClass];
  const cost = ctx.config.playerAbilityEnergyCost;
  if (getStat(player, "energy") < cost) {
    return failed("special_ability", `${player.name} does not have enough energy for ${ability}.`);
  }

  const playerClass = player.playerClass;
  if (playerClass === "cleric") {
    const allies = alliesOf(player, ctx.participants);
    const target = targetId === undefined ? player : allies.find((candidate) => candidate.id === targetId);
    if (!target) return failed("special_ability", `${player.name} has no ally named ${targetId}.`);

    spendEnergy(player, cost);
    const healed = heal(target, ctx.config.clericHealAmount);
    return outcome("special_ability", `${player.name} heals ${target.name} for ${healed} health.`, {
      targetIds: [target.id],
      healingDone: healed,
      effectsApplied: [ability],
    });
  }

  const target = findOpponent(player, ctx, targetId);
  if (!target) return failed("special_ability", `${player.name} has no target for ${ability}.`);

  spendEnergy(player, cost);
  const hit = strike(player, target, ctx, ctx.config.playerAbilityMultipliers[playerClass]);
  return outcome("special_ability", describeHit(player, target, hit, `uses ${ability} on`), {
    targetIds: [target.id],
    damageDealt: hit.damage,
    critical: hit.critical,
    effectsApplied: [ability],
  });
}

/** Resolves a host-supplied action. Validation happens before any mutation. */
export function resolvePlayerAction(player: PlayerCombatant, action: PlayerAction, ctx: ActionContext): ActionOutcome {
  switch (action.type) {
    case "attack":
      return attack(player, ctx, action.targetId);
    case "defend":
      return defend(player);
    case "use_item":
      return useItem(player, action.itemName);
    case "special_ability":
      return classAbility(player, ctx, action.targetId);
    case "flee":
      return outcome("flee", `${player.name} flees from combat!`, { fled: true });
    default:
      return assertNever(action, "combat.resolvePlayerAction unknown action");
  }
}

function npcSpecial(npc: NpcCombatant, ctx: ActionContext): ActionOutcome {
  const target = weakestOpponent(npc, ctx.participants);
  if (!target) return defend(npc, " No one is left to attack.");

  const hit = strike(npc, target, ctx, ctx.config.specialAttackMultiplier);
  startCooldown(npc, "special_attack", ctx.config.specialAttackCooldown);
  return outcome("special_attack", describeHit(npc, target, hit, "unleashes a special attack on"), {
    targetIds: [target.id],
    damageDealt: hit.damage,
    critical: hit.critical,
    effectsApplied: ["special_attack"],
  });
}

function npcAreaAttack(npc: NpcCombatant, ctx: ActionContext): ActionOutcome {
  const targets = opponentsOf(npc, ctx.participants);
  if (targets.length === 0) return defend(npc, " No one is left to attack.");

  let damageDealt = 0;
  let critical = false;
  const lines: string[] = [];
  for (const target of targets) {
    const hit = strike(npc, target, ctx, ctx.config.areaAttackMultiplier);
    damageDealt += hit.damage;
    critical ||= hit.critical;
    lines.push(`${target.name} takes ${hit.damage}${hit.critical ? " (critical)" : ""}`);
  }

  startCooldown(npc, "area_attack", ctx.config.areaAttackCooldown);
  return outcome("area_attack", `${npc.name} sweeps the field: ${lines.join(", ")}.`, {
    targetIds: targets.map((target) => target.id),
    damageDealt,
    critical,
    effectsApplied: ["area_attack"],
  });
}

function npcHeal(npc: NpcCombatant, ctx: ActionContext): ActionOutcome {
  if (!spendEnergy(npc, ctx.config.npcHealEnergyCost)) {
    return failed("heal", `${npc.name} does not have enough energy to heal.`);
  }
  const healed = heal(npc, ctx.config.npcHealAmount);
  return outcome("heal", `${npc.name} heals for ${healed} health.`, {
    targetIds: [npc.id],
    healingDone: healed,
    effectsApplied: ["heal"],
  });
}

/** Resolves a policy-chosen action; gated abilities fail without change when unavailable. */
export function resolveNpcAction(npc: NpcCombatant, action: NpcAction, ctx: ActionContext): ActionOutcome {
  const gated = action === "special_attack" || action === "area_attack" || action === "heal";
  if (gated && !availableNpcActions(npc, ctx.config).includes(action)) {
    return failed(action, `${npc.name} cannot use ${action}.`);
  }
  if ((action === "special_attack" || action === "area_attack") && !isOffCooldown(npc, action)) {
    return failed(action, `${npc.name}'s ${action} is on cooldown.`);
  }

  switch (action) {
    case "attack":
      return attack(npc, ctx);
    case "defend":
      return defend(npc);
    case "special_attack":
      return npcSpecial(npc, ctx);
    case "area_attack":
      return npcAreaAttack(npc, ctx);
    case "heal":
      return npcHeal(npc, ctx);
    default:
      return assertNever(action, "combat.resolveNpcAction unknown action");
  }
}
