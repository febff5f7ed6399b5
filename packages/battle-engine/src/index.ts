// @emberfall/battle-engine
// Turn-based battle resolver: stats, effects, items, NPC policy and a resumable combat step
export * from "./types/index.js";
export {
  createStatTable,
  isStatKey,
  getStat,
  setStat,
  modifyStat,
  addTemporaryModifier,
  removeTemporaryModifier,
  takeDamage,
  heal,
  restoreEnergy,
  spendEnergy,
  healthFraction,
  energyFraction,
  resetCombatState,
  effectiveStat,
  isModifiableStat,
} from "./stats.js";
export type { DamageOptions } from "./stats.js";
export {
  createPlayer,
  createNpc,
  computeNpcRewards,
  levelUp,
  addExperience,
  addGold,
  spendGold,
  learnSkill,
  validatePlayerName,
  equipFromInventory,
  unequipToInventory,
} from "./combatants.js";
export type { PlayerOptions, NpcOptions } from "./combatants.js";
export {
  Effect,
  StatModifierEffect,
  DamageOverTimeEffect,
  HealOverTimeEffect,
  StatusEffect,
  CustomEffect,
} from "./effects/effect.js";
export type {
  EffectCategory,
  EffectTarget,
  EffectKind,
  EffectOptions,
  EffectTickOutcome,
  CustomEffectHooks,
} from "./effects/effect.js";
export { addEffect, removeEffect, processEffects, findEffects, hasEffect, dispelEffects } from "./effects/engine.js";
export type { EffectTickReport } from "./effects/engine.js";
export { commonEffects } from "./effects/presets.js";
export {
  createConsumable,
  createEquipment,
  createInertItem,
  isEquipmentItem,
  isConsumable,
  canUseItem,
  applyConsumable,
  displayName,
  commonItems,
} from "./items/item.js";
export type { ItemInit } from "./items/item.js";
export { Inventory, DEFAULT_INVENTORY_CAPACITY } from "./items/inventory.js";
export type { InventorySortKey } from "./items/inventory.js";
export { Equipment, DEFAULT_SET_BONUS_TIERS } from "./items/equipment.js";
export type { SetBonusTier } from "./items/equipment.js";
export { availableNpcActions, chooseNpcAction, isOffCooldown, startCooldown } from "./ai/policy.js";
export { rollDamage, effectiveDefense, criticalChance } from "./combat/damage.js";
export type { DamageRoll } from "./combat/damage.js";
export { computeTurnOrder, opponentsOf, alliesOf, weakestOpponent } from "./combat/turnOrder.js";
export { resolvePlayerAction, resolveNpcAction, CLASS_ABILITY_NAMES } from "./combat/actions.js";
export type { ActionContext, ActionOutcome } from "./combat/actions.js";
export { distributeRewards } from "./combat/rewards.js";
export type { ItemResolver, PlayerReward, LootDrop, RewardSummary } from "./combat/rewards.js";
export { createCombatSession, createCombatState } from "./combat/engine.js";
export type { CombatSession, CombatSessionOptions, CombatState } from "./combat/engine.js";
export { InMemorySessionRegistry } from "./registry.js";
export type { SessionRegistry, InMemorySessionRegistryOptions } from "./registry.js";
export { createSeededRandom, mathRandom, uniform, chance, pick } from "./rng.js";
export type { RandomSource } from "./rng.js";
export { createConsoleLogger, silentLogger, parseLogLevel, resolveLogLevel } from "./logging.js";
export type { BattleLogger, LogLevel } from "./logging.js";
export { expectDefined, assertNever } from "./internal/invariant.js";
