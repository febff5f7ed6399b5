import {
  NPC_TIERS,
  assertNever,
  createConsumable,
  createEquipment,
  createInertItem,
  createNpc,
  levelUp,
  pick,
  spendGold,
  type Item,
  type ItemResolver,
  type NpcCombatant,
  type NpcTier,
  type PlayerCombatant,
  type RandomSource,
  type StatBonuses,
} from "@emberfall/battle-engine";
import type { ContentProvider } from "./provider.js";
import type { EnemyDefinition, ItemDefinition, RegionDefinition } from "./types.js";
import { UnknownContentError } from "./validators.js";

// ── Items ──────────────────────────────────────────────────────

export function instantiateItem(definition: ItemDefinition, quantity = 1): Item {
  const init = {
    id: definition.id,
    name: definition.name,
    description: definition.description,
    rarity: definition.rarity,
    quality: definition.quality,
    value: definition.value,
    quantity,
    levelRequirement: definition.levelRequirement,
    classRequirement: definition.classRequirement,
  };

  switch (definition.category) {
    case "consumable":
      return createConsumable({ ...init, effects: definition.effects, maxStack: definition.maxStack });
    case "weapon":
    case "armor":
    case "accessory":
      return createEquipment({
        ...init,
        category: definition.category,
        statBonuses: definition.statBonuses,
        armorSlot: definition.armorSlot,
        setName: definition.setName,
      });
    case "quest":
    case "material":
    case "misc":
      return createInertItem({
        ...init,
        category: definition.category,
        stackable: definition.stackable,
        maxStack: definition.maxStack,
      });
    default:
      return assertNever(definition, "content.instantiateItem unknown category");
  }
}

/** Resolver for reward distribution: one fresh item per lookup. */
export function itemResolverFor(provider: ContentProvider): ItemResolver {
  return (itemId) => {
    const definition = provider.lookup("item", itemId);
    return definition ? instantiateItem(definition) : undefined;
  };
}

// ── Enemies ────────────────────────────────────────────────────

export interface SpawnOptions {
  id?: string;
  name?: string;
  /** Absolute level; defaults to the definition's base level. */
  level?: number;
  /** Added on top of `level`, e.g. a region's enemy level bonus. */
  levelBonus?: number;
}

function baseStatsOf(definition: EnemyDefinition): StatBonuses {
  const stats: StatBonuses = { ...definition.baseStats };
  if (definition.baseStats.max_health !== undefined) stats.health = definition.baseStats.max_health;
  if (definition.baseStats.max_energy !== undefined) stats.energy = definition.baseStats.max_energy;
  return stats;
}

/**
 * Builds a combatant from a template. Levels above the base level are
 * reached through regular level-ups so stats scale the same way as in play.
 */
export function spawnEnemy(definition: EnemyDefinition, options: SpawnOptions = {}): NpcCombatant {
  const npc = createNpc(options.name ?? definition.name, definition.tier, {
    id: options.id,
    templateId: definition.id,
    level: definition.baseLevel,
    behavior: definition.behavior,
    baseStats: baseStatsOf(definition),
    lootTable: definition.lootTable,
    rewards: definition.rewards,
  });

  const target = (options.level ?? definition.baseLevel) + (options.levelBonus ?? 0);
  while (npc.level < target) {
    levelUp(npc);
  }
  if (definition.rewards) {
    npc.rewards = { ...definition.rewards };
  }
  return npc;
}

export interface EncounterOptions {
  levelBonus?: number;
}

/**
 * Spawns one combatant per id. Repeated templates get numbered ids and names
 * ("wolf-1" / "Wolf", "wolf-2" / "Wolf 2").
 */
export function spawnEncounter(
  provider: ContentProvider,
  enemyIds: readonly string[],
  options: EncounterOptions = {},
): NpcCombatant[] {
  const seen = new Map<string, number>();
  return enemyIds.map((enemyId) => {
    const definition = provider.lookup("enemy", enemyId);
    if (!definition) throw new UnknownContentError("enemy", enemyId);

    const ordinal = (seen.get(enemyId) ?? 0) + 1;
    seen.set(enemyId, ordinal);
    return spawnEnemy(definition, {
      id: `${enemyId}-${ordinal}`,
      name: ordinal > 1 ? `${definition.name} ${ordinal}` : definition.name,
      levelBonus: options.levelBonus,
    });
  });
}

// ── Regions ────────────────────────────────────────────────────

/** Enemy ids whose templates list the region among their spawn regions. */
export function enemiesForRegion(provider: ContentProvider, regionId: string): string[] {
  return provider.list("enemy").filter((id) => provider.lookup("enemy", id)?.spawnRegions.includes(regionId));
}

export type RegionAccess = { accessible: true } | { accessible: false; reason: string };

export function countById(player: PlayerCombatant, itemId: string): number {
  return player.inventory
    .list()
    .filter((item) => item.id === itemId)
    .reduce((total, item) => total + item.quantity, 0);
}

/** Level first, then each required item. Quest requirements are not tracked. */
export function canAccessRegion(region: RegionDefinition, player: PlayerCombatant): RegionAccess {
  const requirements = region.unlockRequirements;
  if (player.level < requirements.level) {
    return { accessible: false, reason: `Requires level ${requirements.level}` };
  }
  for (const requirement of requirements.items) {
    if (countById(player, requirement.item) < requirement.quantity) {
      return { accessible: false, reason: `Requires ${requirement.quantity}x ${requirement.item}` };
    }
  }
  return { accessible: true };
}

/**
 * Whether the player can travel to `targetRegionId` now: the region exists, is
 * a neighbour of `fromRegionId` when one is given, is accessible, and the
 * travel cost is affordable.
 */
export function canTravelTo(
  provider: ContentProvider,
  player: PlayerCombatant,
  targetRegionId: string,
  fromRegionId?: string,
): RegionAccess {
  const region = provider.lookup("region", targetRegionId);
  if (!region) return { accessible: false, reason: "Region not found" };

  if (fromRegionId !== undefined && fromRegionId !== targetRegionId) {
    const origin = provider.lookup("region", fromRegionId);
    if (!origin?.neighboringRegions.includes(targetRegionId)) {
      return { accessible: false, reason: `${region.name} is not reachable from ${origin?.name ?? fromRegionId}` };
    }
  }

  const access = canAccessRegion(region, player);
  if (!access.accessible) return access;

  const cost = region.travelCost;
  if (player.gold < cost.gold) {
    return { accessible: false, reason: `Not enough gold. Requires ${cost.gold} gold` };
  }
  for (const requirement of cost.items) {
    if (countById(player, requirement.item) < requirement.quantity) {
      return { accessible: false, reason: `Requires ${requirement.quantity}x ${requirement.item} to travel` };
    }
  }
  return { accessible: true };
}

export type TravelResult =
  | { success: true; message: string; region: RegionDefinition }
  | { success: false; message: string };

/** Removes `quantity` items with the given id, whatever stacks they sit in. */
function removeById(player: PlayerCombatant, itemId: string, quantity: number): boolean {
  const name = player.inventory.list().find((item) => item.id === itemId)?.name;
  return name !== undefined && player.inventory.remove(name, quantity);
}

/** Checks `canTravelTo`, then pays the gold and consumes the travel items. */
export function travelToRegion(
  provider: ContentProvider,
  player: PlayerCombatant,
  targetRegionId: string,
  fromRegionId?: string,
): TravelResult {
  const check = canTravelTo(provider, player, targetRegionId, fromRegionId);
  if (!check.accessible) return { success: false, message: check.reason };

  const region = provider.lookup("region", targetRegionId);
  if (!region) return { success: false, message: "Region not found" };

  const cost = region.travelCost;
  if (cost.gold > 0 && !spendGold(player, cost.gold)) {
    return { success: false, message: `Not enough gold. Requires ${cost.gold} gold` };
  }
  for (const requirement of cost.items) {
    if (!removeById(player, requirement.item, requirement.quantity)) {
      throw new Error(`[content invariant] travel item ${requirement.item} vanished after the check`);
    }
  }
  return { success: true, message: `Successfully traveled to ${region.name}`, region };
}

export const DEFAULT_ENCOUNTER_RATES: Partial<Record<NpcTier, number>> = {
  normal: 0.6,
  mini_boss: 0.3,
  boss: 0.1,
};

export interface EncounterRoll {
  enemyId: string;
  tier: NpcTier;
  levelBonus: number;
}

/**
 * Rolls whether an activity in a region turns up an enemy, then which tier,
 * then which template of that tier. Falls back to any of the region's enemies
 * when the rolled tier has none.
 */
export function rollEncounter(
  provider: ContentProvider,
  regionId: string,
  rng: RandomSource,
  activityId = "scout",
): EncounterRoll | undefined {
  const region = provider.lookup("region", regionId);
  const activity = provider.lookup("activity", activityId);
  if (!region || !activity) return undefined;
  if (rng.next() > activity.successRate) return undefined;

  const candidates = region.enemies
    .map((id) => provider.lookup("enemy", id))
    .filter((definition): definition is EnemyDefinition => definition !== undefined);
  if (candidates.length === 0) return undefined;

  const rates = activity.encounterRates ?? DEFAULT_ENCOUNTER_RATES;
  const roll = rng.next();
  let selected: NpcTier = "normal";
  let cumulative = 0;
  for (const tier of NPC_TIERS) {
    const rate = rates[tier];
    if (rate === undefined) continue;
    cumulative += rate;
    if (roll <= cumulative) {
      selected = tier;
      break;
    }
  }

  const pool = candidates.filter((definition) => definition.tier === selected);
  const chosen = pick(rng, pool.length > 0 ? pool : candidates);
  if (!chosen) return undefined;
  return { enemyId: chosen.id, tier: chosen.tier, levelBonus: region.enemyLevelBonus };
}
