import {
  addExperience,
  chance,
  getStat,
  spendEnergy,
  type PlayerCombatant,
  type RandomSource,
} from "@emberfall/battle-engine";
import { countById, instantiateItem } from "./factories.js";
import type { ContentProvider } from "./provider.js";
import type { ActivityDefinition } from "./types.js";
import { UnknownContentError } from "./validators.js";

/** Activity definitions a region offers, in the region's order. Unknown ids are skipped. */
export function availableActivities(provider: ContentProvider, regionId: string): ActivityDefinition[] {
  const region = provider.lookup("region", regionId);
  if (!region) return [];
  return region.availableActivities
    .map((id) => provider.lookup("activity", id))
    .filter((activity): activity is ActivityDefinition => activity !== undefined);
}

export interface ActivityLoot {
  itemId: string;
  quantity: number;
  /** False when the inventory had no room and the drop was left behind. */
  stored: boolean;
}

export type ActivityResult =
  | {
      success: true;
      activityId: string;
      duration: number;
      energySpent: number;
      experience: number;
      leveledUp: boolean;
      loot: ActivityLoot[];
    }
  | { success: false; reason: string };

/**
 * Performs one activity in a region: pays its energy, grants its experience,
 * then rolls each possible reward once, scaled by the region's loot
 * multiplier. Nothing changes when a requirement fails.
 */
export function performActivity(
  provider: ContentProvider,
  player: PlayerCombatant,
  regionId: string,
  activityId: string,
  rng: RandomSource,
): ActivityResult {
  const region = provider.lookup("region", regionId);
  if (!region) return { success: false, reason: "Region not found" };

  const activity = provider.lookup("activity", activityId);
  if (!activity || !region.availableActivities.includes(activityId)) {
    return { success: false, reason: `${activity?.name ?? activityId} is not available in ${region.name}` };
  }

  const missingTool = activity.requiredTools.find((tool) => countById(player, tool) === 0);
  if (missingTool !== undefined) {
    return { success: false, reason: `Requires ${missingTool}` };
  }
  if (!spendEnergy(player, activity.energyCost)) {
    return { success: false, reason: `Not enough energy! You need ${activity.energyCost} energy` };
  }

  const leveledUp = addExperience(player, activity.experienceReward);

  const loot: ActivityLoot[] = [];
  for (const reward of activity.possibleRewards) {
    if (!chance(rng, Math.min(1, reward.dropChance * region.lootMultiplier))) continue;
    const definition = provider.lookup("item", reward.item);
    if (!definition) throw new UnknownContentError("item", reward.item);
    const stored = player.inventory.add(instantiateItem(definition, reward.quantity));
    loot.push({ itemId: reward.item, quantity: reward.quantity, stored });
  }

  return {
    success: true,
    activityId,
    duration: activity.baseDuration,
    energySpent: activity.energyCost,
    experience: activity.experienceReward,
    leveledUp,
    loot,
  };
}

/** Whether the player has the energy and tools for an activity, without performing it. */
export function canPerformActivity(player: PlayerCombatant, activity: ActivityDefinition): boolean {
  return (
    getStat(player, "energy") >= activity.energyCost &&
    activity.requiredTools.every((tool) => countById(player, tool) > 0)
  );
}
