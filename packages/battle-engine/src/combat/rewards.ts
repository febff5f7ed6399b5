import type { Item } from "../types/items.js";
import type { Combatant, NpcCombatant, PlayerCombatant } from "../types/combatants.js";
import type { RandomSource } from "../rng.js";
import { chance } from "../rng.js";
import { addExperience, addGold } from "../combatants.js";

export type ItemResolver = (itemId: string) => Item | undefined;

export interface PlayerReward {
  playerId: string;
  experience: number;
  gold: number;
  leveledUp: boolean;
}

export interface LootDrop {
  itemId: string;
  quantity: number;
  recipientId: string;
  /** False when the item id is unknown or the recipient's inventory is full. */
  added: boolean;
}

export interface RewardSummary {
  experience: number;
  gold: number;
  players: PlayerReward[];
  loot: LootDrop[];
}

function split(total: number, shares: number, index: number): number {
  const base = Math.floor(total / shares);
  return index === 0 ? base + (total % shares) : base;
}

/**
 * Pays out every defeated non-player combatant: experience and gold are split
 * evenly among living players (the first takes the remainder), and each loot
 * entry is rolled against its drop chance and handed out in turn.
 */
export function distributeRewards(
  participants: readonly Combatant[],
  rng: RandomSource,
  resolveItem: ItemResolver | undefined,
  experiencePerLevel: number,
): RewardSummary {
  const winners = participants.filter(
    (participant): participant is PlayerCombatant => participant.kind === "player" && participant.alive,
  );
  const defeated = participants.filter(
    (participant): participant is NpcCombatant => participant.kind === "npc" && !participant.alive,
  );

  let experience = 0;
  let gold = 0;
  const rolled: Array<{ itemId: string; quantity: number }> = [];
  for (const npc of defeated) {
    experience += npc.rewards.experience;
    gold += npc.rewards.gold;
    for (const entry of npc.lootTable) {
      if (chance(rng, entry.dropChance)) rolled.push({ itemId: entry.itemId, quantity: entry.quantity });
    }
  }

  const summary: RewardSummary = { experience, gold, players: [], loot: [] };
  if (winners.length === 0) return summary;

  winners.forEach((player, index) => {
    const xpShare = split(experience, winners.length, index);
    const goldShare = split(gold, winners.length, index);
    const leveledUp = addExperience(player, xpShare, experiencePerLevel);
    addGold(player, goldShare);
    summary.players.push({ playerId: player.id, experience: xpShare, gold: goldShare, leveledUp });
  });

  rolled.forEach((drop, index) => {
    const recipient = winners[index % winners.length];
    if (!recipient) return;
    const item = resolveItem?.(drop.itemId);
    const added = item ? recipient.inventory.add(item, drop.quantity) : false;
    summary.loot.push({ ...drop, recipientId: recipient.id, added });
  });

  return summary;
}
