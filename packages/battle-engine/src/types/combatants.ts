import type { StatTable } from "./stats.js";
import type { Effect } from "../effects/effect.js";
import type { Inventory } from "../items/inventory.js";
import type { Equipment } from "../items/equipment.js";

export const PLAYER_CLASSES = ["warrior", "mage", "rogue", "cleric"] as const;
export const NPC_TIERS = ["normal", "elite", "mini_boss", "boss"] as const;
export const NPC_BEHAVIORS = ["aggressive", "defensive", "balanced", "healer", "spellcaster"] as const;

export type CombatantKind = "player" | "npc";
export type PlayerClass = (typeof PLAYER_CLASSES)[number];
export type NpcTier = (typeof NPC_TIERS)[number];
export type NpcBehavior = (typeof NPC_BEHAVIORS)[number];

/** Boolean flags a status effect may override for its duration. */
export type StatusFlag = "stunned" | "defending";

export interface CombatantBase {
  id: string;
  name: string;
  level: number;
  stats: StatTable;
  /** Additive, may be negative; reads through getStat floor at 0. */
  modifiers: StatTable;
  effects: Effect[];
  alive: boolean;
  stunned: boolean;
  defending: boolean;
}

export interface PlayerCombatant extends CombatantBase {
  kind: "player";
  playerClass: PlayerClass;
  gold: number;
  inventory: Inventory;
  equipment: Equipment;
  skillPoints: number;
  availableSkills: string[];
  learnedSkills: string[];
}

export interface LootEntry {
  itemId: string;
  dropChance: number;
  quantity: number;
}

export interface NpcRewards {
  experience: number;
  gold: number;
}

export interface NpcCombatant extends CombatantBase {
  kind: "npc";
  /** Content id the combatant was spawned from, when it came from content. */
  templateId: string | null;
  tier: NpcTier;
  behavior: NpcBehavior;
  cooldowns: Record<string, number>;
  rewards: NpcRewards;
  lootTable: LootEntry[];
}

export type Combatant = PlayerCombatant | NpcCombatant;
