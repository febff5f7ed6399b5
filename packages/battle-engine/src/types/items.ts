import type { ModifiableStat, StatBonuses } from "./stats.js";
import type { PlayerClass } from "./combatants.js";

export const ITEM_CATEGORIES = [
  "consumable",
  "weapon",
  "armor",
  "accessory",
  "quest",
  "material",
  "misc",
] as const;
export const ITEM_RARITIES = ["common", "uncommon", "rare", "epic", "legendary"] as const;
export const ITEM_QUALITIES = ["poor", "normal", "good", "excellent", "perfect"] as const;
export const ARMOR_SLOTS = ["head", "chest", "legs", "feet", "hands"] as const;
export const ACCESSORY_SLOTS = ["ring_1", "ring_2", "necklace", "accessory"] as const;
export const EQUIPMENT_SLOTS = ["weapon", ...ARMOR_SLOTS, ...ACCESSORY_SLOTS] as const;

export type ItemCategory = (typeof ITEM_CATEGORIES)[number];
export type ItemRarity = (typeof ITEM_RARITIES)[number];
export type ItemQuality = (typeof ITEM_QUALITIES)[number];
export type ArmorSlot = (typeof ARMOR_SLOTS)[number];
export type AccessorySlot = (typeof ACCESSORY_SLOTS)[number];
export type EquipmentSlot = (typeof EQUIPMENT_SLOTS)[number];
export type EquipmentCategory = "weapon" | "armor" | "accessory";
export type InertCategory = "quest" | "material" | "misc";

export type ConsumableEffectSpec =
  | { type: "heal"; amount: number }
  | { type: "restore_energy"; amount: number }
  | { type: "stat_boost"; stat: ModifiableStat; amount: number; duration: number }
  | { type: "heal_over_time"; amount: number; duration: number };

interface ItemBase {
  /** Content id; inventories address stacks by `name`. */
  id: string;
  name: string;
  description: string;
  rarity: ItemRarity;
  quality: ItemQuality;
  value: number;
  stackable: boolean;
  maxStack: number;
  quantity: number;
  levelRequirement: number;
  classRequirement: PlayerClass | null;
}

export interface ConsumableItem extends ItemBase {
  category: "consumable";
  effects: ConsumableEffectSpec[];
}

export interface EquipmentItem extends ItemBase {
  category: EquipmentCategory;
  statBonuses: StatBonuses;
  armorSlot: ArmorSlot | null;
  setName: string | null;
}

export interface InertItem extends ItemBase {
  category: InertCategory;
}

export type Item = ConsumableItem | EquipmentItem | InertItem;
