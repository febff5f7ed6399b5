import type { Combatant, PlayerClass } from "../types/combatants.js";
import type {
  ArmorSlot,
  ConsumableEffectSpec,
  ConsumableItem,
  EquipmentCategory,
  EquipmentItem,
  InertCategory,
  InertItem,
  Item,
  ItemQuality,
  ItemRarity,
} from "../types/items.js";
import type { StatBonuses } from "../types/stats.js";
import { addEffect } from "../effects/engine.js";
import { HealOverTimeEffect, StatModifierEffect } from "../effects/effect.js";
import { heal, restoreEnergy } from "../stats.js";
import { assertNever } from "../internal/invariant.js";

export interface ItemInit {
  id?: string;
  name: string;
  description?: string;
  rarity?: ItemRarity;
  quality?: ItemQuality;
  value?: number;
  quantity?: number;
  levelRequirement?: number;
  classRequirement?: PlayerClass | null;
}

function slugify(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_|_$/g, "");
}

function baseFields(init: ItemInit, stackable: boolean, maxStack: number) {
  return {
    id: init.id ?? slugify(init.name),
    name: init.name,
    description: init.description ?? "",
    rarity: init.rarity ?? "common",
    quality: init.quality ?? "normal",
    value: init.value ?? 0,
    stackable,
    maxStack: stackable ? Math.max(1, maxStack) : 1,
    quantity: init.quantity ?? 1,
    levelRequirement: init.levelRequirement ?? 1,
    classRequirement: init.classRequirement ?? null,
  };
}

export function createConsumable(
  init: ItemInit & { effects?: ConsumableEffectSpec[]; maxStack?: number },
): ConsumableItem {
  return {
    ...baseFields(init, true, init.maxStack ?? 99),
    category: "consumable",
    effects: [...(init.effects ?? [])],
  };
}

export function createEquipment(
  init: ItemInit & {
    category: EquipmentCategory;
    statBonuses?: StatBonuses;
    armorSlot?: ArmorSlot | null;
    setName?: string | null;
  },
): EquipmentItem {
  return {
    ...baseFields(init, false, 1),
    category: init.category,
    statBonuses: { ...init.statBonuses },
    armorSlot: init.armorSlot ?? null,
    setName: init.setName ?? null,
  };
}

export function createInertItem(
  init: ItemInit & { category: InertCategory; stackable?: boolean; maxStack?: number },
): InertItem {
  const stackable = init.stackable ?? init.category === "material";
  return {
    ...baseFields(init, stackable, init.maxStack ?? 99),
    category: init.category,
  };
}

export function isEquipmentItem(item: Item): item is EquipmentItem {
  return item.category === "weapon" || item.category === "armor" || item.category === "accessory";
}

export function isConsumable(item: Item): item is ConsumableItem {
  return item.category === "consumable";
}

/** Level requirement for everyone; class requirement only binds players. */
export function canUseItem(item: Item, user: Combatant): boolean {
  if (user.level < item.levelRequirement) return false;
  if (item.classRequirement && user.kind === "player" && user.playerClass !== item.classRequirement) {
    return false;
  }
  return true;
}

function applyConsumableEffect(item: ConsumableItem, spec: ConsumableEffectSpec, user: Combatant): void {
  switch (spec.type) {
    case "heal":
      heal(user, spec.amount);
      return;
    case "restore_energy":
      restoreEnergy(user, spec.amount);
      return;
    case "stat_boost":
      addEffect(
        user,
        new StatModifierEffect(`${item.name} Boost`, spec.amount >= 0 ? "buff" : "debuff", spec.duration, {
          [spec.stat]: spec.amount,
        }),
      );
      return;
    case "heal_over_time":
      addEffect(user, new HealOverTimeEffect(item.name, spec.duration, spec.amount));
      return;
    default:
      assertNever(spec, "items.applyConsumableEffect unknown effect type");
  }
}

/**
 * Applies a consumable's effects to the user. Quantity is left to the holder
 * (the inventory decrements on success).
 */
export function applyConsumable(item: ConsumableItem, user: Combatant): boolean {
  if (!user.alive || !canUseItem(item, user)) return false;
  for (const spec of item.effects) {
    applyConsumableEffect(item, spec, user);
  }
  return true;
}

const QUALITY_PREFIX: Record<ItemQuality, string> = {
  poor: "[Poor] ",
  normal: "",
  good: "[Good] ",
  excellent: "[Excellent] ",
  perfect: "[Perfect] ",
};

export function displayName(item: Item): string {
  const label = `${QUALITY_PREFIX[item.quality]}${item.name}`;
  return item.quantity > 1 ? `${label} x${item.quantity}` : label;
}

export const commonItems = {
  healthPotion: (quantity = 1) =>
    createConsumable({
      name: "Health Potion",
      description: "Restores health when consumed",
      value: 10,
      quantity,
      effects: [{ type: "heal", amount: 50 }],
    }),
  energyPotion: (quantity = 1) =>
    createConsumable({
      name: "Energy Potion",
      description: "Restores energy when consumed",
      value: 10,
      quantity,
      effects: [{ type: "restore_energy", amount: 30 }],
    }),
  ironSword: () =>
    createEquipment({
      name: "Iron Sword",
      description: "A sturdy iron sword",
      category: "weapon",
      value: 50,
      statBonuses: { attack: 5 },
    }),
  leatherArmor: () =>
    createEquipment({
      name: "Leather Armor",
      description: "Basic leather armor",
      category: "armor",
      armorSlot: "chest",
      value: 30,
      statBonuses: { defense: 3 },
    }),
};
