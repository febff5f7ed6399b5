import type { EquipmentItem, EquipmentSlot } from "../types/items.js";
import { ACCESSORY_SLOTS, ARMOR_SLOTS, EQUIPMENT_SLOTS } from "../types/items.js";
import type { StatBonuses, StatTable } from "../types/stats.js";
import { STAT_KEYS } from "../types/stats.js";
import { createStatTable } from "../stats.js";

export interface SetBonusTier {
  pieces: number;
  bonuses: StatBonuses;
}

/** Every set shares the same thresholds; a set earns each tier it reaches. */
export const DEFAULT_SET_BONUS_TIERS: readonly SetBonusTier[] = [
  { pieces: 2, bonuses: { attack: 5 } },
  { pieces: 4, bonuses: { defense: 10 } },
  { pieces: 6, bonuses: { max_health: 50 } },
];

function slotAccepts(slot: EquipmentSlot, item: EquipmentItem): boolean {
  if (slot === "weapon") return item.category === "weapon";
  if (ACCESSORY_SLOTS.some((accessory) => accessory === slot)) return item.category === "accessory";
  return item.category === "armor" && item.armorSlot === slot;
}

function addBonuses(into: StatTable, bonuses: StatBonuses): void {
  for (const stat of STAT_KEYS) {
    into[stat] += bonuses[stat] ?? 0;
  }
}

export class Equipment {
  private readonly slots = new Map<EquipmentSlot, EquipmentItem>();
  private readonly setBonusTiers: readonly SetBonusTier[];
  private totals: StatTable = createStatTable();
  private setTotals: StatTable = createStatTable();

  constructor(setBonusTiers: readonly SetBonusTier[] = DEFAULT_SET_BONUS_TIERS) {
    this.setBonusTiers = setBonusTiers;
  }

  /**
   * Slot an item would land in. Accessories take the first free slot of
   * ring_1, ring_2, necklace, accessory, in that order.
   */
  resolveSlot(item: EquipmentItem): EquipmentSlot | null {
    switch (item.category) {
      case "weapon":
        return "weapon";
      case "armor":
        return item.armorSlot && (ARMOR_SLOTS as readonly string[]).includes(item.armorSlot) ? item.armorSlot : null;
      case "accessory":
        return ACCESSORY_SLOTS.find((slot) => !this.slots.has(slot)) ?? null;
      default:
        return null;
    }
  }

  canEquip(item: EquipmentItem, slot?: EquipmentSlot): boolean {
    const target = slot ?? this.resolveSlot(item);
    if (!target || !slotAccepts(target, item)) return false;
    return !this.slots.has(target);
  }

  equip(item: EquipmentItem, slot?: EquipmentSlot): boolean {
    const target = slot ?? this.resolveSlot(item);
    if (!target || !slotAccepts(target, item) || this.slots.has(target)) return false;

    this.slots.set(target, item);
    this.recompute();
    return true;
  }

  unequip(slot: EquipmentSlot): EquipmentItem | undefined {
    const item = this.slots.get(slot);
    if (!item) return undefined;

    this.slots.delete(slot);
    this.recompute();
    return item;
  }

  /** Replaces whatever the slot holds and hands back the previous item. */
  swap(
    item: EquipmentItem,
    slot: EquipmentSlot,
  ): { swapped: false } | { swapped: true; previous: EquipmentItem | undefined } {
    if (!slotAccepts(slot, item)) return { swapped: false };

    const previous = this.slots.get(slot);
    this.slots.set(slot, item);
    this.recompute();
    return { swapped: true, previous };
  }

  getEquipped(slot: EquipmentSlot): EquipmentItem | undefined {
    return this.slots.get(slot);
  }

  /** Equipped items in slot order. */
  list(): Array<{ slot: EquipmentSlot; item: EquipmentItem }> {
    const equipped: Array<{ slot: EquipmentSlot; item: EquipmentItem }> = [];
    for (const slot of EQUIPMENT_SLOTS) {
      const item = this.slots.get(slot);
      if (item) equipped.push({ slot, item });
    }
    return equipped;
  }

  findSlot(itemName: string): EquipmentSlot | undefined {
    return this.list().find(({ item }) => item.name === itemName)?.slot;
  }

  get size(): number {
    return this.slots.size;
  }

  getTotalBonuses(): StatTable {
    return { ...this.totals };
  }

  getSetBonuses(): StatTable {
    return { ...this.setTotals };
  }

  totalValue(): number {
    return this.list().reduce((sum, { item }) => sum + item.value, 0);
  }

  // Totals are rebuilt from the equipped items on every change, never patched.
  private recompute(): void {
    const totals = createStatTable();
    const setTotals = createStatTable();
    const setCounts = new Map<string, number>();

    for (const { item } of this.list()) {
      addBonuses(totals, item.statBonuses);
      if (item.setName) {
        setCounts.set(item.setName, (setCounts.get(item.setName) ?? 0) + 1);
      }
    }

    for (const count of setCounts.values()) {
      for (const tier of this.setBonusTiers) {
        if (count >= tier.pieces) addBonuses(setTotals, tier.bonuses);
      }
    }

    addBonuses(totals, setTotals);
    this.totals = totals;
    this.setTotals = setTotals;
  }
}
