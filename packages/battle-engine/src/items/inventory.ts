import type { Combatant } from "../types/combatants.js";
import type { Item, ItemCategory } from "../types/items.js";
import { ITEM_RARITIES } from "../types/items.js";
import { applyConsumable, canUseItem, isConsumable } from "./item.js";

export type InventorySortKey = "name" | "category" | "rarity" | "value";

export const DEFAULT_INVENTORY_CAPACITY = 50;

/**
 * Capacity-bounded, insertion-ordered stacks addressed by item name.
 * Every stack occupies one slot; a full stackable item overflows into a new
 * stack of the same name.
 */
export class Inventory {
  readonly capacity: number;
  private stacks: Item[] = [];

  constructor(capacity: number = DEFAULT_INVENTORY_CAPACITY) {
    this.capacity = capacity;
  }

  /** Adds `quantity` units of `item`; all or nothing. */
  add(item: Item, quantity: number = item.quantity): boolean {
    if (!Number.isInteger(quantity) || quantity <= 0) return false;

    if (!item.stackable) {
      if (this.freeSlots < quantity) return false;
      for (let i = 0; i < quantity; i++) {
        this.stacks.push({ ...structuredClone(item), quantity: 1 });
      }
      return true;
    }

    const existing = this.stacks.filter((stack) => stack.name === item.name);
    const room = existing.reduce((sum, stack) => sum + Math.max(0, stack.maxStack - stack.quantity), 0);
    const overflow = Math.max(0, quantity - room);
    const maxStack = Math.max(1, item.maxStack);
    const newStacks = Math.ceil(overflow / maxStack);
    if (newStacks > this.freeSlots) return false;

    let remaining = quantity;
    for (const stack of existing) {
      if (remaining === 0) break;
      const added = Math.min(remaining, Math.max(0, stack.maxStack - stack.quantity));
      stack.quantity += added;
      remaining -= added;
    }
    while (remaining > 0) {
      const size = Math.min(remaining, maxStack);
      this.stacks.push({ ...structuredClone(item), quantity: size });
      remaining -= size;
    }
    return true;
  }

  /** Removes from the newest stack first; fails without change when short. */
  remove(name: string, quantity: number = 1): boolean {
    if (!Number.isInteger(quantity) || quantity <= 0) return false;
    if (this.count(name) < quantity) return false;

    let remaining = quantity;
    for (let i = this.stacks.length - 1; i >= 0 && remaining > 0; i--) {
      const stack = this.stacks[i];
      if (!stack || stack.name !== name) continue;
      const taken = Math.min(remaining, stack.quantity);
      stack.quantity -= taken;
      remaining -= taken;
      if (stack.quantity <= 0) {
        this.stacks.splice(i, 1);
      }
    }
    return true;
  }

  /**
   * Uses one unit. Only consumables can be used; equipment goes through
   * Equipment.equip instead.
   */
  use(name: string, user: Combatant): boolean {
    const item = this.get(name);
    if (!item || !isConsumable(item)) return false;
    if (!canUseItem(item, user)) return false;

    const used = applyConsumable(item, user);
    if (used) {
      this.remove(name, 1);
    }
    return used;
  }

  get(name: string): Item | undefined {
    return this.stacks.find((stack) => stack.name === name);
  }

  has(name: string, quantity: number = 1): boolean {
    return this.count(name) >= quantity;
  }

  count(name: string): number {
    return this.stacks.reduce((sum, stack) => (stack.name === name ? sum + stack.quantity : sum), 0);
  }

  list(): Item[] {
    return [...this.stacks];
  }

  listByCategory(category: ItemCategory): Item[] {
    return this.stacks.filter((stack) => stack.category === category);
  }

  get usedSlots(): number {
    return this.stacks.length;
  }

  get freeSlots(): number {
    return Math.max(0, this.capacity - this.stacks.length);
  }

  get isFull(): boolean {
    return this.stacks.length >= this.capacity;
  }

  totalValue(): number {
    return this.stacks.reduce((sum, stack) => sum + stack.value * stack.quantity, 0);
  }

  sort(by: InventorySortKey = "name"): void {
    const rarityRank = (item: Item) => ITEM_RARITIES.indexOf(item.rarity);
    const compare: Record<InventorySortKey, (a: Item, b: Item) => number> = {
      name: (a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()),
      category: (a, b) => a.category.localeCompare(b.category),
      rarity: (a, b) => rarityRank(a) - rarityRank(b),
      value: (a, b) => b.value - a.value,
    };
    this.stacks.sort(compare[by]);
  }

  clear(): void {
    this.stacks = [];
  }
}
