import { describe, expect, it } from "vitest";
import { Inventory } from "../items/inventory.js";
import { commonItems, createConsumable, createEquipment, displayName } from "../items/item.js";
import { createPlayer } from "../combatants.js";
import { getStat, takeDamage } from "../stats.js";

function tonic(quantity = 1) {
  return createConsumable({
    name: "Tonic",
    maxStack: 5,
    quantity,
    effects: [{ type: "restore_energy", amount: 10 }],
  });
}

describe("Inventory.add", () => {
  it("fills up to capacity with non-stackable items and then refuses", () => {
    const inventory = new Inventory(2);
    expect(inventory.add(commonItems.ironSword())).toBe(true);
    expect(inventory.add(commonItems.leatherArmor())).toBe(true);

    const ring = createEquipment({ name: "Copper Ring", category: "accessory" });
    expect(inventory.add(ring)).toBe(false);
    expect(inventory.usedSlots).toBe(2);
    expect(inventory.capacity).toBe(2);
    expect(inventory.isFull).toBe(true);
    expect(inventory.has("Copper Ring")).toBe(false);
  });

  it("splits stackable quantities across stacks of max size", () => {
    const inventory = new Inventory(5);
    expect(inventory.add(tonic(3))).toBe(true);
    expect(inventory.add(tonic(4))).toBe(true);

    expect(inventory.count("Tonic")).toBe(7);
    expect(inventory.list().map((stack) => stack.quantity)).toEqual([5, 2]);
    expect(inventory.usedSlots).toBe(2);
  });

  it("refuses a stackable item at capacity when no stack of it exists", () => {
    const inventory = new Inventory(1);
    inventory.add(commonItems.ironSword());
    expect(inventory.add(tonic(1))).toBe(false);
    expect(inventory.count("Tonic")).toBe(0);
  });

  it("is all or nothing when the overflow does not fit", () => {
    const inventory = new Inventory(1);
    expect(inventory.add(tonic(3))).toBe(true);
    expect(inventory.add(tonic(4))).toBe(false);
    expect(inventory.count("Tonic")).toBe(3);
    expect(inventory.add(tonic(2))).toBe(true);
    expect(inventory.count("Tonic")).toBe(5);
  });

  it("gives every unit of a non-stackable item its own slot", () => {
    const inventory = new Inventory(3);
    expect(inventory.add(commonItems.ironSword(), 2)).toBe(true);
    expect(inventory.usedSlots).toBe(2);
    expect(inventory.count("Iron Sword")).toBe(2);
  });
});

describe("Inventory.remove", () => {
  it("conserves quantity across adds and removes", () => {
    const inventory = new Inventory(5);
    inventory.add(tonic(3));
    inventory.add(tonic(4));

    expect(inventory.remove("Tonic", 6)).toBe(true);
    expect(inventory.count("Tonic")).toBe(1);
    expect(inventory.usedSlots).toBe(1);

    expect(inventory.remove("Tonic", 2)).toBe(false);
    expect(inventory.count("Tonic")).toBe(1);

    expect(inventory.remove("Tonic", 1)).toBe(true);
    expect(inventory.usedSlots).toBe(0);
  });
});

describe("Inventory.use", () => {
  it("applies a consumable and takes exactly one unit", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    warrior.inventory.add(commonItems.healthPotion(2));
    takeDamage(warrior, 71);
    expect(getStat(warrior, "health")).toBe(90);

    expect(warrior.inventory.use("Health Potion", warrior)).toBe(true);
    expect(getStat(warrior, "health")).toBe(140);
    expect(warrior.inventory.count("Health Potion")).toBe(1);
  });

  it("refuses equipment, missing items and unmet requirements", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    warrior.inventory.add(commonItems.ironSword());
    warrior.inventory.add(createConsumable({ name: "Elixir", levelRequirement: 5, effects: [{ type: "heal", amount: 5 }] }));

    expect(warrior.inventory.use("Iron Sword", warrior)).toBe(false);
    expect(warrior.inventory.use("Phoenix Feather", warrior)).toBe(false);
    expect(warrior.inventory.use("Elixir", warrior)).toBe(false);
    expect(warrior.inventory.count("Elixir")).toBe(1);
  });
});

describe("Inventory helpers", () => {
  it("sorts, totals and labels stacks", () => {
    const inventory = new Inventory(5);
    inventory.add(commonItems.ironSword());
    inventory.add(commonItems.healthPotion(3));

    inventory.sort("name");
    expect(inventory.list().map((stack) => stack.name)).toEqual(["Health Potion", "Iron Sword"]);
    expect(inventory.totalValue()).toBe(80);
    expect(inventory.listByCategory("consumable")).toHaveLength(1);

    const potions = inventory.get("Health Potion");
    expect(potions && displayName(potions)).toBe("Health Potion x3");
  });
});
