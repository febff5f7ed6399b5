import { describe, expect, it } from "vitest";
import {
  addGold,
  createPlayer,
  distributeRewards,
  getStat,
  levelUp,
  takeDamage,
  type RandomSource,
} from "@emberfall/battle-engine";
import {
  canAccessRegion,
  canTravelTo,
  enemiesForRegion,
  instantiateItem,
  itemResolverFor,
  rollEncounter,
  spawnEncounter,
  spawnEnemy,
  travelToRegion,
} from "../factories.js";
import { InMemoryContentProvider } from "../provider.js";
import { loadBuiltinContent } from "../builtins/index.js";
import { UnknownContentError } from "../validators.js";
import type { EnemyDefinition, ItemDefinition, RegionDefinition } from "../types.js";

function sequence(...values: number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[index % values.length] ?? 0;
      index += 1;
      return value;
    },
  };
}

const content = loadBuiltinContent();

function item(id: string): ItemDefinition {
  const definition = content.lookup("item", id);
  if (!definition) throw new Error(`missing item ${id}`);
  return definition;
}

function enemy(id: string): EnemyDefinition {
  const definition = content.lookup("enemy", id);
  if (!definition) throw new Error(`missing enemy ${id}`);
  return definition;
}

function region(id: string): RegionDefinition {
  const definition = content.lookup("region", id);
  if (!definition) throw new Error(`missing region ${id}`);
  return definition;
}

describe("instantiateItem", () => {
  it("builds stackable consumables with their effects", () => {
    const potion = instantiateItem(item("health_potion"), 3);

    expect(potion).toMatchObject({
      id: "health_potion",
      name: "Health Potion",
      category: "consumable",
      stackable: true,
      maxStack: 99,
      quantity: 3,
      effects: [{ type: "heal", amount: 50 }],
    });
  });

  it("builds equipment with slot and bonuses", () => {
    expect(instantiateItem(item("leather_armor"))).toMatchObject({
      category: "armor",
      armorSlot: "chest",
      statBonuses: { defense: 3 },
      stackable: false,
      maxStack: 1,
    });
    expect(instantiateItem(item("ring_of_vigor"))).toMatchObject({
      category: "accessory",
      rarity: "rare",
      levelRequirement: 3,
      armorSlot: null,
    });
  });

  it("stacks materials but not quest items", () => {
    expect(instantiateItem(item("wolf_pelt"))).toMatchObject({ stackable: true, maxStack: 99 });
    expect(instantiateItem(item("ember_key"))).toMatchObject({ stackable: false, maxStack: 1 });
  });

  it("resolves loot ids through the provider", () => {
    const resolve = itemResolverFor(content);

    expect(resolve("iron_sword")?.name).toBe("Iron Sword");
    expect(resolve("no_such_item")).toBeUndefined();
  });
});

describe("spawnEnemy", () => {
  it("uses template stats with health and energy filled to their maximums", () => {
    const slime = spawnEnemy(enemy("slime"), { id: "s1" });

    expect(slime.id).toBe("s1");
    expect(slime.templateId).toBe("slime");
    expect(slime.level).toBe(1);
    expect(slime.behavior).toBe("balanced");
    expect(getStat(slime, "health")).toBe(40);
    expect(getStat(slime, "max_health")).toBe(40);
    expect(getStat(slime, "energy")).toBe(40);
    expect(getStat(slime, "attack")).toBe(6);
    expect(getStat(slime, "defense")).toBe(2);
    expect(getStat(slime, "speed")).toBe(5);
    expect(slime.rewards).toEqual({ experience: 10, gold: 5 });
    expect(slime.lootTable).toEqual([{ itemId: "health_potion", dropChance: 0.3, quantity: 1 }]);
  });

  it("levels past the base level through regular level-ups", () => {
    const wolf = spawnEnemy(enemy("wolf"), { levelBonus: 1 });

    expect(wolf.level).toBe(3);
    expect(getStat(wolf, "max_health")).toBe(68);
    expect(getStat(wolf, "health")).toBe(68);
    expect(getStat(wolf, "max_energy")).toBe(43);
    expect(getStat(wolf, "attack")).toBe(11);
    expect(getStat(wolf, "defense")).toBe(4);
    expect(getStat(wolf, "speed")).toBe(13);
    expect(wolf.rewards).toEqual({ experience: 30, gold: 15 });
  });

  it("adds tier bonuses and keeps fixed rewards", () => {
    const chief = spawnEnemy(enemy("bandit_chief"));

    expect(chief.tier).toBe("mini_boss");
    expect(getStat(chief, "health")).toBe(180);
    expect(getStat(chief, "attack")).toBe(16);
    expect(getStat(chief, "defense")).toBe(9);
    expect(getStat(chief, "speed")).toBe(11);
    expect(chief.rewards).toEqual({ experience: 80, gold: 40 });

    const veteran = spawnEnemy(enemy("bandit_chief"), { level: 5 });
    expect(veteran.level).toBe(5);
    expect(veteran.rewards).toEqual({ experience: 80, gold: 40 });
  });
});

describe("spawnEncounter", () => {
  it("numbers repeated templates", () => {
    const enemies = spawnEncounter(content, ["wolf", "slime", "wolf"]);

    expect(enemies.map((npc) => npc.id)).toEqual(["wolf-1", "slime-1", "wolf-2"]);
    expect(enemies.map((npc) => npc.name)).toEqual(["Wolf", "Slime", "Wolf 2"]);
  });

  it("applies a level bonus to every spawn", () => {
    const [imp] = spawnEncounter(content, ["fire_imp"], { levelBonus: 2 });
    expect(imp?.level).toBe(7);
  });

  it("throws on unknown templates", () => {
    expect(() => spawnEncounter(content, ["ghost"])).toThrow(UnknownContentError);
    expect(() => spawnEncounter(content, ["ghost"])).toThrow('Unknown enemy "ghost"');
  });
});

describe("regions", () => {
  it("lists enemies by their spawn regions", () => {
    expect(enemiesForRegion(content, "greenwood")).toEqual(["bandit_chief", "slime", "wolf"]);
    expect(enemiesForRegion(content, "ashen_peaks")).toEqual(["ash_drake", "fire_imp"]);
    expect(enemiesForRegion(content, "nowhere")).toEqual([]);
  });

  it("checks level before required items", () => {
    const peaks = region("ashen_peaks");
    const hero = createPlayer("Aria", "warrior", { id: "p1" });

    expect(canAccessRegion(peaks, hero)).toEqual({ accessible: false, reason: "Requires level 5" });

    for (let i = 0; i < 4; i++) levelUp(hero);
    expect(canAccessRegion(peaks, hero)).toEqual({ accessible: false, reason: "Requires 1x ember_key" });

    hero.inventory.add(instantiateItem(item("ember_key")));
    expect(canAccessRegion(peaks, hero)).toEqual({ accessible: true });
    expect(canAccessRegion(region("greenwood"), createPlayer("Vex", "rogue"))).toEqual({ accessible: true });
  });
});

describe("travel", () => {
  const trails = InMemoryContentProvider.fromBundle({
    regions: [
      { id: "camp", name: "Camp", neighboringRegions: ["mine"] },
      { id: "mine", name: "Mine", neighboringRegions: ["camp"], travelCost: { items: [{ item: "torch", quantity: 2 }] } },
      { id: "island", name: "Island" },
    ],
    items: [{ id: "torch", name: "Torch", category: "material" }],
  });

  function torches(quantity: number) {
    const definition = trails.lookup("item", "torch");
    if (!definition) throw new Error("missing item torch");
    return instantiateItem(definition, quantity);
  }

  it("checks existence, access and gold in that order, then pays the fare", () => {
    const hero = createPlayer("Aria", "warrior", { id: "p1" });
    expect(canTravelTo(content, hero, "nowhere")).toEqual({ accessible: false, reason: "Region not found" });
    expect(canTravelTo(content, hero, "ashen_peaks", "greenwood")).toEqual({
      accessible: false,
      reason: "Requires level 5",
    });

    for (let i = 0; i < 4; i++) levelUp(hero);
    hero.inventory.add(instantiateItem(item("ember_key")));
    expect(travelToRegion(content, hero, "ashen_peaks", "greenwood")).toEqual({
      success: false,
      message: "Not enough gold. Requires 25 gold",
    });
    expect(hero.gold).toBe(10);

    addGold(hero, 20);
    const result = travelToRegion(content, hero, "ashen_peaks", "greenwood");
    expect(result).toMatchObject({ success: true, message: "Successfully traveled to Ashen Peaks" });
    expect(hero.gold).toBe(5);
    expect(hero.inventory.count("Ember Key")).toBe(1);
  });

  it("only reaches neighbouring regions", () => {
    const hero = createPlayer("Aria", "warrior", { id: "p1" });
    expect(canTravelTo(trails, hero, "island", "camp")).toEqual({
      accessible: false,
      reason: "Island is not reachable from Camp",
    });
    expect(canTravelTo(trails, hero, "island")).toEqual({ accessible: true });
    expect(canTravelTo(trails, hero, "camp", "camp")).toEqual({ accessible: true });
  });

  it("consumes the items a route costs", () => {
    const hero = createPlayer("Aria", "warrior", { id: "p1" });
    hero.inventory.add(torches(1));
    expect(travelToRegion(trails, hero, "mine", "camp")).toEqual({
      success: false,
      message: "Requires 2x torch to travel",
    });
    expect(hero.inventory.count("Torch")).toBe(1);

    hero.inventory.add(torches(2));
    expect(travelToRegion(trails, hero, "mine", "camp")).toMatchObject({ success: true, message: "Successfully traveled to Mine" });
    expect(hero.inventory.count("Torch")).toBe(1);
  });
});

describe("rollEncounter", () => {
  it("fails when the scout roll exceeds the success rate", () => {
    expect(rollEncounter(content, "greenwood", sequence(0.8))).toBeUndefined();
  });

  it("picks a template of the rolled tier", () => {
    expect(rollEncounter(content, "greenwood", sequence(0.5, 0.7, 0))).toEqual({
      enemyId: "bandit_chief",
      tier: "mini_boss",
      levelBonus: 0,
    });
  });

  it("falls back to any of the region's enemies when the tier has none", () => {
    expect(rollEncounter(content, "greenwood", sequence(0, 0.95, 0.5))).toEqual({
      enemyId: "wolf",
      tier: "normal",
      levelBonus: 0,
    });
  });

  it("carries the region's enemy level bonus", () => {
    expect(rollEncounter(content, "ashen_peaks", sequence(0, 0.95, 0))).toEqual({
      enemyId: "ash_drake",
      tier: "boss",
      levelBonus: 2,
    });
  });

  it("needs both the region and the activity", () => {
    expect(rollEncounter(content, "nowhere", sequence(0))).toBeUndefined();
    expect(rollEncounter(content, "greenwood", sequence(0), "fishing")).toBeUndefined();
  });
});

describe("rewards from content", () => {
  it("pays out loot through the provider", () => {
    const hero = createPlayer("Aria", "warrior", { id: "p1" });
    const slime = spawnEnemy(enemy("slime"), { id: "s1" });
    takeDamage(slime, 1000);

    const summary = distributeRewards([hero, slime], sequence(0), itemResolverFor(content), 100);

    expect(summary.loot).toEqual([{ itemId: "health_potion", quantity: 1, recipientId: "p1", added: true }]);
    expect(hero.inventory.count("Health Potion")).toBe(1);
    expect(hero.gold).toBe(15);
  });
});
