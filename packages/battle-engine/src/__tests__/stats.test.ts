import { describe, expect, it } from "vitest";
import { createNpc, createPlayer } from "../combatants.js";
import {
  addTemporaryModifier,
  getStat,
  effectiveStat,
  heal,
  healthFraction,
  removeTemporaryModifier,
  resetCombatState,
  restoreEnergy,
  setStat,
  spendEnergy,
  takeDamage,
} from "../stats.js";
import { commonEffects } from "../effects/presets.js";
import { StatModifierEffect } from "../effects/effect.js";
import { addEffect } from "../effects/engine.js";
import { createEquipment } from "../items/item.js";

describe("stat reads", () => {
  it("floors base plus modifier at zero", () => {
    const npc = createNpc("Slime", "normal");
    addTemporaryModifier(npc, "attack", -20);
    expect(npc.modifiers.attack).toBe(-20);
    expect(getStat(npc, "attack")).toBe(0);

    removeTemporaryModifier(npc, "attack", -20);
    expect(getStat(npc, "attack")).toBe(8);
  });

  it("clamps health to the current maximum", () => {
    const npc = createNpc("Slime", "normal");
    setStat(npc, "health", 500);
    expect(getStat(npc, "health")).toBe(80);

    setStat(npc, "max_health", 50);
    expect(getStat(npc, "health")).toBe(50);
  });
});

describe("takeDamage", () => {
  it("subtracts defense and never applies less than 1", () => {
    const npc = createNpc("Slime", "normal");
    expect(takeDamage(npc, 10)).toBe(6);
    expect(getStat(npc, "health")).toBe(74);
    expect(takeDamage(npc, 2)).toBe(1);
    expect(getStat(npc, "health")).toBe(73);
  });

  it("leaves a health buff out of the pool it damages", () => {
    const npc = createNpc("Slime", "normal");
    addEffect(npc, new StatModifierEffect("Vigor", "buff", 3, { health: 20 }));
    expect(npc.modifiers.health).toBe(0);
    expect(getStat(npc, "health")).toBe(80);

    expect(takeDamage(npc, 11, { ignoreDefense: true })).toBe(11);
    expect(getStat(npc, "health")).toBe(69);
  });

  it("reduces damage by the defense equipment adds", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    warrior.equipment.equip(
      createEquipment({ name: "Mail", category: "armor", armorSlot: "chest", statBonuses: { defense: 3 } }),
    );
    expect(effectiveStat(warrior, "defense")).toBe(14);
    expect(takeDamage(warrior, 20)).toBe(6);
    expect(getStat(warrior, "health")).toBe(144);
  });

  it("skips defense for fixed-amount damage", () => {
    const npc = createNpc("Slime", "normal");
    expect(takeDamage(npc, 5, { ignoreDefense: true })).toBe(5);
    expect(getStat(npc, "health")).toBe(75);
  });

  it("reports only the health actually removed and marks the combatant dead", () => {
    const npc = createNpc("Slime", "normal");
    expect(takeDamage(npc, 1000)).toBe(80);
    expect(getStat(npc, "health")).toBe(0);
    expect(npc.alive).toBe(false);
    expect(takeDamage(npc, 50)).toBe(0);
  });

  it("keeps a dead combatant dead", () => {
    const npc = createNpc("Slime", "normal");
    takeDamage(npc, 1000);
    expect(heal(npc, 50)).toBe(0);
    setStat(npc, "health", 40);
    expect(getStat(npc, "health")).toBe(0);
    expect(npc.alive).toBe(false);
  });
});

describe("resources", () => {
  it("lets equipment raise the health cap", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    warrior.equipment.equip(createEquipment({ name: "Ring", category: "accessory", statBonuses: { max_health: 20 } }));
    expect(effectiveStat(warrior, "max_health")).toBe(170);

    expect(heal(warrior, 50)).toBe(20);
    expect(getStat(warrior, "health")).toBe(170);
    expect(healthFraction(warrior)).toBe(1);
  });

  it("heals up to the missing amount", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    takeDamage(warrior, 50);
    expect(getStat(warrior, "health")).toBe(111);
    expect(heal(warrior, 100)).toBe(39);
    expect(getStat(warrior, "health")).toBe(150);
    expect(healthFraction(warrior)).toBe(1);
  });

  it("spends and restores energy within bounds", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    expect(spendEnergy(warrior, 25)).toBe(true);
    expect(getStat(warrior, "energy")).toBe(35);
    expect(spendEnergy(warrior, 40)).toBe(false);
    expect(getStat(warrior, "energy")).toBe(35);
    expect(restoreEnergy(warrior, 100)).toBe(25);
    expect(getStat(warrior, "energy")).toBe(60);
  });
});

describe("resetCombatState", () => {
  it("clears flags, modifiers and effects", () => {
    const npc = createNpc("Slime", "normal");
    addEffect(npc, commonEffects.strength());
    npc.defending = true;
    npc.stunned = true;

    resetCombatState(npc);

    expect(npc.defending).toBe(false);
    expect(npc.stunned).toBe(false);
    expect(npc.effects).toHaveLength(0);
    expect(getStat(npc, "attack")).toBe(8);
  });
});
