import { describe, expect, it } from "vitest";
import {
  addExperience,
  computeNpcRewards,
  createNpc,
  createPlayer,
  learnSkill,
  levelUp,
  spendGold,
  validatePlayerName,
} from "../combatants.js";
import { getStat, takeDamage } from "../stats.js";
import { PLAYER_CLASSES } from "../types/combatants.js";

describe("createPlayer", () => {
  it("applies class bonuses on top of the shared base", () => {
    const summary = PLAYER_CLASSES.map((playerClass) => {
      const player = createPlayer("Hero", playerClass, { id: playerClass });
      return [
        playerClass,
        getStat(player, "max_health"),
        getStat(player, "max_energy"),
        getStat(player, "attack"),
        getStat(player, "defense"),
        getStat(player, "speed"),
      ];
    });

    expect(summary).toEqual([
      ["warrior", 150, 60, 17, 11, 10],
      ["mage", 120, 100, 15, 8, 12],
      ["rogue", 120, 60, 16, 9, 15],
      ["cleric", 140, 90, 12, 10, 10],
    ]);
  });

  it("starts full, with 10 gold and the class skill list", () => {
    const cleric = createPlayer("Sol", "cleric", { id: "c1" });
    expect(getStat(cleric, "health")).toBe(140);
    expect(getStat(cleric, "energy")).toBe(90);
    expect(cleric.gold).toBe(10);
    expect(cleric.availableSkills).toEqual(["heal", "bless"]);
    expect(cleric.inventory.capacity).toBe(50);
  });
});

describe("createNpc", () => {
  it("adds tier bonuses to both health and its maximum", () => {
    const boss = createNpc("Dragon", "boss");
    expect(getStat(boss, "health")).toBe(280);
    expect(getStat(boss, "max_health")).toBe(280);
    expect(getStat(boss, "attack")).toBe(23);
    expect(getStat(boss, "defense")).toBe(14);
    expect(getStat(boss, "speed")).toBe(13);
  });

  it("derives rewards from level and tier", () => {
    expect(computeNpcRewards(1, "normal")).toEqual({ experience: 10, gold: 5 });
    expect(computeNpcRewards(3, "elite")).toEqual({ experience: 45, gold: 22 });
    expect(computeNpcRewards(2, "boss")).toEqual({ experience: 60, gold: 30 });
    expect(createNpc("Knight", "mini_boss", { level: 2 }).rewards).toEqual({ experience: 40, gold: 20 });
  });
});

describe("experience and levels", () => {
  it("levels up once the running total reaches level × 100", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    takeDamage(warrior, 60);

    expect(addExperience(warrior, 50)).toBe(false);
    expect(addExperience(warrior, 60)).toBe(true);

    expect(warrior.level).toBe(2);
    expect(warrior.stats.experience).toBe(110);
    expect(getStat(warrior, "max_health")).toBe(175);
    expect(getStat(warrior, "health")).toBe(175);
    expect(getStat(warrior, "max_energy")).toBe(65);
    expect(getStat(warrior, "energy")).toBe(65);
    expect(getStat(warrior, "attack")).toBe(22);
    expect(getStat(warrior, "defense")).toBe(14);
    expect(getStat(warrior, "speed")).toBe(11);
    expect(warrior.skillPoints).toBe(1);
  });

  it("gives non-player combatants flat increases and new rewards", () => {
    const slime = createNpc("Slime", "normal");
    levelUp(slime);
    expect(slime.level).toBe(2);
    expect(getStat(slime, "max_health")).toBe(88);
    expect(getStat(slime, "health")).toBe(88);
    expect(getStat(slime, "attack")).toBe(9);
    expect(slime.rewards).toEqual({ experience: 20, gold: 10 });
  });

  it("does not bring a dead combatant back", () => {
    const slime = createNpc("Slime", "normal");
    takeDamage(slime, 1000);
    levelUp(slime);
    expect(slime.alive).toBe(false);
    expect(getStat(slime, "health")).toBe(0);
  });
});

describe("player extras", () => {
  it("spends skill points on class skills only", () => {
    const warrior = createPlayer("Aria", "warrior", { id: "p1" });
    expect(learnSkill(warrior, "shield_bash")).toBe(false);

    levelUp(warrior);
    expect(learnSkill(warrior, "fireball")).toBe(false);
    expect(learnSkill(warrior, "shield_bash")).toBe(true);
    expect(warrior.skillPoints).toBe(0);
    expect(warrior.learnedSkills).toEqual(["shield_bash"]);
  });

  it("refuses to spend more gold than held", () => {
    const rogue = createPlayer("Vex", "rogue", { id: "p1" });
    expect(spendGold(rogue, 4)).toBe(true);
    expect(rogue.gold).toBe(6);
    expect(spendGold(rogue, 7)).toBe(false);
    expect(rogue.gold).toBe(6);
  });

  it("validates display names", () => {
    expect(validatePlayerName("  Aria ")).toEqual({ valid: true, name: "Aria" });
    expect(validatePlayerName("A")).toEqual({ valid: false, reason: "Name must be at least 2 characters long" });
    expect(validatePlayerName("x".repeat(21))).toEqual({
      valid: false,
      reason: "Name must be no more than 20 characters long",
    });
    expect(validatePlayerName("Bad/Name")).toEqual({ valid: false, reason: "Name cannot contain '/'" });
    expect(validatePlayerName("   ")).toEqual({ valid: false, reason: "Name cannot be empty" });
  });
});
