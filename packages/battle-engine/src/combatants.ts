import { randomUUID } from "node:crypto";
import type {
  Combatant,
  LootEntry,
  NpcBehavior,
  NpcCombatant,
  NpcRewards,
  NpcTier,
  PlayerClass,
  PlayerCombatant,
} from "./types/combatants.js";
import type { EquipmentSlot } from "./types/items.js";
import type { StatBonuses, StatKey } from "./types/stats.js";
import { DEFAULT_BATTLE_CONFIG } from "./types/config.js";
import { createStatTable, effectiveStat, getStat, modifyStat, setStat } from "./stats.js";
import { Inventory } from "./items/inventory.js";
import { Equipment } from "./items/equipment.js";
import { isEquipmentItem } from "./items/item.js";

const PLAYER_BASE_STATS: StatBonuses = {
  health: 120,
  max_health: 120,
  energy: 60,
  max_energy: 60,
  attack: 12,
  defense: 8,
  speed: 10,
};

const PLAYER_CLASS_BONUSES: Record<PlayerClass, StatBonuses> = {
  warrior: { health: 30, max_health: 30, attack: 5, defense: 3 },
  mage: { energy: 40, max_energy: 40, attack: 3, speed: 2 },
  rogue: { speed: 5, attack: 4, defense: 1 },
  cleric: { health: 20, max_health: 20, energy: 30, max_energy: 30, defense: 2 },
};

const PLAYER_LEVEL_UP_BASE: StatBonuses = { max_health: 10, max_energy: 5, attack: 2, defense: 1, speed: 1 };

const PLAYER_LEVEL_UP_CLASS: Record<PlayerClass, StatBonuses> = {
  warrior: { max_health: 15, attack: 3, defense: 2 },
  mage: { max_energy: 10, attack: 3, speed: 1 },
  rogue: { attack: 4, speed: 2, defense: 1 },
  cleric: { max_health: 12, max_energy: 8, defense: 2 },
};

const PLAYER_CLASS_SKILLS: Record<PlayerClass, string[]> = {
  warrior: ["berserker_rage", "shield_bash"],
  mage: ["cast_spell", "meditate"],
  rogue: ["sneak_attack", "dodge"],
  cleric: ["heal", "bless"],
};

const NPC_BASE_STATS: StatBonuses = {
  health: 80,
  max_health: 80,
  energy: 40,
  max_energy: 40,
  attack: 8,
  defense: 4,
  speed: 8,
};

const NPC_TIER_BONUSES: Record<NpcTier, StatBonuses> = {
  normal: {},
  elite: { health: 50, max_health: 50, attack: 5, defense: 3, speed: 2 },
  mini_boss: { health: 100, max_health: 100, attack: 8, defense: 5, speed: 3 },
  boss: { health: 200, max_health: 200, attack: 15, defense: 10, speed: 5 },
};

const NPC_REWARD_MULTIPLIERS: Record<NpcTier, number> = {
  normal: 1,
  elite: 1.5,
  mini_boss: 2,
  boss: 3,
};

const NPC_LEVEL_UP: StatBonuses = { max_health: 8, max_energy: 3, attack: 1, defense: 1, speed: 1 };

// Maxima first so the current values are not clipped by the old ceiling.
const BONUS_ORDER: StatKey[] = ["max_health", "max_energy", "health", "energy", "attack", "defense", "speed", "experience"];

function applyBonuses(combatant: Combatant, bonuses: StatBonuses): void {
  for (const stat of BONUS_ORDER) {
    const bonus = bonuses[stat];
    if (bonus) modifyStat(combatant, stat, bonus);
  }
}

export interface PlayerOptions {
  id?: string;
  inventoryCapacity?: number;
  gold?: number;
}

export function createPlayer(name: string, playerClass: PlayerClass, options: PlayerOptions = {}): PlayerCombatant {
  const player: PlayerCombatant = {
    kind: "player",
    id: options.id ?? randomUUID(),
    name,
    level: 1,
    stats: createStatTable(PLAYER_BASE_STATS),
    modifiers: createStatTable(),
    effects: [],
    alive: true,
    stunned: false,
    defending: false,
    playerClass,
    gold: options.gold ?? 10,
    inventory: new Inventory(options.inventoryCapacity ?? DEFAULT_BATTLE_CONFIG.inventoryCapacity),
    equipment: new Equipment(),
    skillPoints: 0,
    availableSkills: [...PLAYER_CLASS_SKILLS[playerClass]],
    learnedSkills: [],
  };
  applyBonuses(player, PLAYER_CLASS_BONUSES[playerClass]);
  return player;
}

export interface NpcOptions {
  id?: string;
  templateId?: string | null;
  level?: number;
  behavior?: NpcBehavior;
  /** Replaces the default base stats before tier bonuses are added. */
  baseStats?: StatBonuses;
  lootTable?: LootEntry[];
  /** Fixed rewards instead of the level/tier formula. */
  rewards?: NpcRewards;
}

export function computeNpcRewards(level: number, tier: NpcTier): NpcRewards {
  const multiplier = NPC_REWARD_MULTIPLIERS[tier];
  return {
    experience: Math.floor(level * 10 * multiplier),
    gold: Math.floor(level * 5 * multiplier),
  };
}

export function createNpc(name: string, tier: NpcTier, options: NpcOptions = {}): NpcCombatant {
  const level = options.level ?? 1;
  const npc: NpcCombatant = {
    kind: "npc",
    id: options.id ?? randomUUID(),
    name,
    level,
    stats: createStatTable({ ...NPC_BASE_STATS, ...options.baseStats }),
    modifiers: createStatTable(),
    effects: [],
    alive: true,
    stunned: false,
    defending: false,
    templateId: options.templateId ?? null,
    tier,
    behavior: options.behavior ?? "balanced",
    cooldowns: {},
    rewards: options.rewards ?? computeNpcRewards(level, tier),
    lootTable: [...(options.lootTable ?? [])],
  };
  applyBonuses(npc, NPC_TIER_BONUSES[tier]);
  return npc;
}

/** Per-variant level-up hook. */
function applyLevelUpBonuses(combatant: Combatant): void {
  if (combatant.kind === "player") {
    applyBonuses(combatant, PLAYER_LEVEL_UP_BASE);
    applyBonuses(combatant, PLAYER_LEVEL_UP_CLASS[combatant.playerClass]);
    combatant.skillPoints += 1;
    return;
  }
  applyBonuses(combatant, NPC_LEVEL_UP);
  combatant.rewards = computeNpcRewards(combatant.level, combatant.tier);
}

/** The only path that refills health and energy mid-game. */
export function levelUp(combatant: Combatant): void {
  combatant.level += 1;
  applyLevelUpBonuses(combatant);
  if (combatant.alive) {
    setStat(combatant, "health", effectiveStat(combatant, "max_health"));
  }
  setStat(combatant, "energy", effectiveStat(combatant, "max_energy"));
}

/**
 * Accumulates experience and levels up at most once when the running total
 * reaches `level × experiencePerLevel`.
 */
export function addExperience(
  combatant: Combatant,
  amount: number,
  experiencePerLevel: number = DEFAULT_BATTLE_CONFIG.experiencePerLevel,
): boolean {
  if (amount <= 0) return false;

  const total = combatant.stats.experience + Math.floor(amount);
  setStat(combatant, "experience", total);
  if (total >= combatant.level * experiencePerLevel) {
    levelUp(combatant);
    return true;
  }
  return false;
}

export function addGold(player: PlayerCombatant, amount: number): void {
  player.gold = Math.max(0, player.gold + amount);
}

export function spendGold(player: PlayerCombatant, amount: number): boolean {
  if (amount < 0 || player.gold < amount) return false;
  player.gold -= amount;
  return true;
}

export function learnSkill(player: PlayerCombatant, skill: string, cost = 1): boolean {
  if (player.learnedSkills.includes(skill)) return false;
  if (!player.availableSkills.includes(skill)) return false;
  if (player.skillPoints < cost) return false;

  player.skillPoints -= cost;
  player.learnedSkills.push(skill);
  return true;
}

const INVALID_NAME_CHARACTERS = ["<", ">", ":", '"', "|", "?", "*", "\\", "/"];

export function validatePlayerName(raw: string): { valid: true; name: string } | { valid: false; reason: string } {
  const name = raw.trim();
  if (!name) return { valid: false, reason: "Name cannot be empty" };
  if (name.length < 2) return { valid: false, reason: "Name must be at least 2 characters long" };
  if (name.length > 20) return { valid: false, reason: "Name must be no more than 20 characters long" };

  const invalid = INVALID_NAME_CHARACTERS.find((character) => name.includes(character));
  if (invalid) return { valid: false, reason: `Name cannot contain '${invalid}'` };

  return { valid: true, name };
}

/** Moves an equipment item from the inventory into a slot. All or nothing. */
export function equipFromInventory(player: PlayerCombatant, itemName: string, slot?: EquipmentSlot): boolean {
  const item = player.inventory.get(itemName);
  if (!item || !isEquipmentItem(item)) return false;
  if (player.level < item.levelRequirement) return false;
  if (item.classRequirement && item.classRequirement !== player.playerClass) return false;
  if (!player.equipment.canEquip(item, slot)) return false;

  player.equipment.equip({ ...item, quantity: 1 }, slot);
  player.inventory.remove(itemName, 1);
  return true;
}

export function unequipToInventory(player: PlayerCombatant, slot: EquipmentSlot): boolean {
  const item = player.equipment.getEquipped(slot);
  if (!item || player.inventory.freeSlots < 1) return false;

  player.equipment.unequip(slot);
  return player.inventory.add(item, 1);
}
