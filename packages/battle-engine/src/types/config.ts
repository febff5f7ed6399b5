import type { PlayerClass } from "./combatants.js";

export interface BattleConfig {
  critBaseChance: number;
  critChancePerSpeed: number;
  critMultiplier: number;
  jitterMin: number;
  jitterMax: number;
  /** NPC heal is offered only while energy is strictly above this. */
  npcHealEnergyThreshold: number;
  npcHealAmount: number;
  npcHealEnergyCost: number;
  specialAttackMultiplier: number;
  specialAttackCooldown: number;
  areaAttackMultiplier: number;
  areaAttackCooldown: number;
  playerAbilityEnergyCost: number;
  playerAbilityMultipliers: Record<Exclude<PlayerClass, "cleric">, number>;
  clericHealAmount: number;
  experiencePerLevel: number;
  inventoryCapacity: number;
}

export const DEFAULT_BATTLE_CONFIG: BattleConfig = {
  critBaseChance: 0.05,
  critChancePerSpeed: 0.001,
  critMultiplier: 1.5,
  jitterMin: 0.8,
  jitterMax: 1.2,
  npcHealEnergyThreshold: 10,
  npcHealAmount: 25,
  npcHealEnergyCost: 10,
  specialAttackMultiplier: 1.5,
  specialAttackCooldown: 3,
  areaAttackMultiplier: 1,
  areaAttackCooldown: 4,
  playerAbilityEnergyCost: 10,
  playerAbilityMultipliers: { warrior: 1.3, mage: 1.4, rogue: 1.6 },
  clericHealAmount: 30,
  experiencePerLevel: 100,
  inventoryCapacity: 50,
};

export function resolveBattleConfig(overrides: Partial<BattleConfig> = {}): BattleConfig {
  return {
    ...DEFAULT_BATTLE_CONFIG,
    ...overrides,
    playerAbilityMultipliers: {
      ...DEFAULT_BATTLE_CONFIG.playerAbilityMultipliers,
      ...overrides.playerAbilityMultipliers,
    },
  };
}
