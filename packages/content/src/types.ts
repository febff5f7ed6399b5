import * as z from "zod";
import {
  ARMOR_SLOTS,
  ITEM_QUALITIES,
  ITEM_RARITIES,
  MODIFIABLE_STATS,
  NPC_BEHAVIORS,
  NPC_TIERS,
  PLAYER_CLASSES,
} from "@emberfall/battle-engine";

export const CONTENT_KINDS = ["region", "activity", "item", "enemy"] as const;
export type ContentKind = (typeof CONTENT_KINDS)[number];

/** Directory holding each kind's `<id>.json` files under a content root. */
export const CONTENT_DIRECTORIES: { readonly [K in ContentKind]: keyof ContentBundle } = {
  region: "regions",
  activity: "activities",
  item: "items",
  enemy: "enemies",
};

const IdSchema = z.string().min(1);
const CountSchema = z.number().int().min(0);
const ProbabilitySchema = z.number().min(0).max(1);

export const ItemRequirementSchema = z.object({
  item: IdSchema,
  quantity: z.number().int().positive().default(1),
});

/** Stats content may raise; current health and energy follow their maximums. */
const BoostableStatSchema = z.enum(MODIFIABLE_STATS);

const StatBlockSchema = z
  .object({
    max_health: z.number().int().optional(),
    max_energy: z.number().int().optional(),
    attack: z.number().int().optional(),
    defense: z.number().int().optional(),
    speed: z.number().int().optional(),
  })
  .strict();

// ── Regions & activities ───────────────────────────────────────

export const RegionDefinitionSchema = z.object({
  id: IdSchema,
  name: z.string().min(1),
  description: z.string().default(""),
  level: z.number().int().min(1).default(1),
  lootMultiplier: z.number().positive().default(1),
  enemyLevelBonus: CountSchema.default(0),
  availableActivities: z.array(IdSchema).default([]),
  neighboringRegions: z.array(IdSchema).default([]),
  unlockRequirements: z
    .object({
      level: z.number().int().min(1).default(1),
      items: z.array(ItemRequirementSchema).default([]),
      quests: z.array(IdSchema).default([]),
    })
    .default({}),
  travelCost: z
    .object({
      gold: CountSchema.default(0),
      items: z.array(ItemRequirementSchema).default([]),
    })
    .default({}),
  enemies: z.array(IdSchema).default([]),
});

export const ActivityRewardSchema = z.object({
  item: IdSchema,
  dropChance: ProbabilitySchema,
  quantity: z.number().int().positive().default(1),
});

export const ActivityDefinitionSchema = z.object({
  id: IdSchema,
  name: z.string().min(1),
  description: z.string().default(""),
  baseDuration: CountSchema.default(0),
  energyCost: CountSchema.default(0),
  experienceReward: CountSchema.default(0),
  requiredTools: z.array(IdSchema).default([]),
  possibleRewards: z.array(ActivityRewardSchema).default([]),
  /** Odds that the activity turns up anything at all. */
  successRate: ProbabilitySchema.default(1),
  /** Weights per tier when the activity can start an encounter. */
  encounterRates: z.record(z.enum(NPC_TIERS), ProbabilitySchema).optional(),
});

// ── Items ──────────────────────────────────────────────────────

export const ConsumableEffectSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("heal"), amount: z.number().int().positive() }),
  z.object({ type: z.literal("restore_energy"), amount: z.number().int().positive() }),
  z.object({
    type: z.literal("stat_boost"),
    stat: BoostableStatSchema,
    amount: z.number().int(),
    duration: z.number().int().positive().default(3),
  }),
  z.object({
    type: z.literal("heal_over_time"),
    amount: z.number().int().positive(),
    duration: z.number().int().positive(),
  }),
]);

const ItemBaseSchema = z.object({
  id: IdSchema,
  name: z.string().min(1),
  description: z.string().default(""),
  rarity: z.enum(ITEM_RARITIES).default("common"),
  quality: z.enum(ITEM_QUALITIES).default("normal"),
  value: CountSchema.default(0),
  levelRequirement: z.number().int().min(1).default(1),
  classRequirement: z.enum(PLAYER_CLASSES).nullable().default(null),
});

const EquipmentFields = {
  statBonuses: StatBlockSchema.default({}),
  armorSlot: z.enum(ARMOR_SLOTS).nullable().default(null),
  setName: z.string().min(1).nullable().default(null),
};

const StackFields = {
  stackable: z.boolean().optional(),
  maxStack: z.number().int().positive().optional(),
};

export const ItemDefinitionSchema = z
  .discriminatedUnion("category", [
    ItemBaseSchema.extend({
      category: z.literal("consumable"),
      effects: z.array(ConsumableEffectSchema).min(1),
      maxStack: z.number().int().positive().default(99),
    }),
    ItemBaseSchema.extend({ category: z.literal("weapon"), ...EquipmentFields }),
    ItemBaseSchema.extend({ category: z.literal("armor"), ...EquipmentFields }),
    ItemBaseSchema.extend({ category: z.literal("accessory"), ...EquipmentFields }),
    ItemBaseSchema.extend({ category: z.literal("quest"), ...StackFields }),
    ItemBaseSchema.extend({ category: z.literal("material"), ...StackFields }),
    ItemBaseSchema.extend({ category: z.literal("misc"), ...StackFields }),
  ])
  .superRefine((item, ctx) => {
    if (item.category === "armor" && item.armorSlot === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["armorSlot"], message: "armor needs a slot" });
    }
    if (item.category !== "armor" && "armorSlot" in item && item.armorSlot !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["armorSlot"], message: "only armor takes a slot" });
    }
  });

// ── Enemies ────────────────────────────────────────────────────

export const LootEntrySchema = z.object({
  itemId: IdSchema,
  dropChance: ProbabilitySchema,
  quantity: z.number().int().positive().default(1),
});

export const EnemyDefinitionSchema = z.object({
  id: IdSchema,
  name: z.string().min(1),
  description: z.string().default(""),
  tier: z.enum(NPC_TIERS).default("normal"),
  behavior: z.enum(NPC_BEHAVIORS).default("balanced"),
  baseLevel: z.number().int().min(1).default(1),
  baseStats: StatBlockSchema.default({}),
  lootTable: z.array(LootEntrySchema).default([]),
  /** Fixed rewards; otherwise derived from level and tier. */
  rewards: z.object({ experience: CountSchema, gold: CountSchema }).optional(),
  spawnRegions: z.array(IdSchema).default([]),
});

export type ItemRequirement = z.infer<typeof ItemRequirementSchema>;
export type RegionDefinition = z.infer<typeof RegionDefinitionSchema>;
export type ActivityReward = z.infer<typeof ActivityRewardSchema>;
export type ActivityDefinition = z.infer<typeof ActivityDefinitionSchema>;
export type ConsumableEffectDefinition = z.infer<typeof ConsumableEffectSchema>;
export type ItemDefinition = z.infer<typeof ItemDefinitionSchema>;
export type EnemyDefinition = z.infer<typeof EnemyDefinitionSchema>;

export interface ContentDefinitionMap {
  region: RegionDefinition;
  activity: ActivityDefinition;
  item: ItemDefinition;
  enemy: EnemyDefinition;
}

/** Raw, unvalidated definitions grouped by kind. */
export interface ContentBundle {
  regions?: unknown[];
  activities?: unknown[];
  items?: unknown[];
  enemies?: unknown[];
}
