import type { EffectTickReport } from "../effects/engine.js";

/** Actions a host may submit for a player-controlled combatant. */
export type PlayerAction =
  | { type: "attack"; targetId?: string }
  | { type: "defend" }
  | { type: "use_item"; itemName: string }
  | { type: "special_ability"; targetId?: string }
  | { type: "flee" };

export type PlayerActionType = PlayerAction["type"];

export const NPC_ACTIONS = ["attack", "defend", "special_attack", "area_attack", "heal"] as const;
export type NpcAction = (typeof NPC_ACTIONS)[number];

/** What a turn actually did, as written to the log. */
export type ResolvedAction = PlayerActionType | NpcAction | "stunned" | "skipped";

export type CombatOutcome = "ongoing" | "victory" | "defeat" | "flee";

export interface TurnRecord {
  round: number;
  actorId: string;
  actorName: string;
  action: ResolvedAction;
  targetIds: string[];
  success: boolean;
  damageDealt: number;
  healingDone: number;
  critical: boolean;
  /** Named abilities or effects the action triggered. */
  effectsApplied: string[];
  effectTicks: EffectTickReport[];
  message: string;
}

export type StepResult =
  | { status: "awaiting_action"; actorId: string; availableActions: PlayerActionType[] }
  | { status: "resolved"; record: TurnRecord; outcome: "ongoing" }
  | { status: "ended"; record: TurnRecord | null; outcome: Exclude<CombatOutcome, "ongoing"> };
