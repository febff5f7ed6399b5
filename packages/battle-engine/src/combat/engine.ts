import type {
  CombatOutcome,
  NpcAction,
  PlayerAction,
  PlayerActionType,
  StepResult,
  TurnRecord,
} from "../types/actions.js";
import type { Combatant, NpcCombatant, PlayerCombatant } from "../types/combatants.js";
import type { BattleConfig } from "../types/config.js";
import { resolveBattleConfig } from "../types/config.js";
import type { EffectTickReport } from "../effects/engine.js";
import { processEffects } from "../effects/engine.js";
import type { RandomSource } from "../rng.js";
import { createSeededRandom, mathRandom } from "../rng.js";
import type { BattleLogger } from "../logging.js";
import { createConsoleLogger } from "../logging.js";
import { getStat, resetCombatState } from "../stats.js";
import { availableNpcActions, chooseNpcAction } from "../ai/policy.js";
import { canUseItem, isConsumable } from "../items/item.js";
import type { ActionOutcome } from "./actions.js";
import { resolveNpcAction, resolvePlayerAction } from "./actions.js";
import { computeTurnOrder } from "./turnOrder.js";
import type { ItemResolver, RewardSummary } from "./rewards.js";
import { distributeRewards } from "./rewards.js";

export interface CombatState {
  participants: Combatant[];
  turnOrder: Combatant[];
  currentIndex: number;
  /** Starts at 1; increments each time the turn order wraps around. */
  round: number;
  log: string[];
  records: TurnRecord[];
  active: boolean;
  outcome: CombatOutcome;
  rewardsCollected: boolean;
}

export interface CombatSessionOptions {
  players: PlayerCombatant[];
  enemies: NpcCombatant[];
  config?: Partial<BattleConfig>;
  /** Takes precedence over `seed`. */
  rng?: RandomSource;
  seed?: string | number;
  logger?: BattleLogger;
}

export interface CombatSession {
  readonly config: BattleConfig;
  getState(): CombatState;
  currentCombatant(): Combatant | undefined;
  availableActions(combatantId?: string): Array<PlayerActionType | NpcAction>;
  /** Advances exactly one combatant's turn. */
  step(action?: PlayerAction): StepResult;
  /** Host-side give-up (for example a decision timeout); resolves as Flee. */
  abandon(): StepResult;
  /** Discards the session. An unfinished encounter is recorded as Flee. */
  end(): void;
  /** Pays out a Victory once; null for any other outcome or a second call. */
  collectRewards(resolveItem?: ItemResolver): RewardSummary | null;
}

export function createCombatState(players: PlayerCombatant[], enemies: NpcCombatant[]): CombatState {
  if (players.length === 0 || enemies.length === 0) {
    throw new Error("[engine invariant] a combat session needs at least one player and one enemy");
  }

  const participants: Combatant[] = [...players, ...enemies];
  for (const participant of participants) {
    resetCombatState(participant);
  }

  const state: CombatState = {
    participants,
    turnOrder: computeTurnOrder(participants),
    currentIndex: 0,
    round: 1,
    log: [`Combat begins: ${players.map((p) => p.name).join(", ")} vs ${enemies.map((e) => e.name).join(", ")}`],
    records: [],
    active: true,
    outcome: "ongoing",
    rewardsCollected: false,
  };

  const terminal = terminalOutcome(state, false);
  if (terminal) finish(state, terminal);
  return state;
}

function terminalOutcome(state: CombatState, fled: boolean): Exclude<CombatOutcome, "ongoing"> | null {
  const living = (kind: Combatant["kind"]) =>
    state.participants.some((participant) => participant.kind === kind && participant.alive);
  if (!living("player")) return "defeat";
  if (!living("npc")) return "victory";
  if (fled) return "flee";
  return null;
}

const OUTCOME_MESSAGES: Record<Exclude<CombatOutcome, "ongoing">, string> = {
  victory: "Victory! All enemies have been defeated.",
  defeat: "Defeat... All players have fallen.",
  flee: "The party escaped from combat.",
};

function finish(state: CombatState, outcome: Exclude<CombatOutcome, "ongoing">): void {
  state.active = false;
  state.outcome = outcome;
  state.log.push(OUTCOME_MESSAGES[outcome]);
}

/** Moves to the next living combatant, rebuilding the order when it runs out. */
function advance(state: CombatState): void {
  let index = state.currentIndex + 1;
  while (index < state.turnOrder.length && !state.turnOrder[index]?.alive) {
    index++;
  }
  if (index < state.turnOrder.length) {
    state.currentIndex = index;
    return;
  }
  state.turnOrder = computeTurnOrder(state.participants);
  state.currentIndex = 0;
  state.round += 1;
}

function describeTicks(actor: Combatant, ticks: EffectTickReport[]): string[] {
  const lines: string[] = [];
  for (const tick of ticks) {
    if (tick.damage > 0) lines.push(`${actor.name} takes ${tick.damage} damage from ${tick.effect}.`);
    if (tick.healing > 0) lines.push(`${actor.name} recovers ${tick.healing} health from ${tick.effect}.`);
    if (tick.expired) lines.push(`${tick.effect} on ${actor.name} wears off.`);
  }
  return lines;
}

function playerActions(player: PlayerCombatant, config: BattleConfig): PlayerActionType[] {
  const actions: PlayerActionType[] = ["attack", "defend"];
  if (player.inventory.list().some((item) => isConsumable(item) && canUseItem(item, player))) {
    actions.push("use_item");
  }
  if (getStat(player, "energy") >= config.playerAbilityEnergyCost) actions.push("special_ability");
  actions.push("flee");
  return actions;
}

export function createCombatSession(options: CombatSessionOptions): CombatSession {
  const config = resolveBattleConfig(options.config);
  const rng = options.rng ?? (options.seed !== undefined ? createSeededRandom(options.seed) : mathRandom);
  const logger = options.logger ?? createConsoleLogger("battle");
  const state = createCombatState(options.players, options.enemies);
  const ctx = { participants: state.participants, rng, config };

  logger.info("combat started", {
    players: options.players.map((p) => p.id),
    enemies: options.enemies.map((e) => e.id),
  });

  const currentCombatant = (): Combatant | undefined =>
    state.active ? state.turnOrder[state.currentIndex] : undefined;

  const record = (actor: Combatant, outcome: ActionOutcome, ticks: EffectTickReport[]): TurnRecord => {
    const entry: TurnRecord = {
      round: state.round,
      actorId: actor.id,
      actorName: actor.name,
      action: outcome.action,
      targetIds: outcome.targetIds,
      success: outcome.success,
      damageDealt: outcome.damageDealt,
      healingDone: outcome.healingDone,
      critical: outcome.critical,
      effectsApplied: outcome.effectsApplied,
      effectTicks: ticks,
      message: outcome.message,
    };
    state.log.push(...describeTicks(actor, ticks), outcome.message);
    state.records.push(entry);
    logger.debug("turn resolved", { round: entry.round, actor: entry.actorId, action: entry.action, success: entry.success });
    return entry;
  };

  const conclude = (entry: TurnRecord, fled: boolean): StepResult => {
    const terminal = terminalOutcome(state, fled);
    if (terminal) {
      finish(state, terminal);
      logger.info("combat ended", { outcome: terminal, round: state.round });
      return { status: "ended", record: entry, outcome: terminal };
    }
    advance(state);
    return { status: "resolved", record: entry, outcome: "ongoing" };
  };

  const endedResult = (): StepResult => ({
    status: "ended",
    record: null,
    outcome: state.outcome === "ongoing" ? "flee" : state.outcome,
  });

  const step = (action?: PlayerAction): StepResult => {
    if (!state.active) return endedResult();

    // Participants may have been changed from outside between steps.
    const pending = terminalOutcome(state, false);
    if (pending) {
      finish(state, pending);
      logger.info("combat ended", { outcome: pending, round: state.round });
      return { status: "ended", record: null, outcome: pending };
    }

    let actor = currentCombatant();
    if (!actor || !actor.alive) {
      advance(state);
      actor = currentCombatant();
      if (!actor) return endedResult();
    }

    // Stun is read before the effect pass so a one-turn stun costs one turn.
    const stunned = actor.stunned;
    if (actor.kind === "player" && !stunned && action === undefined) {
      return { status: "awaiting_action", actorId: actor.id, availableActions: playerActions(actor, config) };
    }

    const ticks = processEffects(actor);
    if (!actor.alive) {
      const entry = record(actor, skipped(`${actor.name} succumbs before acting.`), ticks);
      return conclude(entry, false);
    }
    if (stunned) {
      const entry = record(actor, skipped(`${actor.name} is stunned and cannot act.`, "stunned"), ticks);
      return conclude(entry, false);
    }

    let outcome: ActionOutcome;
    if (actor.kind === "player") {
      if (action === undefined) throw new Error("[engine invariant] player turn resolved without an action");
      outcome = resolvePlayerAction(actor, action, ctx);
    } else {
      outcome = resolveNpcAction(actor, chooseNpcAction(actor, rng, config), ctx);
    }

    const entry = record(actor, outcome, ticks);
    return conclude(entry, outcome.fled);
  };

  return {
    config,
    getState: () => state,
    currentCombatant,
    availableActions: (combatantId?: string) => {
      const actor = combatantId
        ? state.participants.find((participant) => participant.id === combatantId)
        : currentCombatant();
      if (!actor || !actor.alive || !state.active) return [];
      return actor.kind === "player" ? playerActions(actor, config) : availableNpcActions(actor, config);
    },
    step,
    abandon: () => {
      if (!state.active) return endedResult();
      const actor = currentCombatant();
      const runner =
        actor?.kind === "player" ? actor : state.participants.find((p) => p.kind === "player" && p.alive);
      const entry = runner
        ? record(runner, { ...skipped(`${runner.name} gives up and flees.`, "flee"), success: true, fled: true }, [])
        : null;
      finish(state, "flee");
      logger.info("combat abandoned", { round: state.round });
      return { status: "ended", record: entry, outcome: "flee" };
    },
    end: () => {
      if (!state.active) return;
      finish(state, "flee");
      logger.info("combat discarded", { round: state.round });
    },
    collectRewards: (resolveItem?: ItemResolver) => {
      if (state.outcome !== "victory" || state.rewardsCollected) return null;
      state.rewardsCollected = true;
      const summary = distributeRewards(state.participants, rng, resolveItem, config.experiencePerLevel);
      state.log.push(`The party earns ${summary.experience} experience and ${summary.gold} gold.`);
      logger.info("rewards distributed", { experience: summary.experience, gold: summary.gold, drops: summary.loot.length });
      return summary;
    },
  };
}

function skipped(message: string, action: "skipped" | "stunned" | "flee" = "skipped"): ActionOutcome {
  return {
    action,
    success: false,
    targetIds: [],
    damageDealt: 0,
    healingDone: 0,
    critical: false,
    effectsApplied: [],
    message,
    fled: false,
  };
}
