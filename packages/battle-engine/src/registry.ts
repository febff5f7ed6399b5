import type { PlayerCombatant } from "./types/combatants.js";
import type { BattleLogger } from "./logging.js";
import { silentLogger } from "./logging.js";
import type { CombatSession, CombatSessionOptions } from "./combat/engine.js";
import { createCombatSession } from "./combat/engine.js";

/**
 * Host-owned bookkeeping: at most one live session per encounter key and at
 * most one persistent player per user key. The keying scheme is the host's.
 */
export interface SessionRegistry {
  /** Null when a live session already holds the key. */
  create(encounterKey: string, options: CombatSessionOptions): CombatSession | null;
  get(encounterKey: string): CombatSession | undefined;
  /** Ends (if still live) and forgets the session. */
  end(encounterKey: string): boolean;
  registerPlayer(userKey: string, player: PlayerCombatant): boolean;
  getPlayer(userKey: string): PlayerCombatant | undefined;
  removePlayer(userKey: string): boolean;
  /** Encounter keys whose sessions are still live. */
  activeKeys(): string[];
}

export interface InMemorySessionRegistryOptions {
  logger?: BattleLogger;
  /** Defaults applied to every session the registry creates. */
  sessionDefaults?: Omit<CombatSessionOptions, "players" | "enemies">;
}

export class InMemorySessionRegistry implements SessionRegistry {
  private readonly sessions = new Map<string, CombatSession>();
  private readonly players = new Map<string, PlayerCombatant>();
  private readonly logger: BattleLogger;
  private readonly sessionDefaults: Omit<CombatSessionOptions, "players" | "enemies">;

  constructor(options: InMemorySessionRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.sessionDefaults = options.sessionDefaults ?? {};
  }

  create(encounterKey: string, options: CombatSessionOptions): CombatSession | null {
    const existing = this.sessions.get(encounterKey);
    if (existing?.getState().active) {
      this.logger.warn("session already active", { encounterKey });
      return null;
    }

    const session = createCombatSession({
      ...this.sessionDefaults,
      ...options,
      config: { ...this.sessionDefaults.config, ...options.config },
    });
    this.sessions.set(encounterKey, session);
    return session;
  }

  get(encounterKey: string): CombatSession | undefined {
    return this.sessions.get(encounterKey);
  }

  end(encounterKey: string): boolean {
    const session = this.sessions.get(encounterKey);
    if (!session) return false;
    session.end();
    this.sessions.delete(encounterKey);
    return true;
  }

  registerPlayer(userKey: string, player: PlayerCombatant): boolean {
    if (this.players.has(userKey)) return false;
    this.players.set(userKey, player);
    return true;
  }

  getPlayer(userKey: string): PlayerCombatant | undefined {
    return this.players.get(userKey);
  }

  removePlayer(userKey: string): boolean {
    return this.players.delete(userKey);
  }

  activeKeys(): string[] {
    return [...this.sessions.entries()].filter(([, session]) => session.getState().active).map(([key]) => key);
  }
}
