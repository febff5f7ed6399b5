import type { Combatant } from "../types/combatants.js";
import { effectiveStat, getStat } from "../stats.js";

/** Living participants by speed, fastest first; ties keep participant order. */
export function computeTurnOrder(participants: readonly Combatant[]): Combatant[] {
  return participants
    .map((combatant, index) => ({ combatant, index, speed: effectiveStat(combatant, "speed") }))
    .filter(({ combatant }) => combatant.alive)
    .sort((a, b) => b.speed - a.speed || a.index - b.index)
    .map(({ combatant }) => combatant);
}

export function opponentsOf(actor: Combatant, participants: readonly Combatant[]): Combatant[] {
  return participants.filter((candidate) => candidate.kind !== actor.kind && candidate.alive);
}

export function alliesOf(actor: Combatant, participants: readonly Combatant[]): Combatant[] {
  return participants.filter((candidate) => candidate.kind === actor.kind && candidate.alive);
}

/** The living opponent with the lowest current health; first listed wins ties. */
export function weakestOpponent(actor: Combatant, participants: readonly Combatant[]): Combatant | undefined {
  let weakest: Combatant | undefined;
  for (const candidate of opponentsOf(actor, participants)) {
    if (!weakest || getStat(candidate, "health") < getStat(weakest, "health")) {
      weakest = candidate;
    }
  }
  return weakest;
}
