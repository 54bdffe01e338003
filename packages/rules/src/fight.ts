// packages/rules/src/fight.ts

import type { RulesContext } from "./context";
import { findEngagements } from "./engagements";
import { unitsCollide } from "./geometry";
import {
  Engagement,
  FightState,
  GameEvent,
  GameState,
  PlayerId,
  UnitState,
  otherPlayer,
} from "./model";
import { meleeWeapons } from "./units";

export function makeIdleFightState(): FightState {
  return {
    stage: "none",
    engagements: [],
    selectedEngagementId: null,
    initiativeRound: 0,
    activePlayer: "P1",
    activation: null,
  };
}

// Chargers strike one tier earlier, never above the top tier
export function effectiveInitiative(
  unit: UnitState,
  maxInitiative: number = Number.POSITIVE_INFINITY
): number {
  return Math.min(unit.initiative + (unit.hasCharged ? 1 : 0), maxInitiative);
}

export function attackAllowance(unit: UnitState): number {
  return (
    unit.attacks +
    (unit.hasCharged ? 1 : 0) +
    (meleeWeapons(unit).length >= 2 ? 1 : 0)
  );
}

export function getSelectedEngagement(state: GameState): Engagement | null {
  const id = state.fight.selectedEngagementId;
  if (id === null) return null;
  return state.fight.engagements.find((e) => e.id === id) ?? null;
}

export function engagementUnits(state: GameState, engagement: Engagement): UnitState[] {
  return engagement.participantIds
    .map((id) => state.units[id])
    .filter((u): u is UnitState => u !== undefined);
}

/** Participants that strike at this tier and have not fought yet */
export function eligibleFighters(
  state: GameState,
  engagement: Engagement,
  tier: number,
  maxInitiative: number
): UnitState[] {
  return engagementUnits(state, engagement).filter(
    (u) => !u.hasFought && effectiveInitiative(u, maxInitiative) === tier
  );
}

export function hasEligibleFighter(
  fighters: UnitState[],
  player: PlayerId
): boolean {
  return fighters.some((u) => u.owner === player);
}

export function enemiesInContact(
  ctx: RulesContext,
  state: GameState,
  engagement: Engagement,
  fighter: UnitState
): UnitState[] {
  return engagementUnits(state, engagement).filter(
    (u) => u.owner !== fighter.owner && unitsCollide(ctx.geometry, fighter, u)
  );
}

export function engagementHasPlayer(
  state: GameState,
  engagement: Engagement,
  player: PlayerId
): boolean {
  return engagementUnits(state, engagement).some((u) => u.owner === player);
}

/**
 * Who picks the next fight: the current player while they still have a
 * unit in an unresolved engagement, otherwise the opponent.
 */
export function selectingPlayer(state: GameState): PlayerId {
  const current = state.currentPlayer;
  const hasOwn = state.fight.engagements.some((e) =>
    engagementHasPlayer(state, e, current)
  );
  return hasOwn ? current : otherPlayer(current);
}

/**
 * Fight phase entry: fresh discovery, nothing carried over from last round.
 * The first pick goes to a player who has a model in some engagement.
 */
export function beginFightPhase(
  state: GameState,
  ctx: RulesContext
): { state: GameState; events: GameEvent[] } {
  const engagements = findEngagements(state, ctx.geometry);
  const events: GameEvent[] = [{ type: "engagementsFound", engagements }];
  if (engagements.length === 0) {
    return { state: { ...state, fight: makeIdleFightState() }, events };
  }

  const fight: FightState = {
    ...makeIdleFightState(),
    stage: "selectingFight",
    engagements,
    initiativeRound: ctx.config.maxInitiative,
  };
  const next: GameState = { ...state, fight };
  return { state: { ...next, currentPlayer: selectingPlayer(next) }, events };
}
