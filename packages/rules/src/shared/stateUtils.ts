import type {
  ApplyResult,
  GameState,
  PlayerId,
  Rejection,
  RejectionCode,
  UnitState,
} from "../model";

export function reject(
  state: GameState,
  code: RejectionCode,
  reason: string
): ApplyResult {
  const rejection: Rejection = { code, reason };
  return { state, events: [], rejection };
}

export function listUnits(state: GameState): UnitState[] {
  return Object.values(state.units).sort((a, b) => a.id - b.id);
}

export function unitsOf(state: GameState, player: PlayerId): UnitState[] {
  return state.rosters[player]
    .map((id) => state.units[id])
    .filter((u): u is UnitState => u !== undefined);
}

export function setUnit(state: GameState, unit: UnitState): GameState {
  return {
    ...state,
    units: {
      ...state.units,
      [unit.id]: unit,
    },
  };
}

export function mapUnits(
  state: GameState,
  fn: (unit: UnitState) => UnitState
): GameState {
  const units: Record<number, UnitState> = {};
  for (const unit of listUnits(state)) {
    units[unit.id] = fn(unit);
  }
  return { ...state, units };
}

/**
 * Takes a destroyed unit out of the match: unit table, roster, engagements,
 * selection, pending charge and fight activation.
 */
export function removeUnit(state: GameState, unitId: number): GameState {
  const unit = state.units[unitId];
  if (!unit) return state;

  const units = { ...state.units };
  delete units[unitId];

  const rosters = {
    ...state.rosters,
    [unit.owner]: state.rosters[unit.owner].filter((id) => id !== unitId),
  };

  const selection =
    state.selection && state.selection.unitId === unitId ? null : state.selection;

  const charge =
    state.charge.stage !== "idle" &&
    (state.charge.attackerId === unitId ||
      (state.charge.stage === "awaitingMovement" &&
        state.charge.targetId === unitId))
      ? { stage: "idle" as const }
      : state.charge;

  const engagements = state.fight.engagements.map((e) => ({
    ...e,
    participantIds: e.participantIds.filter((id) => id !== unitId),
  }));

  const activation =
    state.fight.activation && state.fight.activation.fighterId === unitId
      ? null
      : state.fight.activation;

  return {
    ...state,
    units,
    rosters,
    selection,
    charge,
    fight: { ...state.fight, engagements, activation },
  };
}
