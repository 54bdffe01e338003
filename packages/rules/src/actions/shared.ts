import type { ApplyResult, GameState, UnitState } from "../model";
import { reject } from "../shared/stateUtils";

export type ActorLookup =
  | { ok: true; unit: UnitState }
  | { ok: false; result: ApplyResult };

// The acting unit must exist and belong to the player whose turn it is
export function requireOwnUnit(state: GameState, unitId: number): ActorLookup {
  const unit = state.units[unitId];
  if (!unit) {
    return {
      ok: false,
      result: reject(state, "UnknownUnit", `unit ${unitId} is not on the field`),
    };
  }
  if (unit.owner !== state.currentPlayer) {
    return {
      ok: false,
      result: reject(state, "PhaseMismatch", `it is ${state.currentPlayer}'s turn`),
    };
  }
  return { ok: true, unit };
}

export function requireUnit(state: GameState, unitId: number): ActorLookup {
  const unit = state.units[unitId];
  if (!unit) {
    return {
      ok: false,
      result: reject(state, "UnknownUnit", `unit ${unitId} is not on the field`),
    };
  }
  return { ok: true, unit };
}
