import type { ApplyResult, GameAction, GameState } from "../model";
import type { RulesContext } from "../context";
import { applyUnitMove, checkMove } from "../movement";
import { evUnitMoved } from "../shared/events";
import { reject, setUnit } from "../shared/stateUtils";
import { requireOwnUnit } from "./shared";

export function applyMove(
  state: GameState,
  action: Extract<GameAction, { type: "move" }>,
  ctx: RulesContext
): ApplyResult {
  if (state.phase !== "movement") {
    return reject(state, "PhaseMismatch", "units move only in the movement phase");
  }

  const actor = requireOwnUnit(state, action.unitId);
  if (!actor.ok) return actor.result;
  const unit = actor.unit;

  const check = checkMove(unit, action.to, ctx.config);
  if (!check.ok) {
    return reject(state, "OutOfRange", "outside movement/march range");
  }

  const moved = applyUnitMove(unit, action.to, check.distance, ctx.config);
  const nextState: GameState = {
    ...setUnit(state, moved),
    selection: { unitId: unit.id, weaponId: null },
  };

  return {
    state: nextState,
    events: [
      evUnitMoved({
        unitId: unit.id,
        from: unit.position,
        to: moved.position,
        distance: check.distance,
        marched: check.marched,
      }),
    ],
  };
}
