import type { ApplyResult, GameAction, GameState } from "../model";
import type { RulesContext } from "../context";
import { applyChargeMove, applySelectChargeTarget } from "./chargeActions";
import {
  applyConfirmPileInMove,
  applyEndActivation,
  applyResolveFight,
  applySelectFight,
  applySelectFighter,
} from "./fightActions";
import { applyMove } from "./movementActions";
import {
  applyDeselect,
  applySelectAttackTarget,
  applySelectUnit,
  applySelectWeapon,
} from "./selectionActions";
import { applyEndTurn } from "./turnActions";

/**
 * Single entry point of the rules: one action in, the next state and the
 * events out. A rejected action returns the very same state object.
 */
export function applyAction(
  state: GameState,
  action: GameAction,
  ctx: RulesContext
): ApplyResult {
  switch (action.type) {
    case "selectUnit":
      return applySelectUnit(state, action, ctx);

    case "move":
      return applyMove(state, action, ctx);

    case "selectWeapon":
      return applySelectWeapon(state, action);

    case "selectAttackTarget":
      return applySelectAttackTarget(state, action, ctx);

    case "selectChargeTarget":
      return applySelectChargeTarget(state, action, ctx);

    case "chargeMove":
      return applyChargeMove(state, action, ctx);

    case "selectFight":
      return applySelectFight(state, action);

    case "resolveFight":
      return applyResolveFight(state, ctx);

    case "selectFighter":
      return applySelectFighter(state, action, ctx);

    case "confirmPileInMove":
      return applyConfirmPileInMove(state, action, ctx);

    case "endActivation":
      return applyEndActivation(state, ctx);

    case "deselect":
      return applyDeselect(state);

    case "endTurn":
      return applyEndTurn(state, ctx);
  }
}
