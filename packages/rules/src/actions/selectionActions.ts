import type { ApplyResult, GameAction, GameState } from "../model";
import type { RulesContext } from "../context";
import { isShootingPhase } from "../phases";
import { reject } from "../shared/stateUtils";
import { applySelectCharger, cancelCharge } from "./chargeActions";
import {
  applyFightDeselect,
  applyMeleeAttack,
  applySelectFight,
  applySelectFighter,
  applySelectMeleeWeapon,
} from "./fightActions";
import { applySelectRangedWeapon, applySelectShooter, applyShoot } from "./shootingActions";
import { requireOwnUnit } from "./shared";

/**
 * A click on a unit means something different in every phase: pick a mover,
 * a shooter, a charger, a fight or a fighter.
 */
export function applySelectUnit(
  state: GameState,
  action: Extract<GameAction, { type: "selectUnit" }>,
  ctx: RulesContext
): ApplyResult {
  switch (state.phase) {
    case "movement": {
      const actor = requireOwnUnit(state, action.unitId);
      if (!actor.ok) return actor.result;
      return {
        state: { ...state, selection: { unitId: action.unitId, weaponId: null } },
        events: [{ type: "unitSelected", unitId: action.unitId }],
      };
    }
    case "firstFire":
    case "advanceFire":
      return applySelectShooter(state, action.unitId);
    case "charge":
      return applySelectCharger(state, action.unitId, ctx);
    case "fight":
      if (state.fight.stage === "selectingFight") {
        return applySelectFight(state, { type: "selectFight", unitId: action.unitId });
      }
      if (state.fight.stage === "resolvingInitiativeRound") {
        return applySelectFighter(
          state,
          { type: "selectFighter", unitId: action.unitId },
          ctx
        );
      }
      return reject(state, "PhaseMismatch", "finish the current activation first");
  }
}

export function applySelectWeapon(
  state: GameState,
  action: Extract<GameAction, { type: "selectWeapon" }>
): ApplyResult {
  if (isShootingPhase(state.phase)) {
    return applySelectRangedWeapon(state, action);
  }
  if (state.phase === "fight") {
    return applySelectMeleeWeapon(state, action);
  }
  return reject(state, "PhaseMismatch", `no weapons are used in the ${state.phase} phase`);
}

export function applySelectAttackTarget(
  state: GameState,
  action: Extract<GameAction, { type: "selectAttackTarget" }>,
  ctx: RulesContext
): ApplyResult {
  if (isShootingPhase(state.phase)) {
    return applyShoot(state, action, ctx);
  }
  if (state.phase === "fight") {
    return applyMeleeAttack(state, action, ctx);
  }
  return reject(state, "PhaseMismatch", `no attacks are made in the ${state.phase} phase`);
}

export function applyDeselect(state: GameState): ApplyResult {
  if (state.phase === "charge") {
    return cancelCharge(state);
  }
  if (state.phase === "fight") {
    return applyFightDeselect(state);
  }
  return {
    state: { ...state, selection: null },
    events: [{ type: "selectionCleared" }],
  };
}
