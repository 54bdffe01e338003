// packages/server/src/permissions.ts

import { GameAction, GameState, PlayerId, awaitingPlayer } from "@skirmish/rules";

/**
 * Seat check in front of the rules: only the player the match is waiting on
 * may act, and only with their own units.
 */
export function isActionAllowedByPlayer(
  state: GameState,
  action: GameAction,
  playerId: PlayerId
): boolean {
  if (awaitingPlayer(state) !== playerId) return false;

  switch (action.type) {
    case "move":
    case "selectWeapon":
    case "selectChargeTarget":
    case "selectFighter": {
      const unit = state.units[action.unitId];
      if (!unit) return true;
      return unit.owner === playerId;
    }
    default:
      return true;
  }
}
