import type { ApplyResult, GameState } from "../model";
import type { RulesContext } from "../context";
import { advanceTurn } from "../phases";

export function applyEndTurn(state: GameState, ctx: RulesContext): ApplyResult {
  return advanceTurn(state, ctx);
}
