// packages/rules/src/session.ts

import { applyAction } from "./actions/registry";
import { ArmySetup, createDefaultArmies, createMatchState } from "./actions/armyActions";
import type { RulesConfig } from "./config";
import { RulesContext, makeRulesContext } from "./context";
import type { Geometry } from "./geometry";
import type {
  CommandOutcome,
  GameAction,
  GameState,
  PointerHit,
  Vec3,
} from "./model";
import type { RNG } from "./rng";
import { MatchView, makeMatchView } from "./view";

export interface MatchSessionOptions {
  rng?: RNG;
  geometry?: Geometry;
  config?: Partial<RulesConfig>;
  armies?: ArmySetup;
}

/**
 * One match: owns its state and the collaborators the rules run with.
 * Every command is a single action through `applyAction`; a rejected
 * command leaves the state untouched.
 */
export class MatchSession {
  readonly ctx: RulesContext;
  private current: GameState;

  constructor(options: MatchSessionOptions = {}) {
    this.ctx = makeRulesContext(options);
    this.current = createMatchState(
      options.armies ?? createDefaultArmies(),
      this.ctx.config
    );
  }

  get state(): GameState {
    return this.current;
  }

  view(): MatchView {
    return makeMatchView(this.current, this.ctx);
  }

  dispatch(action: GameAction): CommandOutcome {
    const result = applyAction(this.current, action, this.ctx);
    if (result.rejection) {
      return { ok: false, rejection: result.rejection };
    }
    this.current = result.state;
    return { ok: true, events: result.events };
  }

  selectUnit(unitId: number): CommandOutcome {
    return this.dispatch({ type: "selectUnit", unitId });
  }

  proposeMove(unitId: number, to: Vec3): CommandOutcome {
    return this.dispatch({ type: "move", unitId, to });
  }

  selectWeapon(unitId: number, weaponId: string): CommandOutcome {
    return this.dispatch({ type: "selectWeapon", unitId, weaponId });
  }

  selectAttackTarget(targetId: number): CommandOutcome {
    return this.dispatch({ type: "selectAttackTarget", targetId });
  }

  selectChargeTarget(unitId: number, targetId: number): CommandOutcome {
    return this.dispatch({ type: "selectChargeTarget", unitId, targetId });
  }

  chargeMove(hit: PointerHit): CommandOutcome {
    return this.dispatch({ type: "chargeMove", hit });
  }

  selectFight(unitId: number): CommandOutcome {
    return this.dispatch({ type: "selectFight", unitId });
  }

  resolveFight(): CommandOutcome {
    return this.dispatch({ type: "resolveFight" });
  }

  selectFighter(unitId: number): CommandOutcome {
    return this.dispatch({ type: "selectFighter", unitId });
  }

  confirmPileInMove(to: Vec3 | null): CommandOutcome {
    return this.dispatch({ type: "confirmPileInMove", to });
  }

  endActivation(): CommandOutcome {
    return this.dispatch({ type: "endActivation" });
  }

  deselect(): CommandOutcome {
    return this.dispatch({ type: "deselect" });
  }

  advanceTurn(): CommandOutcome {
    return this.dispatch({ type: "endTurn" });
  }
}
