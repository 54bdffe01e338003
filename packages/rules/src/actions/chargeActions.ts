import type { ApplyResult, GameAction, GameEvent, GameState, UnitState, Vec3 } from "../model";
import type { RulesContext } from "../context";
import { toWorld } from "../config";
import {
  closingDistance,
  firstContactPoint,
  onGround,
  planarDistance,
  stepToward,
  unitsCollide,
} from "../geometry";
import { rollD6 } from "../rng";
import { reject, setUnit } from "../shared/stateUtils";
import { requireOwnUnit, requireUnit } from "./shared";

// Slack for the bisected contact point landing a hair past the exact reach
const REACH_TOLERANCE = 1e-6;

function chargeBlockedReason(unit: UnitState): string | null {
  if (unit.hasMarched) return "Models that have marched cannot charge";
  if (unit.hasCharged) return `${unit.name} has already charged this round`;
  return null;
}

export function maxChargeRange(unit: UnitState, ctx: RulesContext): number {
  return toWorld(ctx.config, unit.movementRange + ctx.config.chargeBonus);
}

export function applySelectCharger(
  state: GameState,
  unitId: number,
  ctx: RulesContext
): ApplyResult {
  if (state.charge.stage === "awaitingMovement") {
    return reject(state, "PhaseMismatch", "finish the current charge move first");
  }
  const actor = requireOwnUnit(state, unitId);
  if (!actor.ok) return actor.result;
  const unit = actor.unit;

  const blocked = chargeBlockedReason(unit);
  if (blocked) {
    return reject(state, "IneligibleCombatant", blocked);
  }

  return {
    state: {
      ...state,
      selection: { unitId, weaponId: null },
      charge: {
        stage: "pendingTarget",
        attackerId: unitId,
        maxRange: maxChargeRange(unit, ctx),
      },
    },
    events: [{ type: "unitSelected", unitId }],
  };
}

/**
 * Declares a charge and rolls for it. A roll short of the closing distance
 * surges the attacker half way toward the target and spends its charge;
 * otherwise the charge waits for the player to place the attacker.
 */
export function applySelectChargeTarget(
  state: GameState,
  action: Extract<GameAction, { type: "selectChargeTarget" }>,
  ctx: RulesContext
): ApplyResult {
  if (state.phase !== "charge") {
    return reject(state, "PhaseMismatch", "charges are declared in the charge phase");
  }
  if (state.charge.stage === "awaitingMovement") {
    return reject(state, "PhaseMismatch", "finish the current charge move first");
  }

  const actor = requireOwnUnit(state, action.unitId);
  if (!actor.ok) return actor.result;
  const attacker = actor.unit;

  const blocked = chargeBlockedReason(attacker);
  if (blocked) {
    return reject(state, "IneligibleCombatant", blocked);
  }

  const found = requireUnit(state, action.targetId);
  if (!found.ok) return found.result;
  const target = found.unit;
  if (target.owner === attacker.owner) {
    return reject(state, "InvalidTarget", "cannot charge a friendly unit");
  }

  const maxRange = maxChargeRange(attacker, ctx);
  const minDistance = closingDistance(ctx.geometry, attacker, target);
  if (minDistance > maxRange) {
    return reject(state, "OutOfRange", "Target is outside maximum charge range");
  }

  const roll = rollD6(ctx.rng);
  const chargeDistance = toWorld(ctx.config, attacker.movementRange + roll);
  const events: GameEvent[] = [
    {
      type: "chargeDeclared",
      attackerId: attacker.id,
      targetId: target.id,
      maxRange,
      minDistance,
    },
    { type: "chargeRolled", attackerId: attacker.id, roll, chargeDistance },
  ];

  if (chargeDistance < minDistance) {
    const surgeDistance = chargeDistance / 2;
    const to = stepToward(attacker.position, target.position, surgeDistance);
    const surged: UnitState = {
      ...attacker,
      position: to,
      moveMarker: attacker.moveMarker ?? { ...attacker.position },
      hasCharged: true,
    };
    events.push({
      type: "chargeFailed",
      attackerId: attacker.id,
      targetId: target.id,
      surgeDistance,
      to,
    });
    return {
      state: {
        ...setUnit(state, surged),
        selection: null,
        charge: { stage: "idle" },
      },
      events,
    };
  }

  events.push({
    type: "chargeSucceeded",
    attackerId: attacker.id,
    targetId: target.id,
    chargeDistance,
  });
  return {
    state: {
      ...state,
      selection: { unitId: attacker.id, weaponId: null },
      charge: {
        stage: "awaitingMovement",
        attackerId: attacker.id,
        targetId: target.id,
        roll,
        chargeDistance,
        minDistance,
      },
    },
    events,
  };
}

/**
 * Places a charger after a successful roll. Clicking the target charges
 * straight at it; clicking the ground moves there, which must be within the
 * rolled distance of the phase-start position and touch the target.
 */
export function applyChargeMove(
  state: GameState,
  action: Extract<GameAction, { type: "chargeMove" }>,
  ctx: RulesContext
): ApplyResult {
  if (state.phase !== "charge") {
    return reject(state, "PhaseMismatch", "charge moves happen in the charge phase");
  }
  const charge = state.charge;
  if (charge.stage !== "awaitingMovement") {
    return reject(state, "NoSelection", "no charge is waiting for its move");
  }
  const attacker = state.units[charge.attackerId];
  const target = state.units[charge.targetId];
  if (!attacker || !target) {
    return reject(state, "NoSelection", "the charging units are no longer on the field");
  }

  let destination: Vec3;
  let direct = false;
  const hit = action.hit;
  if (hit.kind === "unit") {
    if (hit.unitId !== target.id) {
      return reject(
        state,
        "InvalidTarget",
        "click the charge target or open ground to place the charger"
      );
    }
    destination = firstContactPoint(ctx.geometry, attacker, target);
    direct = true;
  } else {
    destination = onGround(hit.point, attacker.position.y);
  }

  const travelled = planarDistance(attacker.startPosition, destination);
  if (travelled > charge.chargeDistance + REACH_TOLERANCE) {
    return reject(state, "OutOfRange", "Please move within the charge distance");
  }
  if (!unitsCollide(ctx.geometry, attacker, target, destination)) {
    return reject(
      state,
      "InvalidTarget",
      "the charge must end in contact with the target"
    );
  }

  const placed: UnitState = {
    ...attacker,
    position: destination,
    moveMarker: attacker.moveMarker ?? { ...attacker.position },
    hasCharged: true,
  };

  return {
    state: {
      ...setUnit(state, placed),
      selection: null,
      charge: { stage: "idle" },
    },
    events: [
      {
        type: "chargeCompleted",
        attackerId: attacker.id,
        targetId: target.id,
        to: destination,
        direct,
      },
    ],
  };
}

// Backing out before the move leaves no trace; the unit may declare again
export function cancelCharge(state: GameState): ApplyResult {
  const charge = state.charge;
  const events: GameEvent[] =
    charge.stage === "idle"
      ? [{ type: "selectionCleared" }]
      : [{ type: "chargeCancelled", attackerId: charge.attackerId }];
  return {
    state: { ...state, selection: null, charge: { stage: "idle" } },
    events,
  };
}
