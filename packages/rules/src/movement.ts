// packages/rules/src/movement.ts

import { RulesConfig } from "./config";
import { onGround, planarDistance } from "./geometry";
import { UnitState, Vec3 } from "./model";
import { marchAllowance, movementAllowance } from "./units";

export type MoveCheck =
  | { ok: true; distance: number; marched: boolean }
  | { ok: false; distance: number };

/**
 * Net displacement from the phase-start snapshot, on the ground plane.
 * Walking back toward the start gives allowance back.
 */
export function checkMove(
  unit: UnitState,
  destination: Vec3,
  config: RulesConfig
): MoveCheck {
  const distance = planarDistance(unit.startPosition, destination);
  if (distance <= movementAllowance(unit, config)) {
    return { ok: true, distance, marched: false };
  }
  if (distance <= marchAllowance(unit, config)) {
    return { ok: true, distance, marched: true };
  }
  return { ok: false, distance };
}

// Commits an accepted move; the vertical coordinate never changes
export function applyUnitMove(
  unit: UnitState,
  destination: Vec3,
  distance: number,
  config: RulesConfig
): UnitState {
  const moveLimit = movementAllowance(unit, config);
  const marchLimit = marchAllowance(unit, config);
  return {
    ...unit,
    position: onGround(destination, unit.position.y),
    moveMarker: unit.moveMarker ?? { ...unit.startPosition },
    remainingMovement: Math.max(0, moveLimit - distance),
    remainingMarch: Math.max(0, marchLimit - distance),
    hasMoved: distance > 0,
    hasMarched: distance > moveLimit,
  };
}

// Round reset: full allowances, no flags, start snapshot at current position
export function resetUnitForRound(unit: UnitState, config: RulesConfig): UnitState {
  return {
    ...unit,
    startPosition: { ...unit.position },
    moveMarker: null,
    remainingMovement: movementAllowance(unit, config),
    remainingMarch: marchAllowance(unit, config),
    hasMoved: false,
    hasMarched: false,
    hasCharged: false,
    hasFought: false,
  };
}

export function snapshotStartPosition(unit: UnitState): UnitState {
  return { ...unit, startPosition: { ...unit.position } };
}
