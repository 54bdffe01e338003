// packages/rules/src/shooting.ts

import type { Phase, UnitState } from "./model";
import { rangedWeapons } from "./units";

// Reason the unit may not shoot this phase, or null when it may
export function shootingBlockedReason(unit: UnitState, phase: Phase): string | null {
  if (phase === "firstFire" && (unit.hasMoved || unit.hasMarched)) {
    return "Models that have moved cannot shoot in the first fire phase";
  }
  if (phase === "advanceFire" && unit.hasMarched) {
    return "Models that have marched cannot shoot in the advance fire phase";
  }
  if (rangedWeapons(unit).length === 0) {
    return `${unit.name} carries no ranged weapon`;
  }
  return null;
}

export function canShoot(unit: UnitState, phase: Phase): boolean {
  return shootingBlockedReason(unit, phase) === null;
}
