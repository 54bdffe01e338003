import type { GameState, PlayerId, UnitState, Vec3 } from "../model";
import { RulesConfig, RulesConfigError } from "../config";
import { makeIdleFightState } from "../fight";
import { createUnit, getUnitProfile } from "../units";

export interface UnitPlacement {
  profileId: string;
  position: Vec3;
}

export type ArmySetup = Record<PlayerId, UnitPlacement[]>;

// Deployment rows, in world units
const P1_ROW_Z = 0;
const P2_ROW_Z = 300;
const FILE_SPACING = 60;

// Three models per side, one row each, facing each other across the table
export function createDefaultArmy(player: PlayerId): UnitPlacement[] {
  const profiles =
    player === "P1"
      ? ["ranger", "vanguard", "destroyer"]
      : ["plagueMarine", "blightChampion", "poxwalker"];
  const z = player === "P1" ? P1_ROW_Z : P2_ROW_Z;

  return profiles.map((profileId, index) => ({
    profileId,
    position: { x: index * FILE_SPACING, y: 0, z },
  }));
}

export function createDefaultArmies(): ArmySetup {
  return { P1: createDefaultArmy("P1"), P2: createDefaultArmy("P2") };
}

/**
 * Fresh match at round 1, Movement phase, P1 to act. Units get ids in
 * deployment order, P1's army first.
 */
export function createMatchState(armies: ArmySetup, config: RulesConfig): GameState {
  const units: Record<number, UnitState> = {};
  const rosters: Record<PlayerId, number[]> = { P1: [], P2: [] };
  let nextUnitId = 1;

  const players: PlayerId[] = ["P1", "P2"];
  for (const owner of players) {
    for (const placement of armies[owner]) {
      const profile = getUnitProfile(placement.profileId);
      if (!profile) {
        throw new RulesConfigError(`unknown unit profile ${placement.profileId}`);
      }
      const unit = createUnit(
        profile,
        { id: nextUnitId, owner, position: placement.position },
        config
      );
      units[unit.id] = unit;
      rosters[owner].push(unit.id);
      nextUnitId += 1;
    }
  }

  return {
    roundNumber: 1,
    phase: "movement",
    currentPlayer: "P1",
    nextUnitId,
    units,
    rosters,
    selection: null,
    charge: { stage: "idle" },
    fight: makeIdleFightState(),
    usedWeaponIds: [],
  };
}
