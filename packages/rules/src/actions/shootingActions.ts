import type { ApplyResult, GameAction, GameState } from "../model";
import type { RulesContext } from "../context";
import { resolveAttack } from "../combat";
import { distance } from "../geometry";
import { reject } from "../shared/stateUtils";
import { shootingBlockedReason } from "../shooting";
import { findWeapon } from "../units";
import { requireOwnUnit, requireUnit } from "./shared";

export function applySelectShooter(state: GameState, unitId: number): ApplyResult {
  const actor = requireOwnUnit(state, unitId);
  if (!actor.ok) return actor.result;

  const blocked = shootingBlockedReason(actor.unit, state.phase);
  if (blocked) {
    return reject(state, "IneligibleCombatant", blocked);
  }

  return {
    state: { ...state, selection: { unitId, weaponId: null } },
    events: [{ type: "unitSelected", unitId }],
  };
}

export function applySelectRangedWeapon(
  state: GameState,
  action: Extract<GameAction, { type: "selectWeapon" }>
): ApplyResult {
  const actor = requireOwnUnit(state, action.unitId);
  if (!actor.ok) return actor.result;
  const unit = actor.unit;

  const blocked = shootingBlockedReason(unit, state.phase);
  if (blocked) {
    return reject(state, "IneligibleCombatant", blocked);
  }

  const weapon = findWeapon(unit, action.weaponId);
  if (!weapon) {
    return reject(state, "InvalidTarget", `${unit.name} has no weapon ${action.weaponId}`);
  }
  if (weapon.range === 0) {
    return reject(state, "InvalidTarget", "melee weapons cannot shoot");
  }
  if (state.usedWeaponIds.includes(weapon.id)) {
    return reject(
      state,
      "IneligibleCombatant",
      "Weapon has already been used this round"
    );
  }

  return {
    state: { ...state, selection: { unitId: unit.id, weaponId: weapon.id } },
    events: [{ type: "weaponSelected", unitId: unit.id, weaponId: weapon.id }],
  };
}

/**
 * Fires the selected ranged weapon at an enemy within range, measured
 * centre to centre in 3D. The weapon is spent for the round either way.
 */
export function applyShoot(
  state: GameState,
  action: Extract<GameAction, { type: "selectAttackTarget" }>,
  ctx: RulesContext
): ApplyResult {
  const selection = state.selection;
  if (!selection || selection.weaponId === null) {
    return reject(state, "NoSelection", "select a unit and a ranged weapon first");
  }
  const shooter = state.units[selection.unitId];
  const weapon = shooter ? findWeapon(shooter, selection.weaponId) : undefined;
  if (!shooter || !weapon) {
    return reject(state, "NoSelection", "the selected weapon is no longer available");
  }

  const found = requireUnit(state, action.targetId);
  if (!found.ok) return found.result;
  const target = found.unit;

  if (target.owner === shooter.owner) {
    return reject(state, "InvalidTarget", "cannot shoot at a friendly unit");
  }
  if (distance(shooter.position, target.position) > weapon.range) {
    return reject(state, "OutOfRange", "Target is out of range");
  }

  const attack = resolveAttack(
    state,
    { attackerId: shooter.id, weapon, defenderId: target.id, mode: "ranged" },
    ctx.rng
  );

  return {
    state: {
      ...attack.state,
      usedWeaponIds: [...attack.state.usedWeaponIds, weapon.id],
      selection: null,
    },
    events: attack.events,
  };
}
