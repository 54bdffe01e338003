// packages/rules/src/combat.ts

import { AttackReport, GameEvent, GameState, UnitState, Weapon } from "./model";
import { RNG, countAtLeast, rollDice } from "./rng";
import { evAttackResolved, evUnitDestroyed } from "./shared/events";
import { removeUnit, setUnit } from "./shared/stateUtils";

export type AttackMode = AttackReport["mode"];

/**
 * Roll needed to wound, or null when the wound cannot be scored at all.
 * A strength of at most half the toughness never wounds.
 */
export function woundThreshold(strength: number, toughness: number): number | null {
  if (strength >= 2 * toughness) return 2;
  if (strength * 2 <= toughness) return null;
  if (strength > toughness) return 3;
  if (strength === toughness) return 4;
  return 5;
}

export function resolveWoundRoll(
  roll: number,
  strength: number,
  toughness: number
): boolean {
  const threshold = woundThreshold(strength, toughness);
  return threshold !== null && roll >= threshold;
}

// AP is stored as 0 or negative, so subtracting it raises the roll needed
export function requiredSave(defender: UnitState, weapon: Weapon): number {
  return Math.min(
    defender.armourSave - weapon.armourPiercing,
    defender.invulnerabilitySave
  );
}

export function isSaved(roll: number, required: number): boolean {
  return roll >= required;
}

export function attackStrength(attacker: UnitState, weapon: Weapon): number {
  return weapon.strength > 0 ? weapon.strength : attacker.strength;
}

export function attackSkill(attacker: UnitState, mode: AttackMode): number {
  return mode === "ranged" ? attacker.ballisticSkill : attacker.weaponSkill;
}

// Hit, wound, save, damage. Each stage rolls only for the previous stage's successes.
export function rollAttack(
  attacker: UnitState,
  weapon: Weapon,
  defender: UnitState,
  mode: AttackMode,
  rng: RNG
): AttackReport {
  const skill = attackSkill(attacker, mode);
  const hitDice = rollDice(rng, weapon.shots);
  const hits = countAtLeast(hitDice, skill);

  const strength = attackStrength(attacker, weapon);
  const woundDice = rollDice(rng, hits);
  const wounds = woundDice.filter((d) =>
    resolveWoundRoll(d, strength, defender.toughness)
  ).length;

  const required = requiredSave(defender, weapon);
  const saveDice = rollDice(rng, wounds);
  const unsaved = saveDice.filter((d) => !isSaved(d, required)).length;

  return {
    weaponId: weapon.id,
    mode,
    skill,
    hitDice,
    hits,
    strength,
    woundDice,
    wounds,
    requiredSave: required,
    saveDice,
    unsaved,
    damage: unsaved * weapon.damage,
  };
}

// Wounds at or below zero remove the unit from the match for good
export function takeDamage(
  state: GameState,
  defenderId: number,
  damage: number,
  killerId: number | null
): { state: GameState; events: GameEvent[]; woundsAfter: number } {
  const defender = state.units[defenderId];
  if (!defender) {
    return { state, events: [], woundsAfter: 0 };
  }
  if (damage <= 0) {
    return { state, events: [], woundsAfter: defender.wounds };
  }

  const woundsAfter = defender.wounds - damage;
  if (woundsAfter > 0) {
    return {
      state: setUnit(state, { ...defender, wounds: woundsAfter }),
      events: [],
      woundsAfter,
    };
  }

  return {
    state: removeUnit(state, defenderId),
    events: [evUnitDestroyed({ unitId: defenderId, killerId })],
    woundsAfter,
  };
}

export function resolveAttack(
  state: GameState,
  params: {
    attackerId: number;
    weapon: Weapon;
    defenderId: number;
    mode: AttackMode;
  },
  rng: RNG
): { state: GameState; events: GameEvent[]; report: AttackReport | null } {
  const attacker = state.units[params.attackerId];
  const defender = state.units[params.defenderId];
  if (!attacker || !defender) {
    return { state, events: [], report: null };
  }

  const report = rollAttack(attacker, params.weapon, defender, params.mode, rng);
  const damaged = takeDamage(state, defender.id, report.damage, attacker.id);

  return {
    state: damaged.state,
    events: [
      evAttackResolved({
        attackerId: attacker.id,
        defenderId: defender.id,
        report,
        defenderWoundsAfter: damaged.woundsAfter,
      }),
      ...damaged.events,
    ],
    report,
  };
}
