// packages/rules/src/units.ts

import { RulesConfig, RulesConfigError, toWorld } from "./config";
import { BaseSize, Faction, PlayerId, UnitState, UnitStats, Vec3, Weapon } from "./model";

// Weapon as printed on a datasheet, range in inches
export interface WeaponProfile {
  name: string;
  range: number;
  shots: number;
  strength: number;
  armourPiercing: number;
  damage: number;
}

export interface UnitProfile {
  id: string;
  name: string;
  faction: Faction;
  stats: UnitStats;
  size: BaseSize;
  weapons: WeaponProfile[];
}

const INFANTRY: BaseSize = { x: 20, y: 20, z: 20 };
const LARGE: BaseSize = { x: 40, y: 30, z: 40 };

// A save of 7 can never be made on a d6
export const UNIT_PROFILES: Record<string, UnitProfile> = {
  ranger: {
    id: "ranger",
    name: "Ranger",
    faction: "ironbound",
    stats: {
      movementRange: 6,
      initiative: 3,
      ballisticSkill: 4,
      weaponSkill: 4,
      strength: 3,
      toughness: 3,
      armourSave: 4,
      invulnerabilitySave: 7,
      wounds: 1,
      attacks: 1,
    },
    size: INFANTRY,
    weapons: [
      { name: "Galvanic rifle", range: 30, shots: 1, strength: 4, armourPiercing: -1, damage: 1 },
      { name: "Combat knife", range: 0, shots: 1, strength: 0, armourPiercing: 0, damage: 1 },
    ],
  },
  vanguard: {
    id: "vanguard",
    name: "Vanguard",
    faction: "ironbound",
    stats: {
      movementRange: 6,
      initiative: 4,
      ballisticSkill: 4,
      weaponSkill: 3,
      strength: 4,
      toughness: 3,
      armourSave: 4,
      invulnerabilitySave: 6,
      wounds: 1,
      attacks: 2,
    },
    size: INFANTRY,
    weapons: [
      { name: "Radium carbine", range: 18, shots: 3, strength: 3, armourPiercing: 0, damage: 1 },
      { name: "Taser goad", range: 0, shots: 1, strength: 5, armourPiercing: -1, damage: 1 },
    ],
  },
  destroyer: {
    id: "destroyer",
    name: "Destroyer",
    faction: "ironbound",
    stats: {
      movementRange: 5,
      initiative: 2,
      ballisticSkill: 3,
      weaponSkill: 4,
      strength: 5,
      toughness: 5,
      armourSave: 3,
      invulnerabilitySave: 5,
      wounds: 3,
      attacks: 2,
    },
    size: LARGE,
    weapons: [
      { name: "Heavy arc cannon", range: 36, shots: 2, strength: 6, armourPiercing: -2, damage: 2 },
      { name: "Power claw", range: 0, shots: 1, strength: 8, armourPiercing: -3, damage: 2 },
      { name: "Servo arm", range: 0, shots: 1, strength: 6, armourPiercing: -1, damage: 1 },
    ],
  },
  plagueMarine: {
    id: "plagueMarine",
    name: "Plague Marine",
    faction: "blightborn",
    stats: {
      movementRange: 5,
      initiative: 3,
      ballisticSkill: 3,
      weaponSkill: 3,
      strength: 4,
      toughness: 5,
      armourSave: 3,
      invulnerabilitySave: 7,
      wounds: 2,
      attacks: 1,
    },
    size: INFANTRY,
    weapons: [
      { name: "Boltgun", range: 24, shots: 2, strength: 4, armourPiercing: 0, damage: 1 },
      { name: "Plague knife", range: 0, shots: 1, strength: 0, armourPiercing: 0, damage: 1 },
    ],
  },
  blightChampion: {
    id: "blightChampion",
    name: "Blight Champion",
    faction: "blightborn",
    stats: {
      movementRange: 5,
      initiative: 4,
      ballisticSkill: 3,
      weaponSkill: 2,
      strength: 5,
      toughness: 5,
      armourSave: 3,
      invulnerabilitySave: 4,
      wounds: 4,
      attacks: 3,
    },
    size: INFANTRY,
    weapons: [
      { name: "Bolt pistol", range: 12, shots: 1, strength: 4, armourPiercing: 0, damage: 1 },
      { name: "Plague sword", range: 0, shots: 1, strength: 5, armourPiercing: -2, damage: 2 },
      { name: "Bile flail", range: 0, shots: 1, strength: 6, armourPiercing: -1, damage: 1 },
    ],
  },
  poxwalker: {
    id: "poxwalker",
    name: "Poxwalker",
    faction: "blightborn",
    stats: {
      movementRange: 4,
      initiative: 1,
      ballisticSkill: 6,
      weaponSkill: 5,
      strength: 3,
      toughness: 3,
      armourSave: 7,
      invulnerabilitySave: 7,
      wounds: 1,
      attacks: 2,
    },
    size: INFANTRY,
    weapons: [
      { name: "Improvised weapon", range: 0, shots: 1, strength: 0, armourPiercing: 0, damage: 1 },
    ],
  },
};

export function getUnitProfile(profileId: string): UnitProfile | undefined {
  return UNIT_PROFILES[profileId];
}

function validateProfile(profile: UnitProfile, config: RulesConfig) {
  const { stats } = profile;
  if (stats.wounds <= 0) {
    throw new RulesConfigError(`${profile.id}: wounds must be > 0`);
  }
  if (
    !Number.isInteger(stats.initiative) ||
    stats.initiative < 1 ||
    stats.initiative > config.maxInitiative
  ) {
    throw new RulesConfigError(
      `${profile.id}: initiative must be within 1..${config.maxInitiative}`
    );
  }
  if (stats.movementRange < 0 || stats.attacks < 0) {
    throw new RulesConfigError(`${profile.id}: negative movement or attacks`);
  }
  for (const w of profile.weapons) {
    if (w.range < 0 || w.shots < 1 || w.damage < 0 || w.armourPiercing > 0) {
      throw new RulesConfigError(`${profile.id}: invalid weapon ${w.name}`);
    }
  }
}

export function makeWeapon(
  unitId: number,
  index: number,
  profile: WeaponProfile,
  config: RulesConfig
): Weapon {
  return {
    id: `u${unitId}-w${index}`,
    name: profile.name,
    range: toWorld(config, profile.range),
    shots: profile.shots,
    strength: profile.strength,
    armourPiercing: profile.armourPiercing,
    damage: profile.damage,
  };
}

export function movementAllowance(unit: UnitStats, config: RulesConfig): number {
  return toWorld(config, unit.movementRange);
}

export function marchAllowance(unit: UnitStats, config: RulesConfig): number {
  return toWorld(config, unit.movementRange + unit.initiative);
}

export function createUnit(
  profile: UnitProfile,
  params: { id: number; owner: PlayerId; position: Vec3 },
  config: RulesConfig
): UnitState {
  validateProfile(profile, config);
  return {
    ...profile.stats,
    id: params.id,
    owner: params.owner,
    name: profile.name,
    profileId: profile.id,
    faction: profile.faction,
    size: { ...profile.size },
    maxWounds: profile.stats.wounds,
    position: { ...params.position },
    startPosition: { ...params.position },
    moveMarker: null,
    remainingMovement: movementAllowance(profile.stats, config),
    remainingMarch: marchAllowance(profile.stats, config),
    hasMoved: false,
    hasMarched: false,
    hasCharged: false,
    hasFought: false,
    weapons: profile.weapons.map((w, i) => makeWeapon(params.id, i, w, config)),
  };
}

export function rangedWeapons(unit: UnitState): Weapon[] {
  return unit.weapons.filter((w) => w.range > 0);
}

export function meleeWeapons(unit: UnitState): Weapon[] {
  return unit.weapons.filter((w) => w.range === 0);
}

export function findWeapon(unit: UnitState, weaponId: string): Weapon | undefined {
  return unit.weapons.find((w) => w.id === weaponId);
}
