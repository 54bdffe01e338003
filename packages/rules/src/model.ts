// packages/rules/src/model.ts

export type PlayerId = "P1" | "P2";

// Phases of a round, in play order
export type Phase =
  | "movement"
  | "firstFire"
  | "charge"
  | "fight"
  | "advanceFire";

// Cosmetic grouping only, no rules attached
export type Faction = "ironbound" | "blightborn";

// World coordinates. y is the vertical axis.
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

// Full extents of a model's bounding box, centred on its position
export interface BaseSize {
  x: number;
  y: number;
  z: number;
}

export interface Weapon {
  id: string;
  name: string;
  /** World units. 0 means a melee weapon. */
  range: number;
  shots: number;
  /** 0 means the bearer's own strength is used */
  strength: number;
  /** Stored as 0 or a negative number */
  armourPiercing: number;
  damage: number;
}

export interface UnitStats {
  movementRange: number;
  initiative: number;
  ballisticSkill: number;
  weaponSkill: number;
  strength: number;
  toughness: number;
  armourSave: number;
  invulnerabilitySave: number;
  wounds: number;
  attacks: number;
}

// State of one combatant in the match
export interface UnitState extends UnitStats {
  id: number;
  owner: PlayerId;
  name: string;
  profileId: string;
  faction: Faction;
  size: BaseSize;
  maxWounds: number;

  position: Vec3;
  /** Snapshot taken at phase boundaries; net displacement is measured from here */
  startPosition: Vec3;
  /** Where the model stood before its first move this phase (presentation only) */
  moveMarker: Vec3 | null;

  remainingMovement: number;
  remainingMarch: number;

  hasMoved: boolean;
  hasMarched: boolean;
  hasCharged: boolean;
  hasFought: boolean;

  weapons: Weapon[];
}

export interface Selection {
  unitId: number;
  weaponId: string | null;
}

export type ChargeState =
  | { stage: "idle" }
  | { stage: "pendingTarget"; attackerId: number; maxRange: number }
  | {
      stage: "awaitingMovement";
      attackerId: number;
      targetId: number;
      roll: number;
      chargeDistance: number;
      minDistance: number;
    };

export type ChargeStage = ChargeState["stage"];

export interface Engagement {
  id: number;
  participantIds: number[];
}

export type FightStage =
  | "none"
  | "selectingFight"
  | "resolvingInitiativeRound"
  | "pileInMove"
  | "attacks";

export interface FighterActivation {
  fighterId: number;
  attacksRemaining: number;
  weaponId: string | null;
  /** Melee weapons already swung during this activation */
  usedWeaponIds: string[];
}

export interface FightState {
  stage: FightStage;
  engagements: Engagement[];
  selectedEngagementId: number | null;
  initiativeRound: number;
  activePlayer: PlayerId;
  activation: FighterActivation | null;
}

export type PointerHit =
  | { kind: "unit"; unitId: number; point: Vec3 }
  | { kind: "ground"; point: Vec3 };

export type RejectionCode =
  | "PhaseMismatch"
  | "IneligibleCombatant"
  | "OutOfRange"
  | "InvalidTarget"
  | "NoSelection"
  | "UnknownUnit";

export interface Rejection {
  code: RejectionCode;
  reason: string;
}

export interface AttackReport {
  weaponId: string;
  mode: "ranged" | "melee";
  skill: number;
  hitDice: number[];
  hits: number;
  strength: number;
  woundDice: number[];
  wounds: number;
  requiredSave: number;
  saveDice: number[];
  unsaved: number;
  damage: number;
}

export type GameEvent =
  | {
      type: "roundStarted";
      roundNumber: number;
    }
  | {
      type: "phaseStarted";
      phase: Phase;
      roundNumber: number;
    }
  | {
      type: "turnStarted";
      player: PlayerId;
      phase: Phase;
    }
  | {
      type: "unitSelected";
      unitId: number;
    }
  | {
      type: "selectionCleared";
    }
  | {
      type: "unitMoved";
      unitId: number;
      from: Vec3;
      to: Vec3;
      distance: number;
      marched: boolean;
    }
  | {
      type: "weaponSelected";
      unitId: number;
      weaponId: string;
    }
  | {
      type: "attackResolved";
      attackerId: number;
      defenderId: number;
      report: AttackReport;
      defenderWoundsAfter: number;
    }
  | {
      type: "unitDestroyed";
      unitId: number;
      killerId: number | null;
    }
  | {
      type: "chargeDeclared";
      attackerId: number;
      targetId: number;
      maxRange: number;
      minDistance: number;
    }
  | {
      type: "chargeRolled";
      attackerId: number;
      roll: number;
      chargeDistance: number;
    }
  | {
      type: "chargeFailed";
      attackerId: number;
      targetId: number;
      surgeDistance: number;
      to: Vec3;
    }
  | {
      type: "chargeSucceeded";
      attackerId: number;
      targetId: number;
      chargeDistance: number;
    }
  | {
      type: "chargeCompleted";
      attackerId: number;
      targetId: number;
      to: Vec3;
      direct: boolean;
    }
  | {
      type: "chargeCancelled";
      attackerId: number;
    }
  | {
      type: "engagementsFound";
      engagements: Engagement[];
    }
  | {
      type: "fightSelected";
      engagementId: number;
    }
  | {
      type: "fightDeselected";
    }
  | {
      type: "initiativeRoundStarted";
      engagementId: number;
      initiativeRound: number;
      eligibleIds: number[];
    }
  | {
      type: "fighterActivated";
      unitId: number;
      player: PlayerId;
      attackAllowance: number;
    }
  | {
      type: "fighterDeactivated";
      unitId: number;
    }
  | {
      type: "pileInMoved";
      unitId: number;
      from: Vec3;
      to: Vec3;
    }
  | {
      type: "pileInDeclined";
      unitId: number;
    }
  | {
      type: "activationEnded";
      unitId: number;
    }
  | {
      type: "fightResolved";
      engagementId: number;
    }
  | {
      type: "fightPhaseEnded";
    };

export type GameAction =
  | {
      type: "selectUnit";
      unitId: number;
    }
  | {
      type: "move";
      unitId: number;
      to: Vec3;
    }
  | {
      type: "selectWeapon";
      unitId: number;
      weaponId: string;
    }
  | {
      type: "selectAttackTarget";
      targetId: number;
    }
  | {
      type: "selectChargeTarget";
      unitId: number;
      targetId: number;
    }
  | {
      type: "chargeMove";
      hit: PointerHit;
    }
  | {
      type: "selectFight";
      unitId: number;
    }
  | {
      type: "resolveFight";
    }
  | {
      type: "selectFighter";
      unitId: number;
    }
  | {
      type: "confirmPileInMove";
      to: Vec3 | null;
    }
  | {
      type: "endActivation";
    }
  | {
      type: "deselect";
    }
  | {
      type: "endTurn";
    };

// Result of applying one action
export interface ApplyResult {
  state: GameState;
  events: GameEvent[];
  rejection?: Rejection;
}

export type CommandOutcome =
  | { ok: true; events: GameEvent[] }
  | { ok: false; rejection: Rejection };

// Whole match state
export interface GameState {
  roundNumber: number;
  phase: Phase;
  currentPlayer: PlayerId;

  /** Next free unit id; ids are never reused within a match */
  nextUnitId: number;
  units: Record<number, UnitState>;
  rosters: Record<PlayerId, number[]>;

  selection: Selection | null;
  charge: ChargeState;
  fight: FightState;

  /** Ranged weapons fired this round */
  usedWeaponIds: string[];
}

export function otherPlayer(player: PlayerId): PlayerId {
  return player === "P1" ? "P2" : "P1";
}

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}
