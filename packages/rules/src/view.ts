// packages/rules/src/view.ts

import type { RulesContext } from "./context";
import {
  eligibleFighters,
  enemiesInContact,
  getSelectedEngagement,
} from "./fight";
import {
  ChargeState,
  FightState,
  GameState,
  Phase,
  PlayerId,
  Selection,
  UnitState,
} from "./model";
import { isShootingPhase } from "./phases";
import { listUnits } from "./shared/stateUtils";
import { canShoot } from "./shooting";

export interface UnitView extends UnitState {
  /** Attacks left in the current fight activation, null when not activated */
  attacksRemaining: number | null;
}

export interface LegalView {
  shooterIds: number[];
  chargerIds: number[];
  fighterIds: number[];
  meleeTargetIds: number[];
}

export interface MatchView {
  roundNumber: number;
  phase: Phase;
  currentPlayer: PlayerId;
  /** Seat whose input the rules are waiting for */
  awaitingPlayer: PlayerId;
  units: UnitView[];
  selection: Selection | null;
  charge: ChargeState;
  fight: FightState;
  usedWeaponIds: string[];
  legal: LegalView;
}

// Fight activations belong to the fight's active player, everything else to the turn owner
export function awaitingPlayer(state: GameState): PlayerId {
  if (state.phase !== "fight") return state.currentPlayer;
  switch (state.fight.stage) {
    case "resolvingInitiativeRound":
    case "pileInMove":
    case "attacks":
      return state.fight.activePlayer;
    default:
      return state.currentPlayer;
  }
}

function cloneUnit(unit: UnitState): UnitState {
  return {
    ...unit,
    size: { ...unit.size },
    position: { ...unit.position },
    startPosition: { ...unit.startPosition },
    moveMarker: unit.moveMarker ? { ...unit.moveMarker } : null,
    weapons: unit.weapons.map((w) => ({ ...w })),
  };
}

function legalFor(state: GameState, ctx: RulesContext): LegalView {
  const own = listUnits(state).filter((u) => u.owner === state.currentPlayer);
  const legal: LegalView = {
    shooterIds: [],
    chargerIds: [],
    fighterIds: [],
    meleeTargetIds: [],
  };

  if (isShootingPhase(state.phase)) {
    legal.shooterIds = own.filter((u) => canShoot(u, state.phase)).map((u) => u.id);
  }
  if (state.phase === "charge") {
    legal.chargerIds = own
      .filter((u) => !u.hasMarched && !u.hasCharged)
      .map((u) => u.id);
  }

  const engagement = getSelectedEngagement(state);
  if (state.phase === "fight" && engagement) {
    if (state.fight.stage === "resolvingInitiativeRound") {
      legal.fighterIds = eligibleFighters(
        state,
        engagement,
        state.fight.initiativeRound,
        ctx.config.maxInitiative
      )
        .filter((u) => u.owner === state.fight.activePlayer)
        .map((u) => u.id);
    }
    const activation = state.fight.activation;
    const fighter = activation ? state.units[activation.fighterId] : undefined;
    if (state.fight.stage === "attacks" && fighter) {
      legal.meleeTargetIds = enemiesInContact(ctx, state, engagement, fighter).map(
        (u) => u.id
      );
    }
  }

  return legal;
}

/**
 * Read-only snapshot for presentation: deep copies, so nothing handed out
 * can reach back into the match state.
 */
export function makeMatchView(state: GameState, ctx: RulesContext): MatchView {
  const activation = state.fight.activation;
  const units = listUnits(state).map((unit) => ({
    ...cloneUnit(unit),
    attacksRemaining:
      activation && activation.fighterId === unit.id
        ? activation.attacksRemaining
        : null,
  }));

  return {
    roundNumber: state.roundNumber,
    phase: state.phase,
    currentPlayer: state.currentPlayer,
    awaitingPlayer: awaitingPlayer(state),
    units,
    selection: state.selection ? { ...state.selection } : null,
    charge: { ...state.charge },
    fight: {
      ...state.fight,
      engagements: state.fight.engagements.map((e) => ({
        ...e,
        participantIds: [...e.participantIds],
      })),
      activation: activation
        ? { ...activation, usedWeaponIds: [...activation.usedWeaponIds] }
        : null,
    },
    usedWeaponIds: [...state.usedWeaponIds],
    legal: legalFor(state, ctx),
  };
}
