// packages/rules/src/phases.ts

import type { RulesContext } from "./context";
import { beginFightPhase, makeIdleFightState } from "./fight";
import { ApplyResult, GameEvent, GameState, Phase } from "./model";
import { resetUnitForRound, snapshotStartPosition } from "./movement";
import { evPhaseStarted, evRoundStarted, evTurnStarted } from "./shared/events";
import { mapUnits, reject } from "./shared/stateUtils";

export const PHASE_ORDER: readonly Phase[] = [
  "movement",
  "firstFire",
  "charge",
  "fight",
  "advanceFire",
];

export function nextPhase(phase: Phase): Phase | null {
  const idx = PHASE_ORDER.indexOf(phase);
  return idx < PHASE_ORDER.length - 1 ? PHASE_ORDER[idx + 1] : null;
}

export function isShootingPhase(phase: Phase): boolean {
  return phase === "firstFire" || phase === "advanceFire";
}

// Selections and half-finished charges never survive a phase change
function clearTransient(state: GameState): GameState {
  return {
    ...state,
    selection: null,
    charge: { stage: "idle" },
    currentPlayer: "P1",
  };
}

function endRound(state: GameState, ctx: RulesContext): ApplyResult {
  const roundNumber = state.roundNumber + 1;
  let next = clearTransient(state);
  next = mapUnits(next, (u) => resetUnitForRound(u, ctx.config));
  next = {
    ...next,
    roundNumber,
    phase: "movement",
    usedWeaponIds: [],
    fight: makeIdleFightState(),
  };
  return {
    state: next,
    events: [
      evRoundStarted(roundNumber),
      evPhaseStarted({ phase: "movement", roundNumber }),
      evTurnStarted({ player: "P1", phase: "movement" }),
    ],
  };
}

/**
 * Moves to the next phase, or wraps into a new round after AdvanceFire.
 * Charge entry re-snapshots start positions; Fight entry discovers
 * engagements and falls straight through when there are none.
 */
export function advancePhase(state: GameState, ctx: RulesContext): ApplyResult {
  const phase = nextPhase(state.phase);
  if (phase === null) {
    return endRound(state, ctx);
  }

  let next: GameState = { ...clearTransient(state), phase };
  const events: GameEvent[] = [
    evPhaseStarted({ phase, roundNumber: next.roundNumber }),
  ];

  if (phase === "charge") {
    next = mapUnits(next, snapshotStartPosition);
  }

  if (phase === "fight") {
    const begun = beginFightPhase(next, ctx);
    next = begun.state;
    events.push(...begun.events);
    if (next.fight.stage === "none") {
      events.push({ type: "fightPhaseEnded" });
      const after = advancePhase(next, ctx);
      return { state: after.state, events: [...events, ...after.events] };
    }
  }

  events.push(evTurnStarted({ player: next.currentPlayer, phase }));
  return { state: next, events };
}

// Fight phase hands control back here once every engagement is resolved
export function endFightPhase(state: GameState, ctx: RulesContext): ApplyResult {
  const closed: GameState = { ...state, fight: makeIdleFightState() };
  const after = advancePhase(closed, ctx);
  return {
    state: after.state,
    events: [{ type: "fightPhaseEnded" }, ...after.events],
  };
}

/**
 * End of a player's turn. P1 hands over to P2; after P2 the phase advances
 * and P1 starts it.
 */
export function advanceTurn(state: GameState, ctx: RulesContext): ApplyResult {
  if (state.charge.stage === "awaitingMovement") {
    return reject(
      state,
      "PhaseMismatch",
      "finish the charge move before ending the turn"
    );
  }
  if (state.phase === "fight" && state.fight.stage !== "none") {
    return reject(
      state,
      "PhaseMismatch",
      "the fight phase ends when every fight is resolved"
    );
  }

  const withoutMarkers = mapUnits(state, (u) =>
    u.moveMarker ? { ...u, moveMarker: null } : u
  );

  if (state.currentPlayer === "P1") {
    const next: GameState = {
      ...withoutMarkers,
      currentPlayer: "P2",
      selection: null,
      charge: { stage: "idle" },
    };
    return {
      state: next,
      events: [evTurnStarted({ player: "P2", phase: state.phase })],
    };
  }

  return advancePhase(withoutMarkers, ctx);
}
