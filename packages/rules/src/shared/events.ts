import type { AttackReport, GameEvent, Phase, PlayerId, Vec3 } from "../model";

type RoundStartedEvent = Extract<GameEvent, { type: "roundStarted" }>;
type PhaseStartedEvent = Extract<GameEvent, { type: "phaseStarted" }>;
type TurnStartedEvent = Extract<GameEvent, { type: "turnStarted" }>;
type UnitMovedEvent = Extract<GameEvent, { type: "unitMoved" }>;
type AttackResolvedEvent = Extract<GameEvent, { type: "attackResolved" }>;
type UnitDestroyedEvent = Extract<GameEvent, { type: "unitDestroyed" }>;
type InitiativeRoundStartedEvent = Extract<
  GameEvent,
  { type: "initiativeRoundStarted" }
>;
type ActivationEndedEvent = Extract<GameEvent, { type: "activationEnded" }>;

export function evRoundStarted(roundNumber: number): RoundStartedEvent {
  return { type: "roundStarted", roundNumber };
}

export function evPhaseStarted(params: {
  phase: Phase;
  roundNumber: number;
}): PhaseStartedEvent {
  return {
    type: "phaseStarted",
    phase: params.phase,
    roundNumber: params.roundNumber,
  };
}

export function evTurnStarted(params: {
  player: PlayerId;
  phase: Phase;
}): TurnStartedEvent {
  return { type: "turnStarted", player: params.player, phase: params.phase };
}

export function evUnitMoved(params: {
  unitId: number;
  from: Vec3;
  to: Vec3;
  distance: number;
  marched: boolean;
}): UnitMovedEvent {
  return {
    type: "unitMoved",
    unitId: params.unitId,
    from: params.from,
    to: params.to,
    distance: params.distance,
    marched: params.marched,
  };
}

export function evAttackResolved(params: {
  attackerId: number;
  defenderId: number;
  report: AttackReport;
  defenderWoundsAfter: number;
}): AttackResolvedEvent {
  return {
    type: "attackResolved",
    attackerId: params.attackerId,
    defenderId: params.defenderId,
    report: params.report,
    defenderWoundsAfter: params.defenderWoundsAfter,
  };
}

export function evUnitDestroyed(params: {
  unitId: number;
  killerId: number | null;
}): UnitDestroyedEvent {
  return {
    type: "unitDestroyed",
    unitId: params.unitId,
    killerId: params.killerId,
  };
}

export function evInitiativeRoundStarted(params: {
  engagementId: number;
  initiativeRound: number;
  eligibleIds: number[];
}): InitiativeRoundStartedEvent {
  return {
    type: "initiativeRoundStarted",
    engagementId: params.engagementId,
    initiativeRound: params.initiativeRound,
    eligibleIds: params.eligibleIds,
  };
}

export function evActivationEnded(unitId: number): ActivationEndedEvent {
  return { type: "activationEnded", unitId };
}
