// packages/server/src/store.ts

import {
  ArmySetup,
  GameAction,
  GameEvent,
  MatchSession,
  Phase,
  PlayerId,
  RulesConfig,
  SeededRNG,
  unitsOf,
} from "@skirmish/rules";
import { randomUUID } from "node:crypto";
import { CommandResult, accepted, rejected } from "./commandResult";

export interface ActionLogEntry {
  at: number;
  playerId?: PlayerId;
  action: GameAction;
  events: GameEvent[];
}

export interface MatchRoom {
  id: string;
  seed: number;
  session: MatchSession;
  actionLog: ActionLogEntry[];
  createdAt: number;
}

export interface CreateMatchOptions {
  seed?: number;
  armies?: ArmySetup;
  config?: Partial<RulesConfig>;
}

export interface MatchSummary {
  id: string;
  createdAt: number;
  roundNumber: number;
  phase: Phase;
  currentPlayer: PlayerId;
  units: { P1: number; P2: number };
}

// In-memory only; matches live as long as the process
const matches = new Map<string, MatchRoom>();

function nextSeed(): number {
  return Math.floor(Math.random() * 1_000_000_000) + 1;
}

export function createMatchRoomWithId(
  id: string,
  options: CreateMatchOptions = {}
): MatchRoom {
  const seed = options.seed ?? nextSeed();
  const session = new MatchSession({
    rng: new SeededRNG(seed),
    armies: options.armies,
    config: options.config,
  });

  const room: MatchRoom = {
    id,
    seed,
    session,
    actionLog: [],
    createdAt: Date.now(),
  };

  matches.set(room.id, room);
  return room;
}

export function createMatchRoom(options: CreateMatchOptions = {}): MatchRoom {
  return createMatchRoomWithId(randomUUID(), options);
}

export function getMatchRoom(id: string): MatchRoom | undefined {
  return matches.get(id);
}

export function listMatchRooms(): MatchRoom[] {
  return Array.from(matches.values());
}

export function listMatchSummaries(): MatchSummary[] {
  return listMatchRooms().map((room) => {
    const state = room.session.state;
    return {
      id: room.id,
      createdAt: room.createdAt,
      roundNumber: state.roundNumber,
      phase: state.phase,
      currentPlayer: state.currentPlayer,
      units: {
        P1: unitsOf(state, "P1").length,
        P2: unitsOf(state, "P2").length,
      },
    };
  });
}

// Accepted actions are logged so a match can be replayed from its seed
export function applyMatchAction(
  room: MatchRoom,
  action: GameAction,
  playerId?: PlayerId
): CommandResult {
  const outcome = room.session.dispatch(action);
  if (!outcome.ok) {
    return rejected("RULES_REJECTED", outcome.rejection.reason, outcome.rejection.code);
  }

  room.actionLog.push({
    at: Date.now(),
    playerId,
    action,
    events: outcome.events,
  });

  return accepted({
    events: outcome.events,
    logIndex: room.actionLog.length - 1,
  });
}

export function clearMatchesForTests() {
  matches.clear();
}
