// packages/rules/src/tests/helpers.ts

import assert from "assert";
import {
  ApplyResult,
  ArmySetup,
  GameAction,
  GameState,
  Phase,
  RNG,
  Rejection,
  RulesConfig,
  RulesContext,
  UnitState,
  Vec3,
  applyAction,
  createMatchState,
  makeRulesContext,
} from "../index";

// Dice stand-in: hands out the listed faces in order and fails loudly when it runs dry
export class ScriptedRNG implements RNG {
  private index = 0;

  constructor(private readonly faces: number[]) {}

  next(): number {
    const face = this.faces[this.index];
    if (face === undefined) {
      throw new Error(`scripted dice exhausted after ${this.index} rolls`);
    }
    this.index += 1;
    return (face - 0.5) / 6;
  }

  get consumed(): number {
    return this.index;
  }
}

export function at(x: number, z = 0): Vec3 {
  return { x, y: 0, z };
}

export function makeMatch(
  armies: ArmySetup,
  params: { dice?: number[]; config?: Partial<RulesConfig> } = {}
): { state: GameState; ctx: RulesContext; rng: ScriptedRNG } {
  const rng = new ScriptedRNG(params.dice ?? []);
  const ctx = makeRulesContext({ rng, config: params.config });
  return { state: createMatchState(armies, ctx.config), ctx, rng };
}

export function accept(
  state: GameState,
  action: GameAction,
  ctx: RulesContext
): ApplyResult {
  const result = applyAction(state, action, ctx);
  assert.equal(
    result.rejection,
    undefined,
    `${action.type} rejected: ${result.rejection?.reason ?? ""}`
  );
  return result;
}

export function refuse(
  state: GameState,
  action: GameAction,
  ctx: RulesContext
): Rejection {
  const result = applyAction(state, action, ctx);
  assert(result.rejection, `${action.type} should be rejected`);
  assert.strictEqual(result.state, state, "a rejection must not touch the state");
  assert.deepEqual(result.events, []);
  return result.rejection;
}

// Ends turns until P1 opens the given phase, or until fights are waiting to be picked
export function toPhase(state: GameState, ctx: RulesContext, phase: Phase): GameState {
  let current = state;
  for (let i = 0; i < 20; i += 1) {
    if (
      current.phase === phase &&
      (current.currentPlayer === "P1" || current.fight.stage !== "none")
    ) {
      return current;
    }
    current = accept(current, { type: "endTurn" }, ctx).state;
  }
  throw new Error(`never reached the ${phase} phase`);
}

export function patchUnit(
  state: GameState,
  unitId: number,
  patch: Partial<UnitState>
): GameState {
  const unit = state.units[unitId];
  assert(unit, `unit ${unitId} should exist`);
  return { ...state, units: { ...state.units, [unitId]: { ...unit, ...patch } } };
}

export function unitOf(state: GameState, unitId: number): UnitState {
  const unit = state.units[unitId];
  assert(unit, `unit ${unitId} should exist`);
  return unit;
}
