// packages/rules/src/tests/movement.test.ts

import assert from "assert";
import { test } from "node:test";
import { ArmySetup } from "../index";
import { accept, at, makeMatch, refuse, toPhase, unitOf } from "./helpers";

const ARMIES: ArmySetup = {
  P1: [{ profileId: "ranger", position: at(0) }],
  P2: [{ profileId: "poxwalker", position: at(0, 300) }],
};

test("move_within_movement_allowance", () => {
  const { state, ctx } = makeMatch(ARMIES);
  const result = accept(state, { type: "move", unitId: 1, to: at(59) }, ctx);
  const ranger = unitOf(result.state, 1);

  assert.deepEqual(ranger.position, at(59));
  assert.equal(ranger.hasMoved, true);
  assert.equal(ranger.hasMarched, false);
  assert.equal(ranger.remainingMovement, 1);
  assert.equal(ranger.remainingMarch, 31);
  assert.deepEqual(ranger.moveMarker, at(0));
  assert.deepEqual(result.state.selection, { unitId: 1, weaponId: null });
  assert.deepEqual(result.events, [
    { type: "unitMoved", unitId: 1, from: at(0), to: at(59), distance: 59, marched: false },
  ]);
});

test("move_beyond_movement_marches", () => {
  const { state, ctx } = makeMatch(ARMIES);
  const ranger = unitOf(accept(state, { type: "move", unitId: 1, to: at(89) }, ctx).state, 1);

  assert.equal(ranger.hasMoved, true);
  assert.equal(ranger.hasMarched, true);
  assert.equal(ranger.remainingMovement, 0);
  assert.equal(ranger.remainingMarch, 1);
});

test("move_beyond_march_is_rejected", () => {
  const { state, ctx } = makeMatch(ARMIES);
  const rejection = refuse(state, { type: "move", unitId: 1, to: at(91) }, ctx);
  assert.deepEqual(rejection, {
    code: "OutOfRange",
    reason: "outside movement/march range",
  });
});

test("move_back_to_start_restores_allowance", () => {
  const { state, ctx } = makeMatch(ARMIES);
  const marched = accept(state, { type: "move", unitId: 1, to: at(89) }, ctx).state;
  const back = unitOf(accept(marched, { type: "move", unitId: 1, to: at(0) }, ctx).state, 1);

  assert.equal(back.hasMoved, false);
  assert.equal(back.hasMarched, false);
  assert.equal(back.remainingMovement, 60);
  assert.equal(back.remainingMarch, 90);
  assert.deepEqual(back.moveMarker, at(0));
});

test("move_measures_on_ground_plane_and_keeps_height", () => {
  const { state, ctx } = makeMatch(ARMIES);
  const result = accept(
    state,
    { type: "move", unitId: 1, to: { x: 30, y: 50, z: 40 } },
    ctx
  );
  const ranger = unitOf(result.state, 1);

  assert.deepEqual(ranger.position, { x: 30, y: 0, z: 40 });
  assert.equal(ranger.remainingMovement, 10);
});

test("move_rejections_by_phase_owner_and_id", () => {
  const { state, ctx } = makeMatch(ARMIES);

  assert.equal(refuse(state, { type: "move", unitId: 2, to: at(0, 290) }, ctx).code, "PhaseMismatch");
  assert.equal(refuse(state, { type: "move", unitId: 99, to: at(0) }, ctx).code, "UnknownUnit");

  const firstFire = toPhase(state, ctx, "firstFire");
  assert.equal(
    refuse(firstFire, { type: "move", unitId: 1, to: at(10) }, ctx).code,
    "PhaseMismatch"
  );
});

test("move_marker_clears_when_turn_ends", () => {
  const { state, ctx } = makeMatch(ARMIES);
  const moved = accept(state, { type: "move", unitId: 1, to: at(20) }, ctx).state;
  const handedOver = accept(moved, { type: "endTurn" }, ctx).state;

  assert.equal(handedOver.currentPlayer, "P2");
  assert.equal(unitOf(handedOver, 1).moveMarker, null);
  assert.equal(unitOf(handedOver, 1).hasMoved, true);
});
