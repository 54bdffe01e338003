// packages/server/src/tests/routes.test.ts

import assert from "assert";
import { after, before, test } from "node:test";
import type { FastifyInstance } from "fastify";
import type { GameEvent, MatchView } from "@skirmish/rules";
import { buildServer } from "../index";

let server: FastifyInstance;

before(async () => {
  server = await buildServer({
    port: 0,
    host: "127.0.0.1",
    logLevel: "silent",
    matchDebug: false,
    rules: {},
  });
});

after(async () => {
  await server.close();
});

const ARMIES = {
  P1: [{ profileId: "ranger", position: { x: 0, y: 0, z: 0 } }],
  P2: [{ profileId: "poxwalker", position: { x: 0, y: 0, z: 300 } }],
};

async function createMatch(): Promise<string> {
  const response = await server.inject({
    method: "POST",
    url: "/api/matches",
    payload: { seed: 42, armies: ARMIES },
  });
  assert.equal(response.statusCode, 200);
  return response.json<{ matchId: string }>().matchId;
}

function act(matchId: string, playerId: string, payload: object) {
  return server.inject({
    method: "POST",
    url: `/api/matches/${matchId}/actions?playerId=${playerId}`,
    payload,
  });
}

test("health_endpoints", async () => {
  const health = await server.inject({ method: "GET", url: "/health" });
  assert.equal(health.statusCode, 200);
  assert.deepEqual(health.json(), { ok: true });

  const units = await server.inject({ method: "GET", url: "/api/units" });
  assert.equal(units.json<unknown[]>().length, 6);
});

test("create_match_returns_view", async () => {
  const response = await server.inject({
    method: "POST",
    url: "/api/matches",
    payload: { seed: 42, armies: ARMIES },
  });
  const body = response.json<{ matchId: string; seed: number; view: MatchView }>();

  assert.equal(body.seed, 42);
  assert.equal(body.view.phase, "movement");
  assert.equal(body.view.awaitingPlayer, "P1");
  assert.deepEqual(
    body.view.units.map((u) => u.profileId),
    ["ranger", "poxwalker"]
  );

  const fetched = await server.inject({ method: "GET", url: `/api/matches/${body.matchId}` });
  assert.equal(fetched.statusCode, 200);
});

test("create_match_rejects_unknown_profile", async () => {
  const response = await server.inject({
    method: "POST",
    url: "/api/matches",
    payload: { armies: { P1: [{ profileId: "dragon", position: { x: 0, y: 0, z: 0 } }], P2: [] } },
  });
  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    error: "unknown unit profile dragon",
    code: "BAD_REQUEST",
  });
});

test("actions_are_checked_then_applied", async () => {
  const matchId = await createMatch();

  const wrongSeat = await act(matchId, "P2", { type: "endTurn" });
  assert.equal(wrongSeat.statusCode, 403);

  const malformed = await act(matchId, "P1", { type: "move", unitId: "one" });
  assert.equal(malformed.statusCode, 400);

  assert.equal(malformed.json<{ code: string }>().code, "BAD_REQUEST");

  const missingSeat = await act(matchId, "P3", { type: "endTurn" });
  assert.equal(missingSeat.statusCode, 400);
  assert.deepEqual(missingSeat.json(), {
    error: "playerId query is required",
    code: "BAD_REQUEST",
  });

  const tooFar = await act(matchId, "P1", {
    type: "move",
    unitId: 1,
    to: { x: 500, y: 0, z: 0 },
  });
  assert.equal(tooFar.statusCode, 409);
  assert.deepEqual(tooFar.json(), {
    error: "outside movement/march range",
    code: "OutOfRange",
  });

  const moved = await act(matchId, "P1", {
    type: "move",
    unitId: 1,
    to: { x: 30, y: 0, z: 0 },
  });
  assert.equal(moved.statusCode, 200);
  const body = moved.json<{ events: GameEvent[]; logIndex: number; view: MatchView }>();
  assert.equal(body.logIndex, 0);
  assert.deepEqual(body.events.map((e) => e.type), ["unitMoved"]);
  assert.deepEqual(body.view.units[0].position, { x: 30, y: 0, z: 0 });

  const log = await server.inject({ method: "GET", url: `/api/matches/${matchId}/log` });
  const entries = log.json<{ log: { playerId: string; action: { type: string } }[] }>().log;
  assert.equal(entries.length, 1);
  assert.equal(entries[0].playerId, "P1");
  assert.equal(entries[0].action.type, "move");
});

test("unknown_match_is_404", async () => {
  const view = await server.inject({ method: "GET", url: "/api/matches/nope" });
  assert.equal(view.statusCode, 404);

  const action = await act("nope", "P1", { type: "endTurn" });
  assert.equal(action.statusCode, 404);
});

test("match_summaries_list_created_matches", async () => {
  const matchId = await createMatch();
  const response = await server.inject({ method: "GET", url: "/api/matches" });
  const summaries = response.json<{ id: string; units: { P1: number; P2: number } }[]>();
  const summary = summaries.find((s) => s.id === matchId);

  assert(summary, "created match should be listed");
  assert.deepEqual(summary.units, { P1: 1, P2: 1 });
});
