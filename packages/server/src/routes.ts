// packages/server/src/routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { GameAction, PlayerId, RulesConfigError, UNIT_PROFILES } from "@skirmish/rules";
import { z } from "zod";
import { CommandRejected, httpStatusFor, rejected } from "./commandResult";
import type { ServerConfig } from "./config";
import { logMatch, logMatchEvents } from "./matchLogger";
import { MATCH_CREATE_KEY, enqueueMatchCommand, matchQueueKey } from "./matchQueue";
import { isActionAllowedByPlayer } from "./permissions";
import { CreateMatchBodySchema, GameActionSchema, PlayerIdSchema } from "./schemas";
import {
  MatchRoom,
  applyMatchAction,
  createMatchRoom,
  getMatchRoom,
  listMatchSummaries,
} from "./store";

function parsePlayerId(request: FastifyRequest): PlayerId | null {
  const query = z.object({ playerId: z.string().optional() }).safeParse(request.query);
  if (!query.success) return null;
  const parsed = PlayerIdSchema.safeParse(query.data.playerId);
  return parsed.success ? parsed.data : null;
}

function parseMatchId(request: FastifyRequest): string {
  const params = z.object({ id: z.string() }).safeParse(request.params);
  return params.success ? params.data.id : "";
}

function sendRejected(reply: FastifyReply, result: CommandRejected, details?: unknown) {
  return reply.code(httpStatusFor(result)).send({
    error: result.message ?? "Action rejected",
    code: result.rulesCode ?? result.code,
    ...(details === undefined ? {} : { details }),
  });
}

function sendValidationError(reply: FastifyReply, error: z.ZodError) {
  return sendRejected(reply, rejected("BAD_REQUEST", "Invalid request"), error.flatten());
}

function matchPayload(room: MatchRoom) {
  return { matchId: room.id, seed: room.seed, view: room.session.view() };
}

export async function registerRoutes(server: FastifyInstance, config: ServerConfig) {
  server.get("/", async () => ({
    name: "skirmish-server",
    version: process.env.npm_package_version ?? "unknown",
  }));

  server.get("/health", async () => ({ ok: true }));

  server.get("/api/health", async () => ({ ok: true }));

  server.get("/api/units", async () => Object.values(UNIT_PROFILES));

  server.get("/api/matches", async () => listMatchSummaries());

  server.post("/api/matches", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = CreateMatchBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const body = parsed.data;
    try {
      const room = await enqueueMatchCommand(MATCH_CREATE_KEY, () =>
        createMatchRoom({
          seed: body.seed,
          armies: body.armies,
          config: { ...config.rules, ...body.config },
        })
      );
      logMatch(request.log, { tag: "match:create", matchId: room.id, seed: room.seed });
      return reply.send(matchPayload(room));
    } catch (err) {
      if (err instanceof RulesConfigError) {
        return sendRejected(reply, rejected("BAD_REQUEST", err.message));
      }
      throw err;
    }
  });

  server.get("/api/matches/:id", async (request: FastifyRequest, reply: FastifyReply) => {
    const room = getMatchRoom(parseMatchId(request));
    if (!room) {
      return reply.code(404).send({ error: "Match not found" });
    }
    return reply.send(matchPayload(room));
  });

  server.get("/api/matches/:id/log", async (request: FastifyRequest, reply: FastifyReply) => {
    const room = getMatchRoom(parseMatchId(request));
    if (!room) {
      return reply.code(404).send({ error: "Match not found" });
    }
    return reply.send({ matchId: room.id, seed: room.seed, log: room.actionLog });
  });

  server.post(
    "/api/matches/:id/actions",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const matchId = parseMatchId(request);
      const playerId = parsePlayerId(request);
      if (!playerId) {
        return sendRejected(reply, rejected("BAD_REQUEST", "playerId query is required"));
      }

      const parsed = GameActionSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const action: GameAction = parsed.data;
      logMatch(request.log, { tag: "match:incoming", matchId, playerId, action }, config.matchDebug);

      const result = await enqueueMatchCommand(matchQueueKey(matchId), () => {
        const room = getMatchRoom(matchId);
        if (!room) {
          return rejected("MATCH_NOT_FOUND", "Match not found");
        }
        if (!isActionAllowedByPlayer(room.session.state, action, playerId)) {
          return rejected("FORBIDDEN", "Action not allowed for this player");
        }
        return applyMatchAction(room, action, playerId);
      });

      if (!result.ok) {
        logMatch(request.log, {
          tag: "match:rejected",
          matchId,
          playerId,
          actionType: action.type,
          code: result.code,
          rulesCode: result.rulesCode,
          message: result.message,
        });
        return sendRejected(reply, result);
      }

      logMatch(request.log, {
        tag: "match:actionResult",
        matchId,
        playerId,
        actionType: action.type,
        logIndex: result.logIndex,
      });
      logMatchEvents(request.log, matchId, result.events, config.matchDebug);

      const room = getMatchRoom(matchId);
      return reply.send({
        view: room ? room.session.view() : null,
        events: result.events,
        logIndex: result.logIndex,
      });
    }
  );
}
