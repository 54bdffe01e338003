import type { FastifyBaseLogger } from "fastify";
import type { GameEvent } from "@skirmish/rules";

export interface MatchLogEntry extends Record<string, unknown> {
  tag: string;
}

function ts() {
  return new Date().toISOString();
}

const INFO_TAGS = new Set([
  "match:create",
  "match:actionResult",
  "match:rejected",
]);

const INFO_EVENT_TYPES = new Set<string>([
  "roundStarted",
  "phaseStarted",
  "unitMoved",
  "attackResolved",
  "unitDestroyed",
  "chargeRolled",
  "chargeFailed",
  "chargeCompleted",
  "fightResolved",
]);

/**
 * Routes match log lines by tag. Rules events that change the table go to
 * info; the rest only show up with MATCH_DEBUG.
 */
export function logMatch(
  logger: FastifyBaseLogger,
  entry: MatchLogEntry,
  debug = false
) {
  const payload = { ...entry, ts: ts() };

  if (INFO_TAGS.has(entry.tag)) {
    logger.info(payload);
    return;
  }

  if (entry.tag === "match:event") {
    const eventType = entry.eventType;
    if (typeof eventType === "string" && INFO_EVENT_TYPES.has(eventType)) {
      logger.info(payload);
      return;
    }
    if (debug) {
      logger.debug(payload);
    }
    return;
  }

  if (entry.tag === "match:incoming") {
    logger.debug(payload);
    return;
  }

  if (debug) {
    logger.debug(payload);
  } else {
    logger.info(payload);
  }
}

export function logMatchEvents(
  logger: FastifyBaseLogger,
  matchId: string,
  events: GameEvent[],
  debug = false
) {
  for (const event of events) {
    logMatch(logger, { tag: "match:event", matchId, eventType: event.type, event }, debug);
  }
}
