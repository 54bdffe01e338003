// packages/server/src/commandResult.ts

import type { GameEvent, RejectionCode } from "@skirmish/rules";

export type CommandRejectedCode =
  | "BAD_REQUEST"
  | "MATCH_NOT_FOUND"
  | "FORBIDDEN"
  | "RULES_REJECTED";

export interface CommandAccepted {
  ok: true;
  events: GameEvent[];
  logIndex: number;
}

export interface CommandRejected {
  ok: false;
  code: CommandRejectedCode;
  message?: string;
  /** Set when the rules themselves refused the action */
  rulesCode?: RejectionCode;
}

export type CommandResult = CommandAccepted | CommandRejected;

export function accepted(params: {
  events: GameEvent[];
  logIndex: number;
}): CommandAccepted {
  return {
    ok: true,
    events: params.events,
    logIndex: params.logIndex,
  };
}

export function rejected(
  code: CommandRejectedCode,
  message?: string,
  rulesCode?: RejectionCode
): CommandRejected {
  return {
    ok: false,
    code,
    message,
    rulesCode,
  };
}

export function httpStatusFor(result: CommandRejected): number {
  switch (result.code) {
    case "BAD_REQUEST":
      return 400;
    case "MATCH_NOT_FOUND":
      return 404;
    case "FORBIDDEN":
      return 403;
    case "RULES_REJECTED":
      return 409;
  }
}
