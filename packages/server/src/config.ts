// packages/server/src/config.ts

import type { RulesConfig } from "@skirmish/rules";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  MATCH_DEBUG: z
    .string()
    .optional()
    .transform((v) => v === "1" || v === "true"),
  WEB_ORIGIN: z.string().url().optional(),
  CONVERSION_FACTOR: z.coerce.number().positive().optional(),
  FIGHT_VARIANT: z.enum(["withAttacks", "pileInOnly"]).optional(),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  matchDebug: boolean;
  webOrigin?: string;
  /** Rules defaults for every match created by this server */
  rules: Partial<RulesConfig>;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid environment: ${issues}`);
  }

  const e = parsed.data;
  const rules: Partial<RulesConfig> = {};
  if (e.CONVERSION_FACTOR !== undefined) rules.conversionFactor = e.CONVERSION_FACTOR;
  if (e.FIGHT_VARIANT !== undefined) rules.fightVariant = e.FIGHT_VARIANT;

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    matchDebug: e.MATCH_DEBUG,
    webOrigin: e.WEB_ORIGIN,
    rules,
  };
}
