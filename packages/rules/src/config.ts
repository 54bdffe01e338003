// packages/rules/src/config.ts

export type FightVariant = "withAttacks" | "pileInOnly";

export interface RulesConfig {
  /** Tabletop inches to world units */
  conversionFactor: number;
  /** Highest initiative tier resolved in a fight */
  maxInitiative: number;
  /** Added to movementRange for the maximum charge range */
  chargeBonus: number;
  /** Pile-in reach, in tabletop inches */
  pileInDistance: number;
  fightVariant: FightVariant;
}

export const DEFAULT_RULES_CONFIG: RulesConfig = {
  conversionFactor: 10,
  maxInitiative: 10,
  chargeBonus: 6,
  pileInDistance: 3,
  fightVariant: "withAttacks",
};

export class RulesConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RulesConfigError";
  }
}

function requirePositive(name: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RulesConfigError(`${name} must be a positive number, got ${value}`);
  }
}

export function resolveRulesConfig(
  overrides: Partial<RulesConfig> = {}
): RulesConfig {
  const config: RulesConfig = { ...DEFAULT_RULES_CONFIG, ...overrides };

  requirePositive("conversionFactor", config.conversionFactor);
  requirePositive("pileInDistance", config.pileInDistance);
  if (!Number.isInteger(config.maxInitiative) || config.maxInitiative < 1) {
    throw new RulesConfigError(
      `maxInitiative must be an integer >= 1, got ${config.maxInitiative}`
    );
  }
  if (!Number.isFinite(config.chargeBonus) || config.chargeBonus < 0) {
    throw new RulesConfigError(
      `chargeBonus must be >= 0, got ${config.chargeBonus}`
    );
  }
  if (
    config.fightVariant !== "withAttacks" &&
    config.fightVariant !== "pileInOnly"
  ) {
    throw new RulesConfigError(`unknown fightVariant ${String(config.fightVariant)}`);
  }

  return config;
}

// Tabletop distance to world units
export function toWorld(config: RulesConfig, inches: number): number {
  return inches * config.conversionFactor;
}
