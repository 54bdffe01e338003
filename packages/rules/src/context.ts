// packages/rules/src/context.ts

import { RulesConfig, resolveRulesConfig } from "./config";
import { Geometry, boxGeometry } from "./geometry";
import { DefaultRNG, RNG } from "./rng";

// Collaborators every rule needs, handed in by whoever owns the match
export interface RulesContext {
  rng: RNG;
  geometry: Geometry;
  config: RulesConfig;
}

export function makeRulesContext(
  params: {
    rng?: RNG;
    geometry?: Geometry;
    config?: Partial<RulesConfig>;
  } = {}
): RulesContext {
  return {
    rng: params.rng ?? new DefaultRNG(),
    geometry: params.geometry ?? boxGeometry,
    config: resolveRulesConfig(params.config),
  };
}
