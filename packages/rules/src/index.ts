// packages/rules/src/index.ts

export * from "./model";
export * from "./config";
export * from "./context";
export * from "./rng";
export * from "./geometry";
export * from "./units";
export * from "./movement";
export * from "./combat";
export * from "./shooting";
export * from "./engagements";
export * from "./fight";
export * from "./phases";
export * from "./view";
export * from "./session";
export { applyAction } from "./actions/registry";
export {
  createDefaultArmy,
  createDefaultArmies,
  createMatchState,
} from "./actions/armyActions";
export type { ArmySetup, UnitPlacement } from "./actions/armyActions";
export { listUnits, unitsOf } from "./shared/stateUtils";
