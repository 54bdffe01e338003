// packages/server/src/schemas.ts

import { z } from "zod";

export const PlayerIdSchema = z.union([z.literal("P1"), z.literal("P2")]);

const UnitIdSchema = z.number().int().positive();

export const Vec3Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

export const PointerHitSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("unit"), unitId: UnitIdSchema, point: Vec3Schema }),
  z.object({ kind: z.literal("ground"), point: Vec3Schema }),
]);

export const UnitPlacementSchema = z.object({
  profileId: z.string().min(1),
  position: Vec3Schema,
});

export const ArmySetupSchema = z.object({
  P1: z.array(UnitPlacementSchema).max(50),
  P2: z.array(UnitPlacementSchema).max(50),
});

export const RulesConfigOverridesSchema = z.object({
  conversionFactor: z.number().positive().optional(),
  maxInitiative: z.number().int().min(1).optional(),
  chargeBonus: z.number().min(0).optional(),
  pileInDistance: z.number().positive().optional(),
  fightVariant: z.enum(["withAttacks", "pileInOnly"]).optional(),
});

export const CreateMatchBodySchema = z.object({
  seed: z.number().int().optional(),
  armies: ArmySetupSchema.optional(),
  config: RulesConfigOverridesSchema.optional(),
});

export type CreateMatchBody = z.infer<typeof CreateMatchBodySchema>;

export const GameActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("selectUnit"), unitId: UnitIdSchema }),
  z.object({ type: z.literal("move"), unitId: UnitIdSchema, to: Vec3Schema }),
  z.object({
    type: z.literal("selectWeapon"),
    unitId: UnitIdSchema,
    weaponId: z.string().min(1),
  }),
  z.object({ type: z.literal("selectAttackTarget"), targetId: UnitIdSchema }),
  z.object({
    type: z.literal("selectChargeTarget"),
    unitId: UnitIdSchema,
    targetId: UnitIdSchema,
  }),
  z.object({ type: z.literal("chargeMove"), hit: PointerHitSchema }),
  z.object({ type: z.literal("selectFight"), unitId: UnitIdSchema }),
  z.object({ type: z.literal("resolveFight") }),
  z.object({ type: z.literal("selectFighter"), unitId: UnitIdSchema }),
  z.object({ type: z.literal("confirmPileInMove"), to: Vec3Schema.nullable() }),
  z.object({ type: z.literal("endActivation") }),
  z.object({ type: z.literal("deselect") }),
  z.object({ type: z.literal("endTurn") }),
]);
