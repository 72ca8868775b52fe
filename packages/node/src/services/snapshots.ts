/**
 * Schemas for registry and cellar snapshots read back from the state
 * store. A record that passes its integrity hash can still come from an
 * older build, so its shape is checked before it is restored.
 */

import { z } from "zod";
import { isJsonValue } from "@cellar/types";
import type { JsonValue } from "@cellar/types";
import type { RegistrySnapshot } from "@cellar/registry";
import type { CellarSnapshot } from "@cellar/vault";

const JsonValueSchema = z.custom<JsonValue>((value) => isJsonValue(value), "expected plain JSON");

const PositionIdSchema = z.number().int().nonnegative();

const BaseUnitsStringSchema = z.string().regex(/^\d+$/);

export const RegistrySnapshotSchema = z.object({
  version: z.literal(1),
  owner: z.string().min(1),
  nextPositionId: PositionIdSchema,
  adaptors: z.array(z.object({ identifier: z.string().min(1), trusted: z.boolean() })),
  positions: z.array(
    z.object({
      id: PositionIdSchema,
      hash: z.string(),
      adaptor: z.string(),
      configData: JsonValueSchema,
      isDebt: z.boolean(),
      trusted: z.boolean(),
    }),
  ),
}) satisfies z.ZodType<RegistrySnapshot, z.ZodTypeDef, unknown>;

export const CellarSnapshotSchema = z.object({
  version: z.literal(1),
  config: z.object({
    address: z.string().min(1),
    owner: z.string().min(1),
    asset: z.string().min(1),
    name: z.string(),
    shareLockPeriod: z.number().int().nonnegative(),
    rebalanceDeviation: BaseUnitsStringSchema,
  }),
  catalogue: z.object({
    adaptors: z.array(z.string()),
    positions: z.array(PositionIdSchema),
  }),
  creditPositions: z.array(PositionIdSchema),
  debtPositions: z.array(PositionIdSchema),
  positionData: z.array(
    z.object({
      id: PositionIdSchema,
      adaptor: z.string(),
      isDebt: z.boolean(),
      configData: JsonValueSchema,
      userConfig: JsonValueSchema,
    }),
  ),
  holdingPosition: PositionIdSchema,
  totalSupply: BaseUnitsStringSchema,
  balances: z.array(z.object({ account: z.string(), shares: BaseUnitsStringSchema })),
  allowances: z.array(z.object({ owner: z.string(), spender: z.string(), shares: BaseUnitsStringSchema })),
  shareLocks: z.array(z.object({ account: z.string(), since: z.number().int() })),
  isShutdown: z.boolean(),
}) satisfies z.ZodType<CellarSnapshot, z.ZodTypeDef, unknown>;

/** Stored cellar list, in creation order. */
export const CellarIndexSchema = z.object({
  cellars: z.array(z.string().min(1)),
});
