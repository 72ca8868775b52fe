/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as base-unit integer strings and arrive in handlers as
 * bigint. Each DTO has a Zod schema and a derived TypeScript type.
 */

import { z } from "zod";
import { AccountIdSchema, AssetIdSchema, BaseUnitsSchema } from "@cellar/adaptors";
import { isJsonValue } from "@cellar/types";
import type { JsonValue } from "@cellar/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const JsonValueSchema = z.custom<JsonValue>((value) => isJsonValue(value), "expected plain JSON");

export const PositionIdSchema = z.number().int().positive();

const IndexSchema = z.number().int().nonnegative();

// =============================================================================
// Registry DTOs
// =============================================================================

export const AdaptorIdentifierSchema = z.object({
  identifier: z.string().min(1),
});

export type AdaptorIdentifierDto = z.infer<typeof AdaptorIdentifierSchema>;

export const PositionConfigSchema = z.object({
  adaptor: z.string().min(1),
  configData: JsonValueSchema,
});

export type PositionConfigDto = z.infer<typeof PositionConfigSchema>;

// =============================================================================
// Cellar DTOs
// =============================================================================

export const CreateCellarSchema = z.object({
  address: AccountIdSchema.max(128),
  asset: AssetIdSchema,
  name: z.string().min(1).max(128).optional(),
  shareLockPeriod: z.number().int().nonnegative().optional(),
  /** WAD, base units. */
  rebalanceDeviation: BaseUnitsSchema.optional(),
});

export type CreateCellarDto = z.infer<typeof CreateCellarSchema>;

/** Receiver defaults to the caller. */
export const DepositSchema = z.object({
  assets: BaseUnitsSchema,
  receiver: AccountIdSchema.optional(),
});

export const MintSchema = z.object({
  shares: BaseUnitsSchema,
  receiver: AccountIdSchema.optional(),
});

/** Receiver and owner default to the caller. */
export const WithdrawSchema = z.object({
  assets: BaseUnitsSchema,
  receiver: AccountIdSchema.optional(),
  owner: AccountIdSchema.optional(),
});

export const RedeemSchema = z.object({
  shares: BaseUnitsSchema,
  receiver: AccountIdSchema.optional(),
  owner: AccountIdSchema.optional(),
});

export const ApproveSchema = z.object({
  spender: AccountIdSchema,
  shares: BaseUnitsSchema,
});

export const TransferSchema = z.object({
  to: AccountIdSchema,
  shares: BaseUnitsSchema,
  /** Spend an allowance from this account instead of the caller's own shares. */
  from: AccountIdSchema.optional(),
});

export const CataloguePositionSchema = z.object({
  positionId: PositionIdSchema,
});

export const AddPositionSchema = z.object({
  index: IndexSchema,
  positionId: PositionIdSchema,
  userConfig: JsonValueSchema.default(null),
  inDebtArray: z.boolean().default(false),
});

export type AddPositionDto = z.infer<typeof AddPositionSchema>;

export const RemovePositionSchema = z.object({
  index: IndexSchema,
  inDebtArray: z.boolean().default(false),
});

export const SwapPositionsSchema = z.object({
  index1: IndexSchema,
  index2: IndexSchema,
  inDebtArray: z.boolean().default(false),
});

export const ForcePositionOutSchema = z.object({
  index: IndexSchema,
  positionId: PositionIdSchema,
  inDebtArray: z.boolean().default(false),
});

export const HoldingPositionSchema = z.object({
  positionId: PositionIdSchema,
});

export const ShareLockPeriodSchema = z.object({
  seconds: z.number().int().nonnegative(),
});

export const RebalanceDeviationSchema = z.object({
  /** WAD, base units. */
  deviation: BaseUnitsSchema,
});

export const CallOnAdaptorSchema = z.object({
  calls: z.array(
    z.object({
      adaptor: z.string().min(1),
      callData: z.array(
        z.object({
          fn: z.string().min(1),
          args: z.record(JsonValueSchema).default({}),
        }),
      ),
    }),
  ),
});

export type CallOnAdaptorDto = z.infer<typeof CallOnAdaptorSchema>;
