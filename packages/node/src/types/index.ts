/**
 * Type barrel — re-exports all public types from @cellar/node.
 */

// DTOs
export {
  JsonValueSchema,
  PositionIdSchema,
  AdaptorIdentifierSchema,
  PositionConfigSchema,
  CreateCellarSchema,
  DepositSchema,
  MintSchema,
  WithdrawSchema,
  RedeemSchema,
  ApproveSchema,
  TransferSchema,
  CataloguePositionSchema,
  AddPositionSchema,
  RemovePositionSchema,
  SwapPositionsSchema,
  ForcePositionOutSchema,
  HoldingPositionSchema,
  ShareLockPeriodSchema,
  RebalanceDeviationSchema,
  CallOnAdaptorSchema,
} from "./dto.js";
export type {
  AdaptorIdentifierDto,
  PositionConfigDto,
  CreateCellarDto,
  AddPositionDto,
  CallOnAdaptorDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, domainErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
