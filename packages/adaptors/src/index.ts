/**
 * @cellar/adaptors — Pluggable integrations between a cellar and
 * external protocols.
 *
 * Dispatch is a closed set of classes behind the Adaptor interface;
 * strategist calls go through each adaptor's function table.
 */

export { BaseAdaptor, functionTable, strategistFunction } from "./base-adaptor.js";
export type { FunctionTable, StrategistFunction } from "./base-adaptor.js";

export { AdaptorError } from "./errors.js";
export type { AdaptorErrorCode } from "./errors.js";

export {
  AccountIdSchema,
  AmountOrMaxSchema,
  AssetIdSchema,
  BaseUnitsSchema,
  SubAccountIdSchema,
  describeIssues,
} from "./schemas.js";
export type { AmountOrMax } from "./schemas.js";

export type { Adaptor, AdaptorContext } from "./types.js";

export { Erc20Adaptor } from "./adaptors/erc20.js";
export type { Erc20Config } from "./adaptors/erc20.js";
export { MarketCollateralAdaptor, MarketPositionConfigSchema } from "./adaptors/market-collateral.js";
export type { MarketPositionConfig } from "./adaptors/market-collateral.js";
export { MarketDebtAdaptor } from "./adaptors/market-debt.js";
export type { MarketDebtAdaptorOptions } from "./adaptors/market-debt.js";
export { VaultShareAdaptor } from "./adaptors/vault-share.js";
export type { VaultShareConfig } from "./adaptors/vault-share.js";
export { SwapAdaptor } from "./adaptors/swap.js";
