/**
 * @cellar/protocols — external collaborators a cellar talks to.
 *
 * Interfaces plus in-memory implementations for token custody, price
 * oracles, lending markets, swap routing and share vaults.
 */

export { ProtocolError, assertAmount } from "./errors.js";
export type { ProtocolErrorCode } from "./errors.js";

export { runAtomically } from "./atomic.js";

export { ManualClock, systemClock } from "./clock.js";
export type { Clock } from "./clock.js";

export { InMemoryTokenBank } from "./token-bank.js";
export type { TokenBank } from "./token-bank.js";

export { FixedPriceOracle, PRICE_DECIMALS } from "./price-oracle.js";
export type { PriceFeed, PriceOracle } from "./price-oracle.js";

export { InMemoryLendingMarket, MAX_SUB_ACCOUNT_ID, subAccountOf } from "./lending-market.js";
export type {
  AccountAssetBalance,
  InMemoryLendingMarketOptions,
  LendingMarket,
  MarketParams,
} from "./lending-market.js";

export {
  EXCHANGES,
  FEE_DENOMINATOR,
  InMemorySwapRouter,
  V2_POOL_FEE,
} from "./swap-router.js";
export type { ExchangeId, InMemorySwapRouterOptions, SwapParams, SwapRouter } from "./swap-router.js";

export { SimpleShareVault, VaultDirectory } from "./share-vault.js";
export type { ShareVault } from "./share-vault.js";

export { ProtocolEnvironment } from "./environment.js";
export type { ProtocolEnvironmentOptions } from "./environment.js";
