/**
 * @cellar/vault — Cellar vault ledger.
 *
 * Share accounting over a reserve asset, with holdings spread across
 * registry-trusted positions.
 *
 * Design rules:
 * - Rounding always favours the cellar over the caller
 * - Every mutating entrypoint is all-or-nothing
 * - Strategist batches may not move totalAssets beyond the rebalance deviation
 * - All state is snapshot-able and restorable
 */

export { Cellar } from "./cellar.js";
export type { BatchResult } from "./cellar.js";

export {
  CellarError,
  DEFAULT_REBALANCE_DEVIATION,
  DEFAULT_SHARE_LOCK_PERIOD,
  MAX_POSITIONS,
  MAX_REBALANCE_DEVIATION,
  MAX_SHARE_LOCK_PERIOD,
} from "./types.js";
export type {
  ActivePosition,
  CellarConfig,
  CellarDependencies,
  CellarErrorCode,
  CellarSnapshot,
  PositionBalance,
} from "./types.js";
