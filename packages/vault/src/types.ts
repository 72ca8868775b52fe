/**
 * @cellar/vault — Types for the Cellar vault ledger.
 */

import type { Logger } from "pino";
import type { Adaptor } from "@cellar/adaptors";
import type { ProtocolEnvironment } from "@cellar/protocols";
import type { PositionRegistry } from "@cellar/registry";
import type {
  AccountId,
  AssetId,
  ConfigData,
  ErrorCategory,
  JsonValue,
  PositionId,
  Timestamp,
} from "@cellar/types";
import { WAD } from "@cellar/math";

// =============================================================================
// Limits and defaults
// =============================================================================

/** Upper bound on each of the credit and debt lists. */
export const MAX_POSITIONS = 16;

export const DEFAULT_SHARE_LOCK_PERIOD = 20 * 60;
export const MAX_SHARE_LOCK_PERIOD = 2 * 24 * 60 * 60;

/** 0.3% */
export const DEFAULT_REBALANCE_DEVIATION = (WAD * 3n) / 1_000n;
/** 10% */
export const MAX_REBALANCE_DEVIATION = WAD / 10n;

// =============================================================================
// Configuration
// =============================================================================

export interface CellarConfig {
  /** Custody account: holds the cellar's tokens and market positions. */
  readonly address: AccountId;
  /** Strategist. The only caller allowed to reconfigure or rebalance. */
  readonly owner: AccountId;
  /** Reserve asset. Deposits, withdrawals and valuation use it. */
  readonly asset: AssetId;
  readonly name?: string;
  /** Seconds a receiver's shares stay locked after a deposit. */
  readonly shareLockPeriod?: number;
  /** Allowed drift of totalAssets across a strategist batch (WAD). */
  readonly rebalanceDeviation?: bigint;
}

export interface CellarDependencies {
  readonly registry: PositionRegistry<Adaptor>;
  readonly env: ProtocolEnvironment;
  /** Defaults to a silent logger. */
  readonly logger?: Logger;
}

// =============================================================================
// Positions
// =============================================================================

/**
 * An active position as the cellar holds it.
 * `configData` is the registry's; `userConfig` is the strategist's own
 * per-position settings.
 */
export interface ActivePosition {
  readonly id: PositionId;
  readonly adaptor: string;
  readonly isDebt: boolean;
  readonly configData: ConfigData;
  readonly userConfig: JsonValue;
}

export interface PositionBalance {
  readonly id: PositionId;
  readonly adaptor: string;
  readonly isDebt: boolean;
  readonly asset: AssetId;
  /** In the position's own asset. */
  readonly balance: bigint;
  /** In the reserve asset. */
  readonly value: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Persistable cellar state. Amounts are base-unit strings so the whole
 * structure is plain JSON.
 */
export type CellarSnapshot = {
  readonly version: 1;
  readonly config: {
    readonly address: AccountId;
    readonly owner: AccountId;
    readonly asset: AssetId;
    readonly name: string;
    readonly shareLockPeriod: number;
    readonly rebalanceDeviation: string;
  };
  readonly catalogue: {
    readonly adaptors: readonly string[];
    readonly positions: readonly PositionId[];
  };
  readonly creditPositions: readonly PositionId[];
  readonly debtPositions: readonly PositionId[];
  readonly positionData: readonly {
    readonly id: PositionId;
    readonly adaptor: string;
    readonly isDebt: boolean;
    readonly configData: ConfigData;
    readonly userConfig: JsonValue;
  }[];
  readonly holdingPosition: PositionId;
  readonly totalSupply: string;
  readonly balances: readonly { readonly account: AccountId; readonly shares: string }[];
  readonly allowances: readonly {
    readonly owner: AccountId;
    readonly spender: AccountId;
    readonly shares: string;
  }[];
  readonly shareLocks: readonly { readonly account: AccountId; readonly since: Timestamp }[];
  readonly isShutdown: boolean;
};

// =============================================================================
// Errors
// =============================================================================

export type CellarErrorCode =
  // authorization
  | "UNAUTHORIZED"
  | "ADAPTOR_NOT_IN_CATALOGUE"
  | "POSITION_NOT_IN_CATALOGUE"
  | "INSUFFICIENT_ALLOWANCE"
  // invariant
  | "SHARES_LOCKED"
  | "EXCEEDS_MAX_WITHDRAW"
  | "EXCEEDS_MAX_REDEEM"
  | "INSUFFICIENT_SHARES"
  | "INSUFFICIENT_LIQUIDITY"
  | "ZERO_SHARES"
  | "ZERO_ASSETS"
  | "INSOLVENT"
  | "TOTAL_ASSETS_DEVIATION"
  | "TOTAL_SHARES_CHANGED"
  | "POSITION_NOT_EMPTY"
  | "POSITION_IN_USE"
  | "POSITION_ALREADY_USED"
  | "POSITION_STILL_TRUSTED"
  // structural
  | "SHUTDOWN"
  | "NOT_SHUTDOWN"
  | "REENTRANCY"
  | "DEBT_MISMATCH"
  | "ASSET_NOT_SUPPORTED"
  | "POSITION_ARRAY_FULL"
  | "INVALID_INDEX"
  | "POSITION_NOT_USED"
  | "INVALID_HOLDING_POSITION"
  | "REMOVING_HOLDING_POSITION"
  | "INVALID_SHARE_LOCK_PERIOD"
  | "INVALID_REBALANCE_DEVIATION"
  | "INVALID_AMOUNT"
  | "INVALID_SNAPSHOT"
  | "INVALID_POSITION"
  | "VALUATION_CYCLE";

const CATEGORY: Readonly<Record<CellarErrorCode, ErrorCategory>> = {
  UNAUTHORIZED: "authorization",
  ADAPTOR_NOT_IN_CATALOGUE: "authorization",
  POSITION_NOT_IN_CATALOGUE: "authorization",
  INSUFFICIENT_ALLOWANCE: "authorization",
  SHARES_LOCKED: "invariant",
  EXCEEDS_MAX_WITHDRAW: "invariant",
  EXCEEDS_MAX_REDEEM: "invariant",
  INSUFFICIENT_SHARES: "invariant",
  INSUFFICIENT_LIQUIDITY: "invariant",
  ZERO_SHARES: "invariant",
  ZERO_ASSETS: "invariant",
  INSOLVENT: "invariant",
  TOTAL_ASSETS_DEVIATION: "invariant",
  TOTAL_SHARES_CHANGED: "invariant",
  POSITION_NOT_EMPTY: "invariant",
  POSITION_IN_USE: "invariant",
  POSITION_ALREADY_USED: "invariant",
  POSITION_STILL_TRUSTED: "invariant",
  SHUTDOWN: "structural",
  NOT_SHUTDOWN: "structural",
  REENTRANCY: "structural",
  DEBT_MISMATCH: "structural",
  ASSET_NOT_SUPPORTED: "structural",
  POSITION_ARRAY_FULL: "structural",
  INVALID_INDEX: "structural",
  POSITION_NOT_USED: "structural",
  INVALID_HOLDING_POSITION: "structural",
  REMOVING_HOLDING_POSITION: "structural",
  INVALID_SHARE_LOCK_PERIOD: "structural",
  INVALID_REBALANCE_DEVIATION: "structural",
  INVALID_AMOUNT: "structural",
  INVALID_SNAPSHOT: "structural",
  INVALID_POSITION: "structural",
  VALUATION_CYCLE: "structural",
};

export class CellarError extends Error {
  public readonly code: CellarErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: CellarErrorCode, message: string) {
    super(message);
    this.name = "CellarError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
