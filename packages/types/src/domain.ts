/**
 * Domain Types
 *
 * Identifiers and call structures shared by the registry, the adaptors
 * and the vault.
 *
 * Rules:
 * - Amounts are bigint base units everywhere inside the engine
 * - Adaptor configuration is opaque JSON outside the adaptor that owns it
 * - Strategist calls are data, validated by the adaptor that receives them
 */

/** Identifier of a token/reserve asset (e.g., "USDC", "WETH"). */
export type AssetId = string;

/** Identifier of a holder: a user, a vault's custody account, a market. */
export type AccountId = string;

/**
 * Allocated alias of a trusted position.
 * Ids start at 1; 0 is the "absent" sentinel returned by lookups.
 */
export type PositionId = number;

/** Hex-encoded SHA-256 over (adaptor identifier, isDebt, configData). */
export type PositionHash = string;

/** Unix time in seconds. */
export type Timestamp = number;

/** Any JSON-representable value. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * Adaptor-specific configuration of a position.
 * Only the owning adaptor interprets it; everyone else hashes and stores it.
 */
export type ConfigData = JsonValue;

/**
 * One strategist function invocation on an adaptor.
 * `fn` names an entry in the adaptor's function table; `args` are
 * decoded by that entry's schema.
 */
export interface StrategistCall {
  readonly fn: string;
  readonly args: { readonly [key: string]: JsonValue };
}

/**
 * A group of strategist calls addressed to a single adaptor.
 * A batch is an ordered list of these.
 */
export interface AdaptorCall {
  readonly adaptor: string;
  readonly callData: readonly StrategistCall[];
}

/**
 * A trusted (adaptor, configuration) pair as recorded by the registry.
 */
export interface PositionRecord {
  readonly id: PositionId;
  readonly hash: PositionHash;
  readonly adaptor: string;
  readonly configData: ConfigData;
  readonly isDebt: boolean;
  readonly trusted: boolean;
}
