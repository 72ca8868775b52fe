/**
 * @cellar/adaptors — The adaptor capability set.
 *
 * Adaptors are stateless singletons. Everything they touch belongs to
 * the calling vault or to an external protocol, and reaches them
 * through the AdaptorContext.
 */

import type {
  AccountId,
  AssetId,
  ConfigData,
  JsonValue,
  PositionHash,
  PositionId,
  StrategistCall,
} from "@cellar/types";
import type { ProtocolEnvironment } from "@cellar/protocols";
import type { AdaptorIdentity } from "@cellar/registry";

/**
 * What a vault hands an adaptor for the duration of one call.
 */
export interface AdaptorContext {
  /** Custody account of the calling vault. */
  readonly vault: AccountId;
  readonly env: ProtocolEnvironment;
  /** Registry lookup; 0 when the hash is not a known position. */
  positionIdForHash(hash: PositionHash): PositionId;
  /** Whether the id is on the calling vault's active list. */
  isPositionUsed(id: PositionId): boolean;
}

export interface Adaptor extends AdaptorIdentity {
  /** Throws when the strategist's per-position settings are unusable. */
  validateUserConfig(userConfig: JsonValue): void;
  /** Asset the position's balance is measured in. */
  assetOf(configData: ConfigData, ctx: AdaptorContext): AssetId;
  /** Vaults whose shares the position holds; empty for everything else. */
  nestedVaultsOf(configData: ConfigData): readonly AccountId[];
  /** Current size of the vault's position. Read-only. */
  balanceOf(configData: ConfigData, ctx: AdaptorContext): bigint;
  /** Portion immediately available to user withdrawals. Always 0 for debt. */
  withdrawableFrom(configData: ConfigData, userConfig: JsonValue, ctx: AdaptorContext): bigint;
  /** Put `assets` of the vault's reserve into the position. */
  deposit(assets: bigint, configData: ConfigData, userConfig: JsonValue, ctx: AdaptorContext): void;
  /** Pull `assets` out of the position and send them to `receiver`. */
  withdraw(
    assets: bigint,
    receiver: AccountId,
    configData: ConfigData,
    userConfig: JsonValue,
    ctx: AdaptorContext,
  ): void;
  /** Run one strategist function. */
  execute(call: StrategistCall, ctx: AdaptorContext): void;
  /** Names of the strategist functions this adaptor accepts. */
  functions(): readonly string[];
}
