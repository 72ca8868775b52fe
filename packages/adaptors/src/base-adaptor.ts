/**
 * BaseAdaptor — shared behaviour for every adaptor.
 *
 * Provides:
 * - Position config decoding through a zod schema
 * - A function table for strategist calls, each entry with its own schema
 * - Default refusals for user deposits and withdrawals
 * - The position-tracking and health-factor guards entrypoints must run
 */

import type { z } from "zod";
import type {
  AccountId,
  AssetId,
  ConfigData,
  JsonValue,
  StrategistCall,
} from "@cellar/types";
import { formatAmount } from "@cellar/math";
import type { LendingMarket } from "@cellar/protocols";
import { MAX_SUB_ACCOUNT_ID, subAccountOf } from "@cellar/protocols";
import { computePositionHash } from "@cellar/registry";
import { evaluateAccountHealth, isHealthy } from "@cellar/risk";
import { AdaptorError } from "./errors.js";
import { describeIssues } from "./schemas.js";
import type { Adaptor, AdaptorContext } from "./types.js";

// ─── Function table ──────────────────────────────────────────────────────

export type StrategistFunction = (args: unknown, ctx: AdaptorContext, adaptor: string) => void;

export type FunctionTable = ReadonlyMap<string, StrategistFunction>;

/**
 * Bind a handler to the schema its arguments must satisfy.
 */
export function strategistFunction<S extends z.ZodTypeAny>(
  schema: S,
  handler: (args: z.output<S>, ctx: AdaptorContext) => void,
): StrategistFunction {
  return (args, ctx, adaptor) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new AdaptorError("INVALID_CALL_DATA", adaptor, `${adaptor}: invalid arguments: ${describeIssues(parsed.error)}`);
    }
    handler(parsed.data, ctx);
  };
}

export function functionTable(entries: Readonly<Record<string, StrategistFunction>>): FunctionTable {
  return new Map(Object.entries(entries));
}

// ─── Base class ──────────────────────────────────────────────────────────

export abstract class BaseAdaptor<TConfig> implements Adaptor {
  abstract readonly identifier: string;
  protected abstract readonly configSchema: z.ZodType<TConfig>;
  protected abstract readonly functionTable: FunctionTable;

  abstract isDebt(): boolean;
  abstract assetOf(configData: ConfigData, ctx: AdaptorContext): AssetId;
  abstract balanceOf(configData: ConfigData, ctx: AdaptorContext): bigint;

  validateConfig(configData: ConfigData): void {
    this.decodeConfig(configData);
  }

  /**
   * Check the strategist's per-position settings. Accepts anything
   * unless the adaptor reads them.
   */
  validateUserConfig(_userConfig: JsonValue): void {
    // No per-position settings.
  }

  nestedVaultsOf(_configData: ConfigData): readonly AccountId[] {
    return [];
  }

  withdrawableFrom(_configData: ConfigData, _userConfig: JsonValue, _ctx: AdaptorContext): bigint {
    return 0n;
  }

  deposit(_assets: bigint, _configData: ConfigData, _userConfig: JsonValue, _ctx: AdaptorContext): void {
    throw new AdaptorError(
      "USER_DEPOSITS_NOT_ALLOWED",
      this.identifier,
      `${this.identifier} does not accept user deposits`,
    );
  }

  withdraw(
    _assets: bigint,
    _receiver: AccountId,
    _configData: ConfigData,
    _userConfig: JsonValue,
    _ctx: AdaptorContext,
  ): void {
    throw new AdaptorError(
      "USER_WITHDRAWS_NOT_ALLOWED",
      this.identifier,
      `${this.identifier} does not allow user withdrawals`,
    );
  }

  execute(call: StrategistCall, ctx: AdaptorContext): void {
    const fn = this.functionTable.get(call.fn);
    if (fn === undefined) {
      throw new AdaptorError(
        "UNKNOWN_FUNCTION",
        this.identifier,
        `${this.identifier} has no strategist function "${call.fn}"`,
      );
    }
    fn(call.args, ctx, this.identifier);
  }

  functions(): readonly string[] {
    return [...this.functionTable.keys()];
  }

  // ─── Helpers for subclasses ────────────────────────────────────────────

  protected decodeConfig(configData: ConfigData): TConfig {
    const parsed = this.configSchema.safeParse(configData);
    if (!parsed.success) {
      throw new AdaptorError(
        "INVALID_CONFIG",
        this.identifier,
        `${this.identifier}: invalid position config: ${describeIssues(parsed.error)}`,
      );
    }
    return parsed.data;
  }

  /**
   * Re-derive the position hash from this adaptor's identifier and the
   * given config, and require the position to be active in the calling
   * vault.
   */
  protected assertPositionUsed(configData: ConfigData, ctx: AdaptorContext): void {
    const hash = computePositionHash(this.identifier, this.isDebt(), configData);
    const id = ctx.positionIdForHash(hash);
    if (id !== 0 && ctx.isPositionUsed(id)) {
      return;
    }
    const described = JSON.stringify(configData);
    if (this.isDebt()) {
      throw new AdaptorError(
        "DEBT_POSITIONS_MUST_BE_TRACKED",
        this.identifier,
        `${this.identifier}: debt position ${described} is not tracked by ${ctx.vault}`,
      );
    }
    throw new AdaptorError(
      "POSITION_NOT_USED",
      this.identifier,
      `${this.identifier}: position ${described} is not used by ${ctx.vault}`,
    );
  }

  protected assertHealthFactor(
    market: LendingMarket,
    accounts: readonly AccountId[],
    minimum: bigint,
    ctx: AdaptorContext,
  ): void {
    const health = evaluateAccountHealth(market, ctx.env.oracle, accounts);
    if (!isHealthy(health.healthFactor, minimum)) {
      throw new AdaptorError(
        "HEALTH_FACTOR_TOO_LOW",
        this.identifier,
        `${this.identifier}: health factor ${formatAmount(health.healthFactor, 18)} is below minimum ${formatAmount(minimum, 18)}`,
      );
    }
  }

  /** Require the lending market to list `underlying`. */
  protected assertListed(market: LendingMarket, underlying: AssetId): void {
    if (!market.hasMarket(underlying)) {
      throw new AdaptorError(
        "UNDERLYING_NOT_SUPPORTED",
        this.identifier,
        `${this.identifier}: market ${market.id} does not list ${underlying}`,
      );
    }
  }

  protected subAccount(ctx: AdaptorContext, subAccountId: number): AccountId {
    if (!Number.isInteger(subAccountId) || subAccountId < 0 || subAccountId > MAX_SUB_ACCOUNT_ID) {
      throw new AdaptorError(
        "INVALID_SUB_ACCOUNT_ID",
        this.identifier,
        `${this.identifier}: sub-account id ${String(subAccountId)} is outside 0..${String(MAX_SUB_ACCOUNT_ID)}`,
      );
    }
    return subAccountOf(ctx.vault, subAccountId);
  }
}
