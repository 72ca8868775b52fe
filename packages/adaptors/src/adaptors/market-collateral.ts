/**
 * MarketCollateralAdaptor — assets supplied to a lending market as
 * collateral, per sub-account.
 *
 * Strategist functions:
 * - lend: supply vault tokens into a sub-account
 * - withdraw: pull collateral back into the vault; health-checked
 */

import { z } from "zod";
import type { AccountId, AssetId, ConfigData, JsonValue } from "@cellar/types";
import { minBigInt } from "@cellar/math";
import type { LendingMarket } from "@cellar/protocols";
import { MAX_SUB_ACCOUNT_ID } from "@cellar/protocols";
import { BaseAdaptor, functionTable, strategistFunction } from "../base-adaptor.js";
import { AdaptorError } from "../errors.js";
import {
  AmountOrMaxSchema,
  AssetIdSchema,
  SubAccountIdSchema,
  describeIssues,
} from "../schemas.js";
import type { AdaptorContext } from "../types.js";

export const MarketPositionConfigSchema = z
  .object({
    underlying: AssetIdSchema,
    subAccountId: z.number().int().min(0).max(MAX_SUB_ACCOUNT_ID),
  })
  .strict();

export type MarketPositionConfig = z.infer<typeof MarketPositionConfigSchema>;

/** `isLiquid: false` keeps user withdrawals away from the position. */
const CollateralUserConfigSchema = z
  .object({ isLiquid: z.boolean().optional() })
  .strict()
  .nullable();

const LendArgs = z.object({
  underlying: AssetIdSchema,
  subAccountId: SubAccountIdSchema,
  amount: AmountOrMaxSchema,
});

const WithdrawArgs = LendArgs;

export class MarketCollateralAdaptor extends BaseAdaptor<MarketPositionConfig> {
  readonly identifier: string;
  readonly marketId: string;
  /** Health factor the sub-account must keep after a strategist withdrawal. */
  readonly minimumHealthFactor: bigint;
  protected readonly configSchema = MarketPositionConfigSchema;
  protected readonly functionTable = functionTable({
    lend: strategistFunction(LendArgs, (args, ctx) => {
      this.lend(args, ctx);
    }),
    withdraw: strategistFunction(WithdrawArgs, (args, ctx) => {
      this.withdrawCollateral(args, ctx);
    }),
  });

  constructor(marketId: string, minimumHealthFactor: bigint) {
    super();
    this.marketId = marketId;
    this.minimumHealthFactor = minimumHealthFactor;
    this.identifier = `Market Collateral Adaptor V1 (${marketId})`;
  }

  isDebt(): boolean {
    return false;
  }

  assetOf(configData: ConfigData): AssetId {
    return this.decodeConfig(configData).underlying;
  }

  balanceOf(configData: ConfigData, ctx: AdaptorContext): bigint {
    const config = this.decodeConfig(configData);
    return this.market(ctx).collateralOf(this.subAccount(ctx, config.subAccountId), config.underlying);
  }

  override validateUserConfig(userConfig: JsonValue): void {
    this.decodeUserConfig(userConfig);
  }

  /**
   * Zero while the sub-account carries any debt or the strategist marked
   * the position illiquid; otherwise what the market can pay out.
   */
  override withdrawableFrom(configData: ConfigData, userConfig: JsonValue, ctx: AdaptorContext): bigint {
    if (this.decodeUserConfig(userConfig)?.isLiquid === false) {
      return 0n;
    }
    const config = this.decodeConfig(configData);
    const market = this.market(ctx);
    const account = this.subAccount(ctx, config.subAccountId);
    if (market.accountAssets(account).some((b) => b.debt > 0n)) {
      return 0n;
    }
    return minBigInt(market.collateralOf(account, config.underlying), market.liquidity(config.underlying));
  }

  override deposit(assets: bigint, configData: ConfigData, _userConfig: JsonValue, ctx: AdaptorContext): void {
    const config = this.decodeConfig(configData);
    this.market(ctx).supply(this.subAccount(ctx, config.subAccountId), config.underlying, assets, ctx.vault);
  }

  override withdraw(
    assets: bigint,
    receiver: AccountId,
    configData: ConfigData,
    _userConfig: JsonValue,
    ctx: AdaptorContext,
  ): void {
    const config = this.decodeConfig(configData);
    const market = this.market(ctx);
    const account = this.subAccount(ctx, config.subAccountId);
    market.withdraw(account, config.underlying, assets, receiver);
    this.assertHealthFactor(market, [account], this.minimumHealthFactor, ctx);
  }

  // ─── Strategist functions ──────────────────────────────────────────────

  private lend(args: z.output<typeof LendArgs>, ctx: AdaptorContext): void {
    const account = this.subAccount(ctx, args.subAccountId);
    const market = this.market(ctx);
    this.assertListed(market, args.underlying);
    this.assertPositionUsed({ underlying: args.underlying, subAccountId: args.subAccountId }, ctx);
    const amount =
      args.amount === "max" ? ctx.env.tokens.balanceOf(ctx.vault, args.underlying) : args.amount;
    market.supply(account, args.underlying, amount, ctx.vault);
  }

  private withdrawCollateral(args: z.output<typeof WithdrawArgs>, ctx: AdaptorContext): void {
    const account = this.subAccount(ctx, args.subAccountId);
    const market = this.market(ctx);
    this.assertListed(market, args.underlying);
    this.assertPositionUsed({ underlying: args.underlying, subAccountId: args.subAccountId }, ctx);
    const amount = args.amount === "max" ? market.collateralOf(account, args.underlying) : args.amount;
    market.withdraw(account, args.underlying, amount, ctx.vault);
    this.assertHealthFactor(market, [account], this.minimumHealthFactor, ctx);
  }

  private market(ctx: AdaptorContext): LendingMarket {
    return ctx.env.market(this.marketId);
  }

  private decodeUserConfig(userConfig: JsonValue): z.output<typeof CollateralUserConfigSchema> {
    const parsed = CollateralUserConfigSchema.safeParse(userConfig);
    if (!parsed.success) {
      throw new AdaptorError(
        "INVALID_CONFIG",
        this.identifier,
        `${this.identifier}: invalid position settings: ${describeIssues(parsed.error)}`,
      );
    }
    return parsed.data;
  }
}
