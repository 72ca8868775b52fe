/**
 * MarketDebtAdaptor — debt owed to a lending market, per sub-account.
 *
 * Strategist functions:
 * - borrow: take market liquidity into the vault
 * - repay: pay debt back from the vault ("max" = min(debt, vault balance))
 * - selfBorrow: grow collateral and debt of one asset together
 * - selfRepay: shrink them together ("max" = min(debt, collateral))
 *
 * Leverage-increasing calls re-check the sub-account's health factor.
 * Same-asset leverage cannot diverge in price, so it is held to the
 * lower self-leverage minimum.
 */

import { z } from "zod";
import type { AssetId, ConfigData } from "@cellar/types";
import { WAD, formatAmount, minBigInt } from "@cellar/math";
import type { LendingMarket } from "@cellar/protocols";
import { BaseAdaptor, functionTable, strategistFunction } from "../base-adaptor.js";
import { AdaptorError } from "../errors.js";
import {
  AmountOrMaxSchema,
  AssetIdSchema,
  BaseUnitsSchema,
  SubAccountIdSchema,
} from "../schemas.js";
import type { AdaptorContext } from "../types.js";
import { MarketPositionConfigSchema } from "./market-collateral.js";
import type { MarketPositionConfig } from "./market-collateral.js";

const BorrowArgs = z.object({
  underlying: AssetIdSchema,
  subAccountId: SubAccountIdSchema,
  amount: BaseUnitsSchema,
});

const RepayArgs = z.object({
  underlying: AssetIdSchema,
  subAccountId: SubAccountIdSchema,
  amount: AmountOrMaxSchema,
});

export interface MarketDebtAdaptorOptions {
  readonly marketId: string;
  /** WAD. Minimum after a cross-asset borrow. */
  readonly minimumHealthFactor: bigint;
  /** WAD. Minimum after a same-asset self-borrow; must not exceed minimumHealthFactor. */
  readonly minimumSelfLeverageHealthFactor: bigint;
}

export class MarketDebtAdaptor extends BaseAdaptor<MarketPositionConfig> {
  readonly identifier: string;
  readonly marketId: string;
  readonly minimumHealthFactor: bigint;
  readonly minimumSelfLeverageHealthFactor: bigint;
  protected readonly configSchema = MarketPositionConfigSchema;
  protected readonly functionTable = functionTable({
    borrow: strategistFunction(BorrowArgs, (args, ctx) => {
      this.borrow(args, ctx);
    }),
    repay: strategistFunction(RepayArgs, (args, ctx) => {
      this.repay(args, ctx);
    }),
    selfBorrow: strategistFunction(BorrowArgs, (args, ctx) => {
      this.selfBorrow(args, ctx);
    }),
    selfRepay: strategistFunction(RepayArgs, (args, ctx) => {
      this.selfRepay(args, ctx);
    }),
  });

  constructor(options: MarketDebtAdaptorOptions) {
    super();
    this.identifier = `Market Debt Adaptor V1 (${options.marketId})`;
    if (
      options.minimumSelfLeverageHealthFactor <= WAD ||
      options.minimumSelfLeverageHealthFactor > options.minimumHealthFactor
    ) {
      throw new AdaptorError(
        "INVALID_MINIMUM_HEALTH_FACTOR",
        this.identifier,
        `${this.identifier}: need 1.0 < self-leverage minimum (${formatAmount(options.minimumSelfLeverageHealthFactor, 18)}) <= minimum (${formatAmount(options.minimumHealthFactor, 18)})`,
      );
    }
    this.marketId = options.marketId;
    this.minimumHealthFactor = options.minimumHealthFactor;
    this.minimumSelfLeverageHealthFactor = options.minimumSelfLeverageHealthFactor;
  }

  isDebt(): boolean {
    return true;
  }

  assetOf(configData: ConfigData): AssetId {
    return this.decodeConfig(configData).underlying;
  }

  balanceOf(configData: ConfigData, ctx: AdaptorContext): bigint {
    const config = this.decodeConfig(configData);
    return this.market(ctx).debtOf(this.subAccount(ctx, config.subAccountId), config.underlying);
  }

  // ─── Strategist functions ──────────────────────────────────────────────

  private borrow(args: z.output<typeof BorrowArgs>, ctx: AdaptorContext): void {
    const { market, account } = this.prepare(args, ctx);
    market.borrow(account, args.underlying, args.amount, ctx.vault);
    this.assertHealthFactor(market, [account], this.minimumHealthFactor, ctx);
  }

  private repay(args: z.output<typeof RepayArgs>, ctx: AdaptorContext): void {
    const { market, account } = this.prepare(args, ctx);
    const amount =
      args.amount === "max"
        ? minBigInt(market.debtOf(account, args.underlying), ctx.env.tokens.balanceOf(ctx.vault, args.underlying))
        : args.amount;
    market.repay(account, args.underlying, amount, ctx.vault);
  }

  private selfBorrow(args: z.output<typeof BorrowArgs>, ctx: AdaptorContext): void {
    const { market, account } = this.prepare(args, ctx);
    market.mint(account, args.underlying, args.amount);
    this.assertHealthFactor(market, [account], this.minimumSelfLeverageHealthFactor, ctx);
  }

  private selfRepay(args: z.output<typeof RepayArgs>, ctx: AdaptorContext): void {
    const { market, account } = this.prepare(args, ctx);
    const amount =
      args.amount === "max"
        ? minBigInt(market.debtOf(account, args.underlying), market.collateralOf(account, args.underlying))
        : args.amount;
    market.burn(account, args.underlying, amount);
  }

  /**
   * Common entry checks: sub-account range, market listing, and that the
   * debt position is tracked by the calling vault.
   */
  private prepare(
    args: { readonly underlying: AssetId; readonly subAccountId: number },
    ctx: AdaptorContext,
  ): { market: LendingMarket; account: string } {
    const account = this.subAccount(ctx, args.subAccountId);
    const market = this.market(ctx);
    this.assertListed(market, args.underlying);
    this.assertPositionUsed({ underlying: args.underlying, subAccountId: args.subAccountId }, ctx);
    return { market, account };
  }

  private market(ctx: AdaptorContext): LendingMarket {
    return ctx.env.market(this.marketId);
  }
}
