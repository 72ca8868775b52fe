/**
 * Swap router — exchanges one asset for another along a path.
 *
 * The in-memory router prices each hop off the oracle and charges the
 * pool fee, paying out of a reserve account that must hold enough of
 * the output asset.
 */

import type { AccountId, AssetId, Timestamp } from "@cellar/types";
import { mulDivDown } from "@cellar/math";
import { ProtocolError, assertAmount } from "./errors.js";
import type { Clock } from "./clock.js";
import type { PriceOracle } from "./price-oracle.js";
import type { TokenBank } from "./token-bank.js";

export type ExchangeId = "UNIV2" | "UNIV3";

export const EXCHANGES: readonly ExchangeId[] = ["UNIV2", "UNIV3"] as const;

/** Fees are expressed in parts per million. */
export const FEE_DENOMINATOR = 1_000_000n;

/** Constant-product pools charge a flat 0.3%. */
export const V2_POOL_FEE = 3_000;

export interface SwapParams {
  /** Assets from input to output; at least two entries. */
  readonly path: readonly AssetId[];
  /** Per-hop fee tiers (ppm). Required for UNIV3, one per hop. */
  readonly poolFees?: readonly number[];
  readonly amountIn: bigint;
  readonly amountOutMin: bigint;
  readonly deadline: Timestamp;
}

export interface SwapRouter {
  /**
   * Swap `params.amountIn` of path[0] held by `account` into the last
   * asset of the path, credited back to `account`. Returns the amount out.
   */
  executeSwap(exchange: ExchangeId, params: SwapParams, account: AccountId): bigint;
}

export interface InMemorySwapRouterOptions {
  readonly tokens: TokenBank;
  readonly oracle: PriceOracle;
  readonly clock: Clock;
  readonly reserveAccount: AccountId;
}

export class InMemorySwapRouter implements SwapRouter {
  readonly reserveAccount: AccountId;
  private readonly _tokens: TokenBank;
  private readonly _oracle: PriceOracle;
  private readonly _clock: Clock;

  constructor(options: InMemorySwapRouterOptions) {
    this._tokens = options.tokens;
    this._oracle = options.oracle;
    this._clock = options.clock;
    this.reserveAccount = options.reserveAccount;
  }

  /**
   * Output of a swap without executing it.
   */
  quote(exchange: ExchangeId, params: Pick<SwapParams, "path" | "poolFees" | "amountIn">): bigint {
    assertAmount(params.amountIn, "Swap amount");
    const fees = hopFees(exchange, params.path, params.poolFees);

    let amount = params.amountIn;
    for (let i = 0; i < fees.length; i++) {
      const from = params.path[i];
      const to = params.path[i + 1];
      const fee = fees[i];
      if (from === undefined || to === undefined || fee === undefined) {
        throw new ProtocolError("INVALID_PATH", `Swap path hop ${String(i)} is incomplete`);
      }
      const afterFee = mulDivDown(amount, FEE_DENOMINATOR - BigInt(fee), FEE_DENOMINATOR);
      amount = this._oracle.getValue(from, afterFee, to);
    }
    return amount;
  }

  executeSwap(exchange: ExchangeId, params: SwapParams, account: AccountId): bigint {
    const now = this._clock.now();
    if (now > params.deadline) {
      throw new ProtocolError(
        "DEADLINE_EXPIRED",
        `Swap deadline ${String(params.deadline)} passed at ${String(now)}`,
      );
    }

    const amountOut = this.quote(exchange, params);
    if (amountOut < params.amountOutMin) {
      throw new ProtocolError(
        "SLIPPAGE",
        `Swap returns ${amountOut.toString()}, below minimum ${params.amountOutMin.toString()}`,
      );
    }

    const assetIn = params.path[0];
    const assetOut = params.path[params.path.length - 1];
    if (assetIn === undefined || assetOut === undefined) {
      throw new ProtocolError("INVALID_PATH", "Swap path is empty");
    }

    const reserve = this._tokens.balanceOf(this.reserveAccount, assetOut);
    if (reserve < amountOut) {
      throw new ProtocolError(
        "INSUFFICIENT_LIQUIDITY",
        `Router reserve holds ${reserve.toString()} ${assetOut}, needs ${amountOut.toString()}`,
      );
    }

    this._tokens.transfer(account, this.reserveAccount, assetIn, params.amountIn);
    this._tokens.transfer(this.reserveAccount, account, assetOut, amountOut);
    return amountOut;
  }
}

function hopFees(
  exchange: ExchangeId,
  path: readonly AssetId[],
  poolFees: readonly number[] | undefined,
): readonly number[] {
  if (path.length < 2) {
    throw new ProtocolError("INVALID_PATH", `Swap path needs at least two assets, got ${String(path.length)}`);
  }
  const hops = path.length - 1;

  if (exchange === "UNIV2") {
    return Array.from({ length: hops }, () => V2_POOL_FEE);
  }

  if (poolFees === undefined || poolFees.length !== hops) {
    throw new ProtocolError(
      "INVALID_PATH",
      `UNIV3 swap over ${String(hops)} hop(s) needs ${String(hops)} pool fee(s)`,
    );
  }
  for (const fee of poolFees) {
    if (!Number.isInteger(fee) || fee < 0 || BigInt(fee) >= FEE_DENOMINATOR) {
      throw new ProtocolError("INVALID_PATH", `Pool fee ${String(fee)} is out of range`);
    }
  }
  return poolFees;
}
