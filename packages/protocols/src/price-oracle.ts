/**
 * Price oracle — converts amounts between assets.
 *
 * Consumers must treat prices as fixed for the duration of one valuation
 * pass; nothing in the engine moves a price while it is summing.
 */

import type { AssetId } from "@cellar/types";
import { mulDivDown, unitOf } from "@cellar/math";
import { ProtocolError, assertAmount } from "./errors.js";

/** Prices are quoted in a common unit with this many decimals. */
export const PRICE_DECIMALS = 8;

export interface PriceOracle {
  isSupported(asset: AssetId): boolean;
  decimalsOf(asset: AssetId): number;
  /** Value of one whole unit of `base`, in base units of `quote`. */
  getExchangeRate(base: AssetId, quote: AssetId): bigint;
  /** Value of `amountIn` base units of `assetIn`, in base units of `assetOut`. Rounds down. */
  getValue(assetIn: AssetId, amountIn: bigint, assetOut: AssetId): bigint;
  getValues(assetsIn: readonly AssetId[], amountsIn: readonly bigint[], assetOut: AssetId): bigint;
}

export interface PriceFeed {
  readonly asset: AssetId;
  readonly decimals: number;
  /** Price of one whole unit, with PRICE_DECIMALS decimals. */
  readonly price: bigint;
}

/**
 * Oracle backed by a fixed price table.
 * Prices change only through setPrice().
 */
export class FixedPriceOracle implements PriceOracle {
  private readonly _feeds: Map<AssetId, PriceFeed> = new Map();

  constructor(feeds: readonly PriceFeed[]) {
    for (const feed of feeds) {
      this.setFeed(feed);
    }
  }

  setFeed(feed: PriceFeed): void {
    if (feed.price <= 0n) {
      throw new ProtocolError("INVALID_AMOUNT", `Price for ${feed.asset} must be positive`);
    }
    unitOf(feed.decimals);
    this._feeds.set(feed.asset, feed);
  }

  setPrice(asset: AssetId, price: bigint): void {
    this.setFeed({ ...this._feed(asset), price });
  }

  isSupported(asset: AssetId): boolean {
    return this._feeds.has(asset);
  }

  decimalsOf(asset: AssetId): number {
    return this._feed(asset).decimals;
  }

  getExchangeRate(base: AssetId, quote: AssetId): bigint {
    const b = this._feed(base);
    const q = this._feed(quote);
    return mulDivDown(b.price, unitOf(q.decimals), q.price);
  }

  getValue(assetIn: AssetId, amountIn: bigint, assetOut: AssetId): bigint {
    assertAmount(amountIn, "Valuation amount");
    const a = this._feed(assetIn);
    const b = this._feed(assetOut);
    if (assetIn === assetOut) {
      return amountIn;
    }
    return mulDivDown(
      amountIn,
      a.price * unitOf(b.decimals),
      b.price * unitOf(a.decimals),
    );
  }

  getValues(assetsIn: readonly AssetId[], amountsIn: readonly bigint[], assetOut: AssetId): bigint {
    if (assetsIn.length !== amountsIn.length) {
      throw new ProtocolError(
        "INVALID_AMOUNT",
        `Asset/amount length mismatch: ${String(assetsIn.length)} vs ${String(amountsIn.length)}`,
      );
    }
    let total = 0n;
    assetsIn.forEach((asset, i) => {
      total += this.getValue(asset, amountsIn[i] ?? 0n, assetOut);
    });
    return total;
  }

  private _feed(asset: AssetId): PriceFeed {
    const feed = this._feeds.get(asset);
    if (feed === undefined) {
      throw new ProtocolError("UNSUPPORTED_ASSET", `No price feed for ${asset}`);
    }
    return feed;
  }
}
