/**
 * Lending market — supply, borrow and self-leverage per (sub-)account.
 *
 * Follows the shape of pooled lending protocols: each listed asset has a
 * collateral factor and a borrow factor, tokens sit in the market's pool
 * account, and positions are tracked per account and asset.
 *
 * The market does not enforce health itself; adaptors check health
 * against their own minimums after every leverage-increasing call.
 */

import type { AccountId, AssetId, Checkpointable, Restore } from "@cellar/types";
import { WAD } from "@cellar/math";
import { ProtocolError, assertAmount } from "./errors.js";
import type { TokenBank } from "./token-bank.js";

export const MAX_SUB_ACCOUNT_ID = 255;

/**
 * Address of a sub-account of `owner`. Sub-accounts isolate positions
 * inside one market; ids run from 0 to MAX_SUB_ACCOUNT_ID.
 */
export function subAccountOf(owner: AccountId, subAccountId: number): AccountId {
  if (!Number.isInteger(subAccountId) || subAccountId < 0 || subAccountId > MAX_SUB_ACCOUNT_ID) {
    throw new ProtocolError(
      "INVALID_SUB_ACCOUNT_ID",
      `Sub-account id must be an integer in 0..${String(MAX_SUB_ACCOUNT_ID)}, got ${String(subAccountId)}`,
    );
  }
  return `${owner}#${String(subAccountId)}`;
}

export interface MarketParams {
  readonly asset: AssetId;
  /** Share of collateral value that counts toward borrowing power (WAD). */
  readonly collateralFactor: bigint;
  /** Debt value is divided by this factor (WAD); 1.0 means no extra weight. */
  readonly borrowFactor: bigint;
}

export interface AccountAssetBalance {
  readonly asset: AssetId;
  readonly collateral: bigint;
  readonly debt: bigint;
}

export interface LendingMarket extends Checkpointable {
  readonly id: string;
  /** Asset in which the market expresses risk-adjusted values. */
  readonly referenceAsset: AssetId;
  hasMarket(asset: AssetId): boolean;
  marketParams(asset: AssetId): MarketParams;
  supply(account: AccountId, asset: AssetId, amount: bigint, payer: AccountId): void;
  withdraw(account: AccountId, asset: AssetId, amount: bigint, receiver: AccountId): void;
  borrow(account: AccountId, asset: AssetId, amount: bigint, receiver: AccountId): void;
  repay(account: AccountId, asset: AssetId, amount: bigint, payer: AccountId): void;
  /** Self-borrow: collateral and debt both grow by `amount`; no tokens move. */
  mint(account: AccountId, asset: AssetId, amount: bigint): void;
  /** Self-repay: collateral and debt both shrink by `amount`. */
  burn(account: AccountId, asset: AssetId, amount: bigint): void;
  collateralOf(account: AccountId, asset: AssetId): bigint;
  debtOf(account: AccountId, asset: AssetId): bigint;
  accountAssets(account: AccountId): readonly AccountAssetBalance[];
  liquidity(asset: AssetId): bigint;
}

export interface InMemoryLendingMarketOptions {
  readonly id: string;
  readonly referenceAsset: AssetId;
  readonly tokens: TokenBank;
  readonly markets: readonly MarketParams[];
}

interface MutableBalance {
  collateral: bigint;
  debt: bigint;
}

type AccountBook = Map<AccountId, Map<AssetId, MutableBalance>>;

export class InMemoryLendingMarket implements LendingMarket {
  readonly id: string;
  readonly referenceAsset: AssetId;
  /** Token-bank account that holds the pool's liquidity. */
  readonly poolAccount: AccountId;
  private readonly _tokens: TokenBank;
  private readonly _markets: Map<AssetId, MarketParams> = new Map();
  private _book: AccountBook = new Map();

  constructor(options: InMemoryLendingMarketOptions) {
    this.id = options.id;
    this.referenceAsset = options.referenceAsset;
    this.poolAccount = `market:${options.id}`;
    this._tokens = options.tokens;

    for (const params of options.markets) {
      if (params.collateralFactor < 0n || params.collateralFactor > WAD) {
        throw new ProtocolError("INVALID_MARKET_PARAMS", `Collateral factor for ${params.asset} must be within [0, 1]`);
      }
      if (params.borrowFactor <= 0n || params.borrowFactor > WAD) {
        throw new ProtocolError("INVALID_MARKET_PARAMS", `Borrow factor for ${params.asset} must be within (0, 1]`);
      }
      this._markets.set(params.asset, params);
    }
  }

  hasMarket(asset: AssetId): boolean {
    return this._markets.has(asset);
  }

  marketParams(asset: AssetId): MarketParams {
    const params = this._markets.get(asset);
    if (params === undefined) {
      throw new ProtocolError("UNKNOWN_MARKET", `Market ${this.id} lists no ${asset} market`);
    }
    return params;
  }

  supply(account: AccountId, asset: AssetId, amount: bigint, payer: AccountId): void {
    this.marketParams(asset);
    assertAmount(amount, "Supply amount");
    this._tokens.transfer(payer, this.poolAccount, asset, amount);
    this._entry(account, asset).collateral += amount;
  }

  withdraw(account: AccountId, asset: AssetId, amount: bigint, receiver: AccountId): void {
    this.marketParams(asset);
    assertAmount(amount, "Withdraw amount");
    const entry = this._entry(account, asset);
    if (entry.collateral < amount) {
      throw new ProtocolError(
        "INSUFFICIENT_COLLATERAL",
        `${account} supplied ${entry.collateral.toString()} ${asset}, cannot withdraw ${amount.toString()}`,
      );
    }
    this._assertLiquidity(asset, amount);
    this._tokens.transfer(this.poolAccount, receiver, asset, amount);
    entry.collateral -= amount;
  }

  borrow(account: AccountId, asset: AssetId, amount: bigint, receiver: AccountId): void {
    this.marketParams(asset);
    assertAmount(amount, "Borrow amount");
    this._assertLiquidity(asset, amount);
    this._tokens.transfer(this.poolAccount, receiver, asset, amount);
    this._entry(account, asset).debt += amount;
  }

  repay(account: AccountId, asset: AssetId, amount: bigint, payer: AccountId): void {
    this.marketParams(asset);
    assertAmount(amount, "Repay amount");
    const entry = this._entry(account, asset);
    if (amount > entry.debt) {
      throw new ProtocolError(
        "REPAY_EXCEEDS_DEBT",
        `${account} owes ${entry.debt.toString()} ${asset}, cannot repay ${amount.toString()}`,
      );
    }
    this._tokens.transfer(payer, this.poolAccount, asset, amount);
    entry.debt -= amount;
  }

  mint(account: AccountId, asset: AssetId, amount: bigint): void {
    this.marketParams(asset);
    assertAmount(amount, "Mint amount");
    const entry = this._entry(account, asset);
    entry.collateral += amount;
    entry.debt += amount;
  }

  burn(account: AccountId, asset: AssetId, amount: bigint): void {
    this.marketParams(asset);
    assertAmount(amount, "Burn amount");
    const entry = this._entry(account, asset);
    if (amount > entry.debt || amount > entry.collateral) {
      throw new ProtocolError(
        "REPAY_EXCEEDS_DEBT",
        `${account} cannot burn ${amount.toString()} ${asset}: collateral ${entry.collateral.toString()}, debt ${entry.debt.toString()}`,
      );
    }
    entry.collateral -= amount;
    entry.debt -= amount;
  }

  collateralOf(account: AccountId, asset: AssetId): bigint {
    return this._book.get(account)?.get(asset)?.collateral ?? 0n;
  }

  debtOf(account: AccountId, asset: AssetId): bigint {
    return this._book.get(account)?.get(asset)?.debt ?? 0n;
  }

  accountAssets(account: AccountId): readonly AccountAssetBalance[] {
    const assets = this._book.get(account);
    if (assets === undefined) {
      return [];
    }
    return [...assets.entries()]
      .filter(([, b]) => b.collateral > 0n || b.debt > 0n)
      .map(([asset, b]) => ({ asset, collateral: b.collateral, debt: b.debt }));
  }

  liquidity(asset: AssetId): bigint {
    return this._tokens.balanceOf(this.poolAccount, asset);
  }

  checkpoint(): Restore {
    const saved = cloneBook(this._book);
    return () => {
      this._book = cloneBook(saved);
    };
  }

  private _assertLiquidity(asset: AssetId, amount: bigint): void {
    const available = this.liquidity(asset);
    if (available < amount) {
      throw new ProtocolError(
        "INSUFFICIENT_LIQUIDITY",
        `Market ${this.id} has ${available.toString()} ${asset} available, needs ${amount.toString()}`,
      );
    }
  }

  private _entry(account: AccountId, asset: AssetId): MutableBalance {
    let assets = this._book.get(account);
    if (assets === undefined) {
      assets = new Map();
      this._book.set(account, assets);
    }
    let entry = assets.get(asset);
    if (entry === undefined) {
      entry = { collateral: 0n, debt: 0n };
      assets.set(asset, entry);
    }
    return entry;
  }
}

function cloneBook(source: AccountBook): AccountBook {
  const copy: AccountBook = new Map();
  for (const [account, assets] of source) {
    const inner = new Map<AssetId, MutableBalance>();
    for (const [asset, b] of assets) {
      inner.set(asset, { collateral: b.collateral, debt: b.debt });
    }
    copy.set(account, inner);
  }
  return copy;
}
