/**
 * Token custody — who holds how much of which asset.
 *
 * Stands in for the token contracts of the execution environment.
 * Vaults, markets and routers all hold balances here under their own
 * account ids.
 */

import type { AccountId, AssetId, Checkpointable, Restore } from "@cellar/types";
import { ProtocolError, assertAmount } from "./errors.js";

export interface TokenBank extends Checkpointable {
  balanceOf(holder: AccountId, asset: AssetId): bigint;
  transfer(from: AccountId, to: AccountId, asset: AssetId, amount: bigint): void;
  /** Credit funds entering from outside the system. */
  mint(to: AccountId, asset: AssetId, amount: bigint): void;
  /** Debit funds leaving the system. */
  burn(from: AccountId, asset: AssetId, amount: bigint): void;
}

export class InMemoryTokenBank implements TokenBank {
  /** asset → holder → balance */
  private _balances: Map<AssetId, Map<AccountId, bigint>> = new Map();

  balanceOf(holder: AccountId, asset: AssetId): bigint {
    return this._balances.get(asset)?.get(holder) ?? 0n;
  }

  transfer(from: AccountId, to: AccountId, asset: AssetId, amount: bigint): void {
    assertAmount(amount, "Transfer amount");
    this._debit(from, asset, amount);
    this._credit(to, asset, amount);
  }

  mint(to: AccountId, asset: AssetId, amount: bigint): void {
    assertAmount(amount, "Mint amount");
    this._credit(to, asset, amount);
  }

  burn(from: AccountId, asset: AssetId, amount: bigint): void {
    assertAmount(amount, "Burn amount");
    this._debit(from, asset, amount);
  }

  /**
   * Total of an asset across all holders.
   */
  totalOf(asset: AssetId): bigint {
    let total = 0n;
    for (const balance of this._balances.get(asset)?.values() ?? []) {
      total += balance;
    }
    return total;
  }

  checkpoint(): Restore {
    const saved = cloneBalances(this._balances);
    return () => {
      this._balances = cloneBalances(saved);
    };
  }

  private _debit(holder: AccountId, asset: AssetId, amount: bigint): void {
    const current = this.balanceOf(holder, asset);
    if (current < amount) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `${holder} holds ${current.toString()} ${asset}, needs ${amount.toString()}`,
      );
    }
    this._set(holder, asset, current - amount);
  }

  private _credit(holder: AccountId, asset: AssetId, amount: bigint): void {
    this._set(holder, asset, this.balanceOf(holder, asset) + amount);
  }

  private _set(holder: AccountId, asset: AssetId, amount: bigint): void {
    let holders = this._balances.get(asset);
    if (holders === undefined) {
      holders = new Map();
      this._balances.set(asset, holders);
    }
    holders.set(holder, amount);
  }
}

function cloneBalances(
  source: ReadonlyMap<AssetId, ReadonlyMap<AccountId, bigint>>,
): Map<AssetId, Map<AccountId, bigint>> {
  const copy = new Map<AssetId, Map<AccountId, bigint>>();
  for (const [asset, holders] of source) {
    copy.set(asset, new Map(holders));
  }
  return copy;
}
