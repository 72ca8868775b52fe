/**
 * Share vaults — tokenized vaults that issue shares against one asset.
 *
 * A Cellar implements ShareVault itself, so cellars can hold positions
 * in other cellars through the same adaptor.
 */

import type { AccountId, AssetId, Checkpointable, Restore } from "@cellar/types";
import { mulDivDown, mulDivUp } from "@cellar/math";
import { ProtocolError, assertAmount } from "./errors.js";
import type { TokenBank } from "./token-bank.js";

export interface ShareVault extends Checkpointable {
  /** Account id under which the vault holds its assets. */
  readonly address: AccountId;
  readonly asset: AssetId;
  balanceOf(holder: AccountId): bigint;
  previewRedeem(shares: bigint): bigint;
  maxWithdraw(owner: AccountId): bigint;
  /** Returns shares minted to `receiver`. */
  deposit(caller: AccountId, assets: bigint, receiver: AccountId): bigint;
  /** Returns shares burned from `owner`. */
  withdraw(caller: AccountId, assets: bigint, receiver: AccountId, owner: AccountId): bigint;
}

// =============================================================================
// Directory
// =============================================================================

/**
 * Registered vaults, by address. Checkpointing the directory
 * checkpoints every vault in it.
 */
export class VaultDirectory implements Checkpointable {
  private readonly _vaults: Map<AccountId, ShareVault> = new Map();

  register(vault: ShareVault): void {
    const existing = this._vaults.get(vault.address);
    if (existing !== undefined) {
      if (existing === vault) {
        return;
      }
      throw new ProtocolError("DUPLICATE_VAULT", `A different vault is already registered at ${vault.address}`);
    }
    this._vaults.set(vault.address, vault);
  }

  has(address: AccountId): boolean {
    return this._vaults.has(address);
  }

  get(address: AccountId): ShareVault {
    const vault = this._vaults.get(address);
    if (vault === undefined) {
      throw new ProtocolError("UNKNOWN_VAULT", `No vault registered at ${address}`);
    }
    return vault;
  }

  list(): readonly ShareVault[] {
    return [...this._vaults.values()];
  }

  checkpoint(): Restore {
    const restores = [...this._vaults.values()].map((v) => v.checkpoint());
    return () => {
      for (const restore of restores.reverse()) {
        restore();
      }
    };
  }
}

// =============================================================================
// Simple vault
// =============================================================================

/**
 * Minimal share vault: total assets is whatever the vault holds in the
 * token bank, so yield arrives by minting tokens to its address.
 */
export class SimpleShareVault implements ShareVault {
  readonly address: AccountId;
  readonly asset: AssetId;
  private readonly _tokens: TokenBank;
  private _shares: Map<AccountId, bigint> = new Map();
  private _totalSupply = 0n;

  constructor(address: AccountId, asset: AssetId, tokens: TokenBank) {
    this.address = address;
    this.asset = asset;
    this._tokens = tokens;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  totalAssets(): bigint {
    return this._tokens.balanceOf(this.address, this.asset);
  }

  balanceOf(holder: AccountId): bigint {
    return this._shares.get(holder) ?? 0n;
  }

  previewDeposit(assets: bigint): bigint {
    const total = this.totalAssets();
    if (this._totalSupply === 0n || total === 0n) {
      return assets;
    }
    return mulDivDown(assets, this._totalSupply, total);
  }

  previewRedeem(shares: bigint): bigint {
    if (this._totalSupply === 0n) {
      return shares;
    }
    return mulDivDown(shares, this.totalAssets(), this._totalSupply);
  }

  previewWithdraw(assets: bigint): bigint {
    if (this._totalSupply === 0n) {
      return assets;
    }
    return mulDivUp(assets, this._totalSupply, this.totalAssets());
  }

  maxWithdraw(owner: AccountId): bigint {
    return this.previewRedeem(this.balanceOf(owner));
  }

  deposit(caller: AccountId, assets: bigint, receiver: AccountId): bigint {
    assertAmount(assets, "Deposit amount");
    const shares = this.previewDeposit(assets);
    this._tokens.transfer(caller, this.address, this.asset, assets);
    this._shares.set(receiver, this.balanceOf(receiver) + shares);
    this._totalSupply += shares;
    return shares;
  }

  withdraw(caller: AccountId, assets: bigint, receiver: AccountId, owner: AccountId): bigint {
    assertAmount(assets, "Withdraw amount");
    if (caller !== owner) {
      throw new ProtocolError("UNAUTHORIZED", `${caller} cannot withdraw on behalf of ${owner}`);
    }
    const shares = this.previewWithdraw(assets);
    const held = this.balanceOf(owner);
    if (held < shares) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `${owner} holds ${held.toString()} shares, needs ${shares.toString()}`,
      );
    }
    this._shares.set(owner, held - shares);
    this._totalSupply -= shares;
    this._tokens.transfer(this.address, receiver, this.asset, assets);
    return shares;
  }

  checkpoint(): Restore {
    const shares = new Map(this._shares);
    const supply = this._totalSupply;
    return () => {
      this._shares = new Map(shares);
      this._totalSupply = supply;
    };
  }
}
