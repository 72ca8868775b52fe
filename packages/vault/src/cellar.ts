/**
 * Cellar — multi-strategy vault ledger.
 *
 * Holds one reserve asset on behalf of share holders and spreads it
 * across positions run by adaptors. Share price comes from totalAssets:
 * the value of every credit position minus every debt position, priced
 * in the reserve asset.
 *
 * Use is gated in three tiers: the registry must trust an adaptor or
 * position, this cellar's catalogue must list it, and only then can the
 * strategist make it active.
 *
 * Every mutating entrypoint either completes or leaves the cellar and
 * the protocol environment exactly as it found them.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Adaptor, AdaptorContext } from "@cellar/adaptors";
import {
  MAX_UINT256,
  MathError,
  WAD,
  formatAmount,
  minBigInt,
  mulDiv,
  mulDivDown,
  mulDivUp,
  parseUint,
} from "@cellar/math";
import type { Rounding } from "@cellar/math";
import { runAtomically } from "@cellar/protocols";
import type { ProtocolEnvironment, ShareVault } from "@cellar/protocols";
import { computePositionHash } from "@cellar/registry";
import type { PositionRegistry } from "@cellar/registry";
import type {
  AccountId,
  AdaptorCall,
  AssetId,
  Checkpointable,
  JsonValue,
  PositionId,
  Restore,
  Timestamp,
} from "@cellar/types";
import {
  CellarError,
  DEFAULT_REBALANCE_DEVIATION,
  DEFAULT_SHARE_LOCK_PERIOD,
  MAX_POSITIONS,
  MAX_REBALANCE_DEVIATION,
  MAX_SHARE_LOCK_PERIOD,
} from "./types.js";
import type {
  ActivePosition,
  CellarConfig,
  CellarDependencies,
  CellarSnapshot,
  PositionBalance,
} from "./types.js";

// =============================================================================
// Internal state
// =============================================================================

interface CellarState {
  adaptorCatalogue: Set<string>;
  positionCatalogue: Set<PositionId>;
  credit: PositionId[];
  debt: PositionId[];
  positions: Map<PositionId, ActivePosition>;
  holdingPosition: PositionId;
  totalSupply: bigint;
  balances: Map<AccountId, bigint>;
  allowances: Map<AccountId, Map<AccountId, bigint>>;
  shareLocks: Map<AccountId, Timestamp>;
  isShutdown: boolean;
  shareLockPeriod: number;
  rebalanceDeviation: bigint;
}

function cloneState(s: CellarState): CellarState {
  const allowances = new Map<AccountId, Map<AccountId, bigint>>();
  for (const [owner, spenders] of s.allowances) {
    allowances.set(owner, new Map(spenders));
  }
  return {
    adaptorCatalogue: new Set(s.adaptorCatalogue),
    positionCatalogue: new Set(s.positionCatalogue),
    credit: [...s.credit],
    debt: [...s.debt],
    positions: new Map(s.positions),
    holdingPosition: s.holdingPosition,
    totalSupply: s.totalSupply,
    balances: new Map(s.balances),
    allowances,
    shareLocks: new Map(s.shareLocks),
    isShutdown: s.isShutdown,
    shareLockPeriod: s.shareLockPeriod,
    rebalanceDeviation: s.rebalanceDeviation,
  };
}

/** Outcome of a strategist batch. */
export interface BatchResult {
  readonly calls: number;
  readonly totalAssetsBefore: bigint;
  readonly totalAssetsAfter: bigint;
}

// =============================================================================
// Cellar
// =============================================================================

export class Cellar implements ShareVault, Checkpointable {
  readonly address: AccountId;
  readonly owner: AccountId;
  readonly asset: AssetId;
  readonly name: string;

  private readonly _registry: PositionRegistry<Adaptor>;
  private readonly _env: ProtocolEnvironment;
  private readonly _logger: Logger;
  private _state: CellarState;
  private _locked = false;
  private _valuing = false;

  constructor(config: CellarConfig, deps: CellarDependencies) {
    this.address = config.address;
    this.owner = config.owner;
    this.asset = config.asset;
    this.name = config.name ?? config.address;
    this._registry = deps.registry;
    this._env = deps.env;
    this._logger = (deps.logger ?? pino({ level: "silent" })).child({ cellar: config.address });

    const shareLockPeriod = config.shareLockPeriod ?? DEFAULT_SHARE_LOCK_PERIOD;
    const rebalanceDeviation = config.rebalanceDeviation ?? DEFAULT_REBALANCE_DEVIATION;
    assertShareLockPeriod(shareLockPeriod);
    assertRebalanceDeviation(rebalanceDeviation);

    this._state = {
      adaptorCatalogue: new Set(),
      positionCatalogue: new Set(),
      credit: [],
      debt: [],
      positions: new Map(),
      holdingPosition: 0,
      totalSupply: 0n,
      balances: new Map(),
      allowances: new Map(),
      shareLocks: new Map(),
      isShutdown: false,
      shareLockPeriod,
      rebalanceDeviation,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Share token views
  // ───────────────────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._state.totalSupply;
  }

  balanceOf(holder: AccountId): bigint {
    return this._state.balances.get(holder) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this._state.allowances.get(owner)?.get(spender) ?? 0n;
  }

  /** Time of the holder's last incoming deposit, if any. */
  shareLockStart(holder: AccountId): Timestamp | undefined {
    return this._state.shareLocks.get(holder);
  }

  get shareLockPeriod(): number {
    return this._state.shareLockPeriod;
  }

  get rebalanceDeviation(): bigint {
    return this._state.rebalanceDeviation;
  }

  get isShutdown(): boolean {
    return this._state.isShutdown;
  }

  get holdingPosition(): PositionId {
    return this._state.holdingPosition;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Position views
  // ───────────────────────────────────────────────────────────────────────

  getCreditPositions(): readonly PositionId[] {
    return [...this._state.credit];
  }

  getDebtPositions(): readonly PositionId[] {
    return [...this._state.debt];
  }

  isPositionUsed(id: PositionId): boolean {
    return this._state.positions.has(id);
  }

  getPositionData(id: PositionId): ActivePosition | undefined {
    return this._state.positions.get(id);
  }

  catalogue(): { readonly adaptors: readonly string[]; readonly positions: readonly PositionId[] } {
    return {
      adaptors: [...this._state.adaptorCatalogue],
      positions: [...this._state.positionCatalogue],
    };
  }

  /**
   * Balance and reserve-asset value of every active position, credit
   * first, each list in its configured order.
   */
  positionBalances(): readonly PositionBalance[] {
    const ctx = this._context();
    const oracle = this._env.oracle;
    return [...this._state.credit, ...this._state.debt].map((id) => {
      const position = this._requirePosition(id);
      const adaptor = this._registry.getAdaptor(position.adaptor);
      const asset = adaptor.assetOf(position.configData, ctx);
      const balance = adaptor.balanceOf(position.configData, ctx);
      return {
        id,
        adaptor: position.adaptor,
        isDebt: position.isDebt,
        asset,
        balance,
        value: oracle.getValue(asset, balance, this.asset),
      };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Valuation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit value minus debt value, in the reserve asset. Never negative:
   * a cellar whose debt outweighs its assets reports 0.
   */
  totalAssets(): bigint {
    // Nested cellars value each other through previewRedeem; a cycle
    // would otherwise recurse without end.
    if (this._valuing) {
      throw new CellarError("VALUATION_CYCLE", `Valuing ${this.address} depends on its own total assets`);
    }
    this._valuing = true;
    try {
      const credit = this._sumValues(this._state.credit);
      const debt = this._sumValues(this._state.debt);
      return credit > debt ? credit - debt : 0n;
    } finally {
      this._valuing = false;
    }
  }

  /**
   * Reserve-asset value that credit positions can release right now.
   */
  totalAssetsWithdrawable(): bigint {
    const ctx = this._context();
    let total = 0n;
    for (const id of this._state.credit) {
      const position = this._requirePosition(id);
      const adaptor = this._registry.getAdaptor(position.adaptor);
      const withdrawable = adaptor.withdrawableFrom(position.configData, position.userConfig, ctx);
      if (withdrawable > 0n) {
        total += this._env.oracle.getValue(adaptor.assetOf(position.configData, ctx), withdrawable, this.asset);
      }
    }
    return total;
  }

  convertToShares(assets: bigint): bigint {
    return this._toShares(assets, this.totalAssets(), "down");
  }

  convertToAssets(shares: bigint): bigint {
    return this._toAssets(shares, this.totalAssets(), "down");
  }

  previewDeposit(assets: bigint): bigint {
    return this._toShares(assets, this.totalAssets(), "down");
  }

  previewMint(shares: bigint): bigint {
    return this._toAssets(shares, this.totalAssets(), "up");
  }

  previewWithdraw(assets: bigint): bigint {
    return this._toShares(assets, this.totalAssets(), "up");
  }

  previewRedeem(shares: bigint): bigint {
    return this._toAssets(shares, this.totalAssets(), "down");
  }

  maxDeposit(_receiver: AccountId): bigint {
    return this._state.isShutdown ? 0n : MAX_UINT256;
  }

  maxMint(_receiver: AccountId): bigint {
    return this._state.isShutdown ? 0n : MAX_UINT256;
  }

  /**
   * The smaller of what the owner's shares are worth and what the
   * positions can release. Zero while the owner's shares are locked.
   */
  maxWithdraw(owner: AccountId): bigint {
    if (this._isLocked(owner)) {
      return 0n;
    }
    const total = this.totalAssets();
    const owned = this._toAssets(this.balanceOf(owner), total, "down");
    return minBigInt(owned, this.totalAssetsWithdrawable());
  }

  maxRedeem(owner: AccountId): bigint {
    if (this._isLocked(owner)) {
      return 0n;
    }
    const shares = this.balanceOf(owner);
    const total = this.totalAssets();
    const withdrawable = this.totalAssetsWithdrawable();
    if (this._toAssets(shares, total, "down") <= withdrawable) {
      return shares;
    }
    return this._toShares(withdrawable, total, "down");
  }

  // ───────────────────────────────────────────────────────────────────────
  // User operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `assets` of the reserve asset from `caller` and mint shares to
   * `receiver`, rounded down. Returns the shares minted.
   */
  deposit(caller: AccountId, assets: bigint, receiver: AccountId): bigint {
    return this._nonReentrant(() => {
      this._assertNotShutdown();
      assertAmount(assets, "Deposit amount");
      const shares = this.previewDeposit(assets);
      if (shares === 0n) {
        throw new CellarError("ZERO_SHARES", `Depositing ${assets.toString()} would mint zero shares`);
      }
      this._atomically(() => this._enter(caller, receiver, assets, shares));
      this._logger.info(
        { caller, receiver, assets: assets.toString(), shares: shares.toString() },
        "Deposit",
      );
      return shares;
    });
  }

  /**
   * Mint exactly `shares` to `receiver`, pulling the required assets
   * (rounded up) from `caller`. Returns the assets pulled.
   */
  mint(caller: AccountId, shares: bigint, receiver: AccountId): bigint {
    return this._nonReentrant(() => {
      this._assertNotShutdown();
      assertAmount(shares, "Mint amount");
      if (shares === 0n) {
        throw new CellarError("ZERO_SHARES", "Cannot mint zero shares");
      }
      const assets = this.previewMint(shares);
      this._atomically(() => this._enter(caller, receiver, assets, shares));
      this._logger.info(
        { caller, receiver, assets: assets.toString(), shares: shares.toString() },
        "Mint",
      );
      return assets;
    });
  }

  /**
   * Burn shares from `owner` (rounded up) and send `assets` to
   * `receiver`. Returns the shares burned.
   */
  withdraw(caller: AccountId, assets: bigint, receiver: AccountId, owner: AccountId): bigint {
    return this._nonReentrant(() => {
      assertAmount(assets, "Withdraw amount");
      this._assertUnlocked(owner);
      const max = this.maxWithdraw(owner);
      if (assets > max) {
        throw new CellarError(
          "EXCEEDS_MAX_WITHDRAW",
          `Cannot withdraw ${assets.toString()}; at most ${max.toString()} is available to ${owner}`,
        );
      }
      const shares = this.previewWithdraw(assets);
      this._atomically(() => this._exit(caller, receiver, owner, assets, shares));
      this._logger.info(
        { caller, receiver, owner, assets: assets.toString(), shares: shares.toString() },
        "Withdraw",
      );
      return shares;
    });
  }

  /**
   * Burn exactly `shares` from `owner` and send what they are worth
   * (rounded down) to `receiver`. Returns the assets sent.
   */
  redeem(caller: AccountId, shares: bigint, receiver: AccountId, owner: AccountId): bigint {
    return this._nonReentrant(() => {
      assertAmount(shares, "Redeem amount");
      this._assertUnlocked(owner);
      const max = this.maxRedeem(owner);
      if (shares > max) {
        throw new CellarError(
          "EXCEEDS_MAX_REDEEM",
          `Cannot redeem ${shares.toString()} shares; at most ${max.toString()} are redeemable for ${owner}`,
        );
      }
      const assets = this.previewRedeem(shares);
      if (assets === 0n) {
        throw new CellarError("ZERO_ASSETS", `Redeeming ${shares.toString()} shares would return zero assets`);
      }
      this._atomically(() => this._exit(caller, receiver, owner, assets, shares));
      this._logger.info(
        { caller, receiver, owner, assets: assets.toString(), shares: shares.toString() },
        "Redeem",
      );
      return assets;
    });
  }

  approve(caller: AccountId, spender: AccountId, shares: bigint): void {
    assertAmount(shares, "Allowance");
    let spenders = this._state.allowances.get(caller);
    if (spenders === undefined) {
      spenders = new Map();
      this._state.allowances.set(caller, spenders);
    }
    spenders.set(spender, shares);
  }

  transfer(caller: AccountId, to: AccountId, shares: bigint): void {
    assertAmount(shares, "Transfer amount");
    this._assertUnlocked(caller);
    this._assertShares(caller, shares);
    this._move(caller, to, shares);
  }

  transferFrom(caller: AccountId, from: AccountId, to: AccountId, shares: bigint): void {
    assertAmount(shares, "Transfer amount");
    this._assertUnlocked(from);
    this._assertShares(from, shares);
    this._spendAllowance(from, caller, shares);
    this._move(from, to, shares);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Catalogue (strategist)
  // ───────────────────────────────────────────────────────────────────────

  addAdaptorToCatalogue(caller: AccountId, identifier: string): void {
    this._assertOwner(caller);
    this._registry.assertAdaptorTrusted(identifier);
    this._state.adaptorCatalogue.add(identifier);
    this._logger.info({ adaptor: identifier }, "Adaptor added to catalogue");
  }

  removeAdaptorFromCatalogue(caller: AccountId, identifier: string): void {
    this._assertOwner(caller);
    this._state.adaptorCatalogue.delete(identifier);
    this._logger.info({ adaptor: identifier }, "Adaptor removed from catalogue");
  }

  addPositionToCatalogue(caller: AccountId, positionId: PositionId): void {
    this._assertOwner(caller);
    this._registry.assertPositionTrusted(positionId);
    this._state.positionCatalogue.add(positionId);
    this._logger.info({ positionId }, "Position added to catalogue");
  }

  removePositionFromCatalogue(caller: AccountId, positionId: PositionId): void {
    this._assertOwner(caller);
    if (this.isPositionUsed(positionId)) {
      throw new CellarError("POSITION_IN_USE", `Position ${String(positionId)} is active and cannot leave the catalogue`);
    }
    this._state.positionCatalogue.delete(positionId);
    this._logger.info({ positionId }, "Position removed from catalogue");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Active positions (strategist)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Insert a catalogued position into the credit or debt list at `index`.
   * `userConfig` is the strategist's per-position settings, read by the
   * adaptor (e.g. `{ isLiquid: false }`).
   */
  addPosition(
    caller: AccountId,
    index: number,
    positionId: PositionId,
    userConfig: JsonValue,
    inDebtArray: boolean,
  ): void {
    this._assertOwner(caller);
    if (this.isPositionUsed(positionId)) {
      throw new CellarError("POSITION_ALREADY_USED", `Position ${String(positionId)} is already active`);
    }
    if (!this._state.positionCatalogue.has(positionId)) {
      throw new CellarError("POSITION_NOT_IN_CATALOGUE", `Position ${String(positionId)} is not in the catalogue`);
    }
    const record = this._registry.assertPositionTrusted(positionId);
    if (!this._state.adaptorCatalogue.has(record.adaptor)) {
      throw new CellarError("ADAPTOR_NOT_IN_CATALOGUE", `Adaptor "${record.adaptor}" is not in the catalogue`);
    }
    const adaptor = this._registry.assertAdaptorTrusted(record.adaptor);
    if (record.isDebt !== inDebtArray) {
      throw new CellarError(
        "DEBT_MISMATCH",
        `Position ${String(positionId)} is ${record.isDebt ? "debt" : "credit"} and cannot join the ${inDebtArray ? "debt" : "credit"} list`,
      );
    }
    adaptor.validateUserConfig(userConfig);
    if (adaptor.nestedVaultsOf(record.configData).includes(this.address)) {
      throw new CellarError("INVALID_POSITION", `Position ${String(positionId)} holds shares of ${this.address} itself`);
    }

    const asset = adaptor.assetOf(record.configData, this._context());
    if (!this._env.oracle.isSupported(asset)) {
      throw new CellarError("ASSET_NOT_SUPPORTED", `The price oracle does not support ${asset}`);
    }

    const list = this._list(inDebtArray);
    if (list.length >= MAX_POSITIONS) {
      throw new CellarError("POSITION_ARRAY_FULL", `The ${inDebtArray ? "debt" : "credit"} list is full (${String(MAX_POSITIONS)})`);
    }
    if (!Number.isInteger(index) || index < 0 || index > list.length) {
      throw new CellarError("INVALID_INDEX", `Index ${String(index)} is outside 0..${String(list.length)}`);
    }

    list.splice(index, 0, positionId);
    this._state.positions.set(positionId, {
      id: positionId,
      adaptor: record.adaptor,
      isDebt: record.isDebt,
      configData: record.configData,
      userConfig,
    });
    // A position that makes nested cellars value each other in a loop
    // never goes live.
    try {
      this.totalAssets();
    } catch (err) {
      list.splice(index, 1);
      this._state.positions.delete(positionId);
      throw err;
    }
    this._logger.info({ positionId, index, isDebt: inDebtArray }, "Position added");
  }

  /**
   * Remove the position at `index`. Only empty positions can leave, and
   * never the holding position.
   */
  removePosition(caller: AccountId, index: number, inDebtArray: boolean): void {
    this._assertOwner(caller);
    const id = this._positionAt(index, inDebtArray);
    if (id === this._state.holdingPosition) {
      throw new CellarError("REMOVING_HOLDING_POSITION", `Position ${String(id)} is the holding position`);
    }
    const position = this._requirePosition(id);
    const balance = this._registry.getAdaptor(position.adaptor).balanceOf(position.configData, this._context());
    if (balance > 0n) {
      throw new CellarError("POSITION_NOT_EMPTY", `Position ${String(id)} still holds ${balance.toString()}`);
    }
    this._list(inDebtArray).splice(index, 1);
    this._state.positions.delete(id);
    this._logger.info({ positionId: id, isDebt: inDebtArray }, "Position removed");
  }

  /** Reorder withdrawal priority. */
  swapPositions(caller: AccountId, index1: number, index2: number, inDebtArray: boolean): void {
    this._assertOwner(caller);
    const a = this._positionAt(index1, inDebtArray);
    const b = this._positionAt(index2, inDebtArray);
    const list = this._list(inDebtArray);
    list[index1] = b;
    list[index2] = a;
  }

  /**
   * Choose where fresh deposits go. Must be an active credit position in
   * the reserve asset; 0 clears it.
   */
  setHoldingPosition(caller: AccountId, positionId: PositionId): void {
    this._assertOwner(caller);
    if (positionId !== 0) {
      const position = this._state.positions.get(positionId);
      if (position === undefined) {
        throw new CellarError("POSITION_NOT_USED", `Position ${String(positionId)} is not active`);
      }
      if (position.isDebt) {
        throw new CellarError("INVALID_HOLDING_POSITION", `Position ${String(positionId)} is a debt position`);
      }
      const asset = this._registry.getAdaptor(position.adaptor).assetOf(position.configData, this._context());
      if (asset !== this.asset) {
        throw new CellarError(
          "INVALID_HOLDING_POSITION",
          `Position ${String(positionId)} holds ${asset}, not the reserve asset ${this.asset}`,
        );
      }
    }
    this._state.holdingPosition = positionId;
    this._logger.info({ positionId }, "Holding position set");
  }

  setShareLockPeriod(caller: AccountId, seconds: number): void {
    this._assertOwner(caller);
    assertShareLockPeriod(seconds);
    this._state.shareLockPeriod = seconds;
  }

  setRebalanceDeviation(caller: AccountId, deviation: bigint): void {
    this._assertOwner(caller);
    assertRebalanceDeviation(deviation);
    this._state.rebalanceDeviation = deviation;
  }

  initiateShutdown(caller: AccountId): void {
    this._assertOwner(caller);
    this._assertNotShutdown();
    this._state.isShutdown = true;
    this._logger.warn("Shutdown initiated");
  }

  liftShutdown(caller: AccountId): void {
    this._assertOwner(caller);
    if (!this._state.isShutdown) {
      throw new CellarError("NOT_SHUTDOWN", `Cellar ${this.address} is not shut down`);
    }
    this._state.isShutdown = false;
    this._logger.info("Shutdown lifted");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Strategist batches
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run strategist calls in order as one all-or-nothing batch.
   *
   * Each target adaptor must be catalogued here and trusted by the
   * registry. After the last call the share supply must be unchanged
   * and totalAssets must lie within the rebalance deviation of its
   * starting value.
   */
  callOnAdaptor(caller: AccountId, calls: readonly AdaptorCall[]): BatchResult {
    this._assertOwner(caller);
    this._assertNotShutdown();
    return this._nonReentrant(() => {
      const supplyBefore = this._state.totalSupply;
      const totalAssetsBefore = this.totalAssets();
      const ctx = this._context();

      try {
        const totalAssetsAfter = this._atomically(() => {
          for (const call of calls) {
            if (!this._state.adaptorCatalogue.has(call.adaptor)) {
              throw new CellarError("ADAPTOR_NOT_IN_CATALOGUE", `Adaptor "${call.adaptor}" is not in the catalogue`);
            }
            const adaptor = this._registry.assertAdaptorTrusted(call.adaptor);
            for (const strategistCall of call.callData) {
              adaptor.execute(strategistCall, ctx);
            }
          }

          const after = this.totalAssets();
          this._assertWithinDeviation(totalAssetsBefore, after);
          if (this._state.totalSupply !== supplyBefore) {
            throw new CellarError(
              "TOTAL_SHARES_CHANGED",
              `Share supply moved from ${supplyBefore.toString()} to ${this._state.totalSupply.toString()} during a batch`,
            );
          }
          return after;
        });

        this._logger.info(
          {
            calls: calls.length,
            totalAssetsBefore: totalAssetsBefore.toString(),
            totalAssetsAfter: totalAssetsAfter.toString(),
          },
          "Adaptor batch committed",
        );
        return { calls: calls.length, totalAssetsBefore, totalAssetsAfter };
      } catch (err) {
        this._logger.warn(
          { calls: calls.length, err: err instanceof Error ? err.message : String(err) },
          "Adaptor batch rolled back",
        );
        throw err;
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Safety
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Remove a position the registry has distrusted, whatever its balance.
   * Anyone may call this. Forcing out the holding position also shuts
   * the cellar down.
   */
  forcePositionOut(index: number, positionId: PositionId, inDebtArray: boolean): void {
    const id = this._positionAt(index, inDebtArray);
    if (id !== positionId) {
      throw new CellarError(
        "INVALID_INDEX",
        `Index ${String(index)} holds position ${String(id)}, not ${String(positionId)}`,
      );
    }
    if (this._registry.isPositionTrusted(positionId)) {
      throw new CellarError("POSITION_STILL_TRUSTED", `Position ${String(positionId)} is still trusted by the registry`);
    }

    this._list(inDebtArray).splice(index, 1);
    this._state.positions.delete(positionId);
    this._logger.warn({ positionId, isDebt: inDebtArray }, "Distrusted position forced out");

    if (this._state.holdingPosition === positionId) {
      this._state.holdingPosition = 0;
      this._state.isShutdown = true;
      this._logger.warn({ positionId }, "Holding position forced out; cellar shut down");
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpoint / Snapshot
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): Restore {
    const saved = cloneState(this._state);
    return () => {
      this._state = cloneState(saved);
    };
  }

  snapshot(): CellarSnapshot {
    const s = this._state;
    const allowances: { owner: AccountId; spender: AccountId; shares: string }[] = [];
    for (const [owner, spenders] of s.allowances) {
      for (const [spender, shares] of spenders) {
        allowances.push({ owner, spender, shares: shares.toString() });
      }
    }
    return {
      version: 1,
      config: {
        address: this.address,
        owner: this.owner,
        asset: this.asset,
        name: this.name,
        shareLockPeriod: s.shareLockPeriod,
        rebalanceDeviation: s.rebalanceDeviation.toString(),
      },
      catalogue: {
        adaptors: [...s.adaptorCatalogue],
        positions: [...s.positionCatalogue],
      },
      creditPositions: [...s.credit],
      debtPositions: [...s.debt],
      positionData: [...s.positions.values()].map((p) => ({
        id: p.id,
        adaptor: p.adaptor,
        isDebt: p.isDebt,
        configData: p.configData,
        userConfig: p.userConfig,
      })),
      holdingPosition: s.holdingPosition,
      totalSupply: s.totalSupply.toString(),
      balances: [...s.balances].map(([account, shares]) => ({ account, shares: shares.toString() })),
      allowances,
      shareLocks: [...s.shareLocks].map(([account, since]) => ({ account, since })),
      isShutdown: s.isShutdown,
    };
  }

  /**
   * Rebuild a cellar from a snapshot. Every active position must still
   * exist in the registry with the same adaptor and config, and the
   * share balances must add up to the recorded supply.
   */
  static fromSnapshot(snapshot: CellarSnapshot, deps: CellarDependencies): Cellar {
    if (snapshot.version !== 1) {
      throw new CellarError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`);
    }
    const cellar = new Cellar(
      {
        address: snapshot.config.address,
        owner: snapshot.config.owner,
        asset: snapshot.config.asset,
        name: snapshot.config.name,
        shareLockPeriod: snapshot.config.shareLockPeriod,
        rebalanceDeviation: parseSnapshotAmount(snapshot.config.rebalanceDeviation, "rebalanceDeviation"),
      },
      deps,
    );

    const positions = new Map<PositionId, ActivePosition>();
    for (const p of snapshot.positionData) {
      const record = deps.registry.getPosition(p.id);
      if (
        record === undefined ||
        record.adaptor !== p.adaptor ||
        record.isDebt !== p.isDebt ||
        record.hash !== computePositionHash(p.adaptor, p.isDebt, p.configData)
      ) {
        throw new CellarError("INVALID_SNAPSHOT", `Position ${String(p.id)} does not match the registry`);
      }
      positions.set(p.id, { ...p });
    }

    const listed = [...snapshot.creditPositions, ...snapshot.debtPositions];
    if (new Set(listed).size !== listed.length || listed.length !== positions.size) {
      throw new CellarError("INVALID_SNAPSHOT", "Active lists and position data disagree");
    }
    for (const [ids, isDebt] of [
      [snapshot.creditPositions, false],
      [snapshot.debtPositions, true],
    ] as const) {
      if (ids.length > MAX_POSITIONS) {
        throw new CellarError("INVALID_SNAPSHOT", `More than ${String(MAX_POSITIONS)} positions in one list`);
      }
      for (const id of ids) {
        if (positions.get(id)?.isDebt !== isDebt) {
          throw new CellarError("INVALID_SNAPSHOT", `Position ${String(id)} is in the wrong list`);
        }
      }
    }
    if (snapshot.holdingPosition !== 0 && !snapshot.creditPositions.includes(snapshot.holdingPosition)) {
      throw new CellarError("INVALID_SNAPSHOT", `Holding position ${String(snapshot.holdingPosition)} is not an active credit position`);
    }

    const balances = new Map<AccountId, bigint>();
    let sum = 0n;
    for (const b of snapshot.balances) {
      const shares = parseSnapshotAmount(b.shares, `balance of ${b.account}`);
      balances.set(b.account, shares);
      sum += shares;
    }
    const totalSupply = parseSnapshotAmount(snapshot.totalSupply, "totalSupply");
    if (sum !== totalSupply) {
      throw new CellarError(
        "INVALID_SNAPSHOT",
        `Balances add up to ${sum.toString()}, recorded supply is ${totalSupply.toString()}`,
      );
    }

    const allowances = new Map<AccountId, Map<AccountId, bigint>>();
    for (const a of snapshot.allowances) {
      let spenders = allowances.get(a.owner);
      if (spenders === undefined) {
        spenders = new Map();
        allowances.set(a.owner, spenders);
      }
      spenders.set(a.spender, parseSnapshotAmount(a.shares, `allowance of ${a.owner}`));
    }

    cellar._state = {
      ...cellar._state,
      adaptorCatalogue: new Set(snapshot.catalogue.adaptors),
      positionCatalogue: new Set(snapshot.catalogue.positions),
      credit: [...snapshot.creditPositions],
      debt: [...snapshot.debtPositions],
      positions,
      holdingPosition: snapshot.holdingPosition,
      totalSupply,
      balances,
      allowances,
      shareLocks: new Map(snapshot.shareLocks.map((l): [AccountId, Timestamp] => [l.account, l.since])),
      isShutdown: snapshot.isShutdown,
    };
    return cellar;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _context(): AdaptorContext {
    return {
      vault: this.address,
      env: this._env,
      positionIdForHash: (hash) => this._registry.getPositionHashToPositionId(hash),
      isPositionUsed: (id) => this.isPositionUsed(id),
    };
  }

  private _atomically<T>(operation: () => T): T {
    return runAtomically([this._env, this], operation);
  }

  private _nonReentrant<T>(operation: () => T): T {
    if (this._locked) {
      throw new CellarError("REENTRANCY", `Cellar ${this.address} is already executing an operation`);
    }
    this._locked = true;
    try {
      return operation();
    } finally {
      this._locked = false;
    }
  }

  private _toShares(assets: bigint, totalAssets: bigint, rounding: Rounding): bigint {
    assertAmount(assets, "Asset amount");
    const supply = this._state.totalSupply;
    if (supply === 0n) {
      return assets;
    }
    if (totalAssets === 0n) {
      throw new CellarError(
        "INSOLVENT",
        `Cellar ${this.address} has ${supply.toString()} shares outstanding and no net assets`,
      );
    }
    return mulDiv(assets, supply, totalAssets, rounding);
  }

  private _toAssets(shares: bigint, totalAssets: bigint, rounding: Rounding): bigint {
    assertAmount(shares, "Share amount");
    const supply = this._state.totalSupply;
    if (supply === 0n) {
      return shares;
    }
    return mulDiv(shares, totalAssets, supply, rounding);
  }

  private _sumValues(ids: readonly PositionId[]): bigint {
    if (ids.length === 0) {
      return 0n;
    }
    const ctx = this._context();
    const assets: AssetId[] = [];
    const balances: bigint[] = [];
    for (const id of ids) {
      const position = this._requirePosition(id);
      const adaptor = this._registry.getAdaptor(position.adaptor);
      assets.push(adaptor.assetOf(position.configData, ctx));
      balances.push(adaptor.balanceOf(position.configData, ctx));
    }
    return this._env.oracle.getValues(assets, balances, this.asset);
  }

  /** Shared tail of deposit and mint. */
  private _enter(caller: AccountId, receiver: AccountId, assets: bigint, shares: bigint): void {
    this._env.tokens.transfer(caller, this.address, this.asset, assets);
    this._mintShares(receiver, shares);
    this._state.shareLocks.set(receiver, this._env.clock.now());

    const holding = this._state.holdingPosition;
    if (holding !== 0) {
      const position = this._requirePosition(holding);
      this._registry
        .getAdaptor(position.adaptor)
        .deposit(assets, position.configData, position.userConfig, this._context());
    }
  }

  /** Shared tail of withdraw and redeem. */
  private _exit(caller: AccountId, receiver: AccountId, owner: AccountId, assets: bigint, shares: bigint): void {
    this._assertShares(owner, shares);
    this._spendAllowance(owner, caller, shares);
    this._burnShares(owner, shares);
    this._pullLiquidity(assets, receiver);
  }

  /**
   * Pay `assets` (reserve-asset value) to `receiver` from credit
   * positions in list order. A position in another asset pays out in
   * its own asset.
   */
  private _pullLiquidity(assets: bigint, receiver: AccountId): void {
    const ctx = this._context();
    const oracle = this._env.oracle;
    let remaining = assets;

    for (const id of [...this._state.credit]) {
      if (remaining === 0n) {
        break;
      }
      const position = this._requirePosition(id);
      const adaptor = this._registry.getAdaptor(position.adaptor);
      const withdrawable = adaptor.withdrawableFrom(position.configData, position.userConfig, ctx);
      if (withdrawable === 0n) {
        continue;
      }

      const positionAsset = adaptor.assetOf(position.configData, ctx);
      const withdrawableValue = oracle.getValue(positionAsset, withdrawable, this.asset);
      let amount: bigint;
      if (withdrawableValue >= remaining) {
        amount = oracle.getValue(this.asset, remaining, positionAsset);
        remaining = 0n;
      } else {
        amount = withdrawable;
        remaining -= withdrawableValue;
      }
      if (amount > 0n) {
        adaptor.withdraw(amount, receiver, position.configData, position.userConfig, ctx);
      }
    }

    if (remaining > 0n) {
      throw new CellarError(
        "INSUFFICIENT_LIQUIDITY",
        `Positions could not release ${remaining.toString()} of ${assets.toString()} ${this.asset}`,
      );
    }
  }

  private _assertWithinDeviation(before: bigint, after: bigint): void {
    const deviation = this._state.rebalanceDeviation;
    const min = mulDivDown(before, WAD - deviation, WAD);
    const max = mulDivUp(before, WAD + deviation, WAD);
    if (after < min || after > max) {
      throw new CellarError(
        "TOTAL_ASSETS_DEVIATION",
        `Total assets moved from ${before.toString()} to ${after.toString()}, outside the allowed ${formatAmount(deviation * 100n, 18)}%`,
      );
    }
  }

  private _mintShares(to: AccountId, shares: bigint): void {
    this._state.balances.set(to, this.balanceOf(to) + shares);
    this._state.totalSupply += shares;
  }

  private _burnShares(from: AccountId, shares: bigint): void {
    this._state.balances.set(from, this.balanceOf(from) - shares);
    this._state.totalSupply -= shares;
  }

  private _move(from: AccountId, to: AccountId, shares: bigint): void {
    this._state.balances.set(from, this.balanceOf(from) - shares);
    this._state.balances.set(to, this.balanceOf(to) + shares);
  }

  private _assertShares(holder: AccountId, shares: bigint): void {
    const held = this.balanceOf(holder);
    if (held < shares) {
      throw new CellarError(
        "INSUFFICIENT_SHARES",
        `${holder} holds ${held.toString()} shares, needs ${shares.toString()}`,
      );
    }
  }

  /** An allowance of MAX_UINT256 is never drawn down. */
  private _spendAllowance(owner: AccountId, spender: AccountId, shares: bigint): void {
    if (owner === spender) {
      return;
    }
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) {
      return;
    }
    if (current < shares) {
      throw new CellarError(
        "INSUFFICIENT_ALLOWANCE",
        `${spender} may move ${current.toString()} of ${owner}'s shares, needs ${shares.toString()}`,
      );
    }
    this.approve(owner, spender, current - shares);
  }

  private _isLocked(holder: AccountId): boolean {
    const since = this._state.shareLocks.get(holder);
    return since !== undefined && this._env.clock.now() < since + this._state.shareLockPeriod;
  }

  private _assertUnlocked(holder: AccountId): void {
    if (this._isLocked(holder)) {
      const since = this._state.shareLocks.get(holder) ?? 0;
      throw new CellarError(
        "SHARES_LOCKED",
        `Shares of ${holder} are locked until ${String(since + this._state.shareLockPeriod)}`,
      );
    }
  }

  private _assertOwner(caller: AccountId): void {
    if (caller !== this.owner) {
      throw new CellarError("UNAUTHORIZED", `${caller} is not the owner of cellar ${this.address}`);
    }
  }

  private _assertNotShutdown(): void {
    if (this._state.isShutdown) {
      throw new CellarError("SHUTDOWN", `Cellar ${this.address} is shut down`);
    }
  }

  private _list(inDebtArray: boolean): PositionId[] {
    return inDebtArray ? this._state.debt : this._state.credit;
  }

  private _positionAt(index: number, inDebtArray: boolean): PositionId {
    const id = this._list(inDebtArray)[index];
    if (id === undefined) {
      throw new CellarError(
        "INVALID_INDEX",
        `No ${inDebtArray ? "debt" : "credit"} position at index ${String(index)}`,
      );
    }
    return id;
  }

  private _requirePosition(id: PositionId): ActivePosition {
    const position = this._state.positions.get(id);
    if (position === undefined) {
      throw new CellarError("POSITION_NOT_USED", `Position ${String(id)} is not active`);
    }
    return position;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function assertAmount(amount: bigint, label: string): void {
  if (amount < 0n) {
    throw new CellarError("INVALID_AMOUNT", `${label} must be non-negative, got ${amount.toString()}`);
  }
}

function assertShareLockPeriod(seconds: number): void {
  if (!Number.isInteger(seconds) || seconds < 0 || seconds > MAX_SHARE_LOCK_PERIOD) {
    throw new CellarError(
      "INVALID_SHARE_LOCK_PERIOD",
      `Share lock period must be an integer in 0..${String(MAX_SHARE_LOCK_PERIOD)} seconds, got ${String(seconds)}`,
    );
  }
}

function assertRebalanceDeviation(deviation: bigint): void {
  if (deviation < 0n || deviation > MAX_REBALANCE_DEVIATION) {
    throw new CellarError(
      "INVALID_REBALANCE_DEVIATION",
      `Rebalance deviation must be within [0, ${MAX_REBALANCE_DEVIATION.toString()}], got ${deviation.toString()}`,
    );
  }
}

function parseSnapshotAmount(raw: string, label: string): bigint {
  try {
    return parseUint(raw);
  } catch (err) {
    if (err instanceof MathError) {
      throw new CellarError("INVALID_SNAPSHOT", `Invalid ${label}: ${err.message}`);
    }
    throw err;
  }
}
