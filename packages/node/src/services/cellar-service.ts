/**
 * CellarService — the registry, the simulated protocol environment and
 * every cellar hosted by this node, behind one facade.
 *
 * Route handlers call into this service; they never touch the registry
 * or a cellar directly. Every successful mutation is written to the
 * state store before the call returns.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import type { Adaptor } from "@cellar/adaptors";
import { describeIssues } from "@cellar/adaptors";
import { runAtomically } from "@cellar/protocols";
import { PositionRegistry, computePositionHash } from "@cellar/registry";
import { InMemoryStateStore } from "@cellar/state-store";
import type { StateStore } from "@cellar/state-store";
import type { AccountId, AssetId, ConfigData, PositionId, PositionRecord } from "@cellar/types";
import { Cellar } from "@cellar/vault";
import type { CellarDependencies } from "@cellar/vault";
import { ServiceError } from "./errors.js";
import { buildEnvironment } from "./environment.js";
import type { AdaptorRiskSettings, ProtocolsFile, SimulatedEnvironment } from "./environment.js";
import { CellarIndexSchema, CellarSnapshotSchema, RegistrySnapshotSchema } from "./snapshots.js";

// =============================================================================
// Types
// =============================================================================

export interface CellarServiceConfig {
  readonly registryOwner: AccountId;
  readonly protocols: ProtocolsFile;
  readonly risk: AdaptorRiskSettings;
  readonly defaultShareLockPeriod: number;
  readonly defaultRebalanceDeviation: bigint;
  /** Defaults to an in-memory store. */
  readonly store?: StateStore;
  /** Defaults to a silent logger. */
  readonly logger?: Logger;
}

export interface CreateCellarInput {
  readonly address: AccountId;
  readonly asset: AssetId;
  readonly name?: string | undefined;
  readonly shareLockPeriod?: number | undefined;
  readonly rebalanceDeviation?: bigint | undefined;
}

export interface AvailableAdaptor {
  readonly identifier: string;
  readonly isDebt: boolean;
  /** Known to the registry, trusted or not. */
  readonly registered: boolean;
  readonly trusted: boolean;
}

export interface CellarSummary {
  readonly address: AccountId;
  readonly owner: AccountId;
  readonly asset: AssetId;
  readonly name: string;
  readonly totalAssets: string;
  readonly totalAssetsWithdrawable: string;
  readonly totalSupply: string;
  readonly shareLockPeriod: number;
  readonly rebalanceDeviation: string;
  readonly isShutdown: boolean;
  readonly holdingPosition: PositionId;
  readonly creditPositions: readonly PositionId[];
  readonly debtPositions: readonly PositionId[];
}

export interface PositionBalanceView {
  readonly id: PositionId;
  readonly adaptor: string;
  readonly isDebt: boolean;
  readonly asset: AssetId;
  readonly balance: string;
  readonly value: string;
}

export interface ShareholderView {
  readonly account: AccountId;
  readonly shares: string;
  readonly assets: string;
  readonly maxWithdraw: string;
  readonly maxRedeem: string;
  readonly shareLockStart: number | null;
}

const REGISTRY_KEY = "registry";
const CELLAR_INDEX_KEY = "cellars";
const cellarKey = (address: AccountId): string => `cellar:${address}`;

// =============================================================================
// Service
// =============================================================================

export class CellarService {
  readonly environment: SimulatedEnvironment;
  readonly registry: PositionRegistry<Adaptor>;
  private readonly _config: CellarServiceConfig;
  private readonly _store: StateStore;
  private readonly _logger: Logger;
  private readonly _available: ReadonlyMap<string, Adaptor>;
  private readonly _cellars = new Map<AccountId, Cellar>();

  constructor(config: CellarServiceConfig) {
    this._config = config;
    this._store = config.store ?? new InMemoryStateStore();
    this._logger = config.logger ?? pino({ level: "silent" });
    this.environment = buildEnvironment(config.protocols, config.risk);
    this._available = new Map(this.environment.adaptors.map((a): [string, Adaptor] => [a.identifier, a]));

    this.registry = this._restoreRegistry();
    this._restoreCellars();
  }

  // ─── Registry ─────────────────────────────────────────────────────────

  get registryOwner(): AccountId {
    return this.registry.owner;
  }

  listAdaptors(): readonly AvailableAdaptor[] {
    const registered = new Set(this.registry.listAdaptors().map((a) => a.identifier));
    return [...this._available.values()].map((adaptor) => ({
      identifier: adaptor.identifier,
      isDebt: adaptor.isDebt(),
      registered: registered.has(adaptor.identifier),
      trusted: this.registry.isAdaptorTrusted(adaptor.identifier),
    }));
  }

  trustAdaptor(caller: AccountId, identifier: string): void {
    const adaptor = this._available.get(identifier);
    if (adaptor === undefined) {
      throw new ServiceError("ADAPTOR_NOT_AVAILABLE", `No adaptor implementation named "${identifier}"`);
    }
    this.registry.trustAdaptor(caller, adaptor);
    this._saveRegistry();
    this._logger.info({ adaptor: identifier }, "Adaptor trusted");
  }

  distrustAdaptor(caller: AccountId, identifier: string): void {
    this.registry.distrustAdaptor(caller, identifier);
    this._saveRegistry();
    this._logger.warn({ adaptor: identifier }, "Adaptor distrusted");
  }

  trustPosition(caller: AccountId, identifier: string, configData: ConfigData): PositionRecord {
    const id = this.registry.trustPosition(caller, identifier, configData);
    this._saveRegistry();
    this._logger.info({ adaptor: identifier, positionId: id }, "Position trusted");
    return this._requirePosition(id);
  }

  distrustPosition(caller: AccountId, id: PositionId): PositionRecord {
    this.registry.distrustPosition(caller, id);
    this._saveRegistry();
    this._logger.warn({ positionId: id }, "Position distrusted");
    return this._requirePosition(id);
  }

  getPosition(id: PositionId): PositionRecord | undefined {
    return this.registry.getPosition(id);
  }

  listPositions(): readonly PositionRecord[] {
    return this.registry.listPositions();
  }

  /**
   * Id of the position for (adaptor, configData), or 0 when none was trusted.
   */
  lookupPosition(identifier: string, configData: ConfigData): PositionId {
    const adaptor = this._available.get(identifier);
    if (adaptor === undefined) {
      return 0;
    }
    return this.registry.getPositionHashToPositionId(
      computePositionHash(identifier, adaptor.isDebt(), configData),
    );
  }

  // ─── Cellars ──────────────────────────────────────────────────────────

  createCellar(caller: AccountId, input: CreateCellarInput): Cellar {
    if (this._cellars.has(input.address)) {
      throw new ServiceError("CELLAR_EXISTS", `A cellar already exists at ${input.address}`);
    }
    const cellar = new Cellar(
      {
        address: input.address,
        owner: caller,
        asset: input.asset,
        ...(input.name !== undefined ? { name: input.name } : {}),
        shareLockPeriod: input.shareLockPeriod ?? this._config.defaultShareLockPeriod,
        rebalanceDeviation: input.rebalanceDeviation ?? this._config.defaultRebalanceDeviation,
      },
      this._cellarDeps(),
    );
    this.environment.env.vaults.register(cellar);
    this._cellars.set(cellar.address, cellar);
    this._saveCellar(cellar);
    this._saveCellarIndex();
    this._logger.info({ cellar: cellar.address, owner: caller, asset: input.asset }, "Cellar created");
    return cellar;
  }

  listCellars(): readonly Cellar[] {
    return [...this._cellars.values()];
  }

  getCellar(address: AccountId): Cellar {
    const cellar = this._cellars.get(address);
    if (cellar === undefined) {
      throw new ServiceError("CELLAR_NOT_FOUND", `No cellar at ${address}`);
    }
    return cellar;
  }

  /**
   * Run a mutation against one cellar and persist every hosted cellar it
   * changed. Nested cellars move together: depositing into an inner
   * cellar changes its books as well as the caller's.
   *
   * Memory and store stay in step. If the mutation or any write throws,
   * the environment and all cellars roll back, and cellars already
   * written are written again with their restored state.
   */
  updateCellar<T>(address: AccountId, fn: (cellar: Cellar) => T): T {
    const cellar = this.getCellar(address);
    const hosted = [...this._cellars.values()];
    const before = new Map(hosted.map((c): [AccountId, string] => [c.address, JSON.stringify(c.snapshot())]));
    const written: Cellar[] = [];
    try {
      return runAtomically([this.environment.env, ...hosted], () => {
        const result = fn(cellar);
        for (const changed of hosted.filter((c) => JSON.stringify(c.snapshot()) !== before.get(c.address))) {
          this._saveCellar(changed);
          written.push(changed);
        }
        return result;
      });
    } catch (err) {
      for (const restored of written) {
        this._saveCellar(restored);
      }
      throw err;
    }
  }

  summarize(cellar: Cellar): CellarSummary {
    return {
      address: cellar.address,
      owner: cellar.owner,
      asset: cellar.asset,
      name: cellar.name,
      totalAssets: cellar.totalAssets().toString(),
      totalAssetsWithdrawable: cellar.totalAssetsWithdrawable().toString(),
      totalSupply: cellar.totalSupply.toString(),
      shareLockPeriod: cellar.shareLockPeriod,
      rebalanceDeviation: cellar.rebalanceDeviation.toString(),
      isShutdown: cellar.isShutdown,
      holdingPosition: cellar.holdingPosition,
      creditPositions: cellar.getCreditPositions(),
      debtPositions: cellar.getDebtPositions(),
    };
  }

  positionBalances(cellar: Cellar): readonly PositionBalanceView[] {
    return cellar.positionBalances().map((p) => ({
      id: p.id,
      adaptor: p.adaptor,
      isDebt: p.isDebt,
      asset: p.asset,
      balance: p.balance.toString(),
      value: p.value.toString(),
    }));
  }

  shareholder(cellar: Cellar, account: AccountId): ShareholderView {
    const shares = cellar.balanceOf(account);
    return {
      account,
      shares: shares.toString(),
      assets: cellar.convertToAssets(shares).toString(),
      maxWithdraw: cellar.maxWithdraw(account).toString(),
      maxRedeem: cellar.maxRedeem(account).toString(),
      shareLockStart: cellar.shareLockStart(account) ?? null,
    };
  }

  // ─── Environment ──────────────────────────────────────────────────────

  tokenBalance(account: AccountId, asset: AssetId): bigint {
    return this.environment.tokens.balanceOf(account, asset);
  }

  /**
   * Readiness: every hosted cellar can still be valued.
   */
  checkCellars(): { readonly ok: boolean; readonly failures: readonly { cellar: AccountId; error: string }[] } {
    const failures: { cellar: AccountId; error: string }[] = [];
    for (const cellar of this._cellars.values()) {
      try {
        cellar.totalAssets();
      } catch (err) {
        failures.push({ cellar: cellar.address, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return { ok: failures.length === 0, failures };
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private _cellarDeps(): CellarDependencies {
    return { registry: this.registry, env: this.environment.env, logger: this._logger };
  }

  private _requirePosition(id: PositionId): PositionRecord {
    const record = this.registry.getPosition(id);
    if (record === undefined) {
      throw new ServiceError("INVALID_STORED_STATE", `Registry lost position ${String(id)}`);
    }
    return record;
  }

  private _restoreRegistry(): PositionRegistry<Adaptor> {
    const record = this._store.load(REGISTRY_KEY);
    if (record === undefined) {
      return new PositionRegistry<Adaptor>(this._config.registryOwner);
    }
    const snapshot = parseStored(RegistrySnapshotSchema, record.state, REGISTRY_KEY);
    const registry = PositionRegistry.fromSnapshot(snapshot, this.environment.adaptors);
    if (registry.owner !== this._config.registryOwner) {
      this._logger.warn(
        { storedOwner: registry.owner, configuredOwner: this._config.registryOwner },
        "Stored registry owner differs from configuration; keeping the stored owner",
      );
    }
    this._logger.info(
      { adaptors: registry.listAdaptors().length, positions: registry.positionCount, version: record.version },
      "Registry restored",
    );
    return registry;
  }

  private _restoreCellars(): void {
    const index = this._store.load(CELLAR_INDEX_KEY);
    if (index === undefined) {
      return;
    }
    const { cellars } = parseStored(CellarIndexSchema, index.state, CELLAR_INDEX_KEY);
    for (const address of cellars) {
      const key = cellarKey(address);
      const record = this._store.load(key);
      if (record === undefined) {
        throw new ServiceError("INVALID_STORED_STATE", `Cellar index lists ${address} but no record exists`);
      }
      const cellar = Cellar.fromSnapshot(parseStored(CellarSnapshotSchema, record.state, key), this._cellarDeps());
      this.environment.env.vaults.register(cellar);
      this._cellars.set(cellar.address, cellar);
      this._logger.info({ cellar: address, version: record.version }, "Cellar restored");
    }
  }

  private _nextVersion(key: string): number {
    return (this._store.load(key)?.version ?? 0) + 1;
  }

  private _saveRegistry(): void {
    this._store.save({ key: REGISTRY_KEY, version: this._nextVersion(REGISTRY_KEY), state: this.registry.snapshot() });
  }

  private _saveCellar(cellar: Cellar): void {
    const key = cellarKey(cellar.address);
    this._store.save({ key, version: this._nextVersion(key), state: cellar.snapshot() });
  }

  private _saveCellarIndex(): void {
    this._store.save({
      key: CELLAR_INDEX_KEY,
      version: this._nextVersion(CELLAR_INDEX_KEY),
      state: { cellars: [...this._cellars.keys()] },
    });
  }
}

function parseStored<T>(schema: ZodType<T, ZodTypeDef, unknown>, state: unknown, key: string): T {
  const parsed = schema.safeParse(state);
  if (!parsed.success) {
    throw new ServiceError("INVALID_STORED_STATE", `Stored "${key}" has the wrong shape: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
