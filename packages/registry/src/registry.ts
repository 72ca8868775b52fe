/**
 * @cellar/registry — Global position registry.
 *
 * The first tier of the allow-list: an adaptor or position that is not
 * trusted here can never be catalogued or activated by any vault.
 *
 * API surface:
 * - trustAdaptor() / distrustAdaptor() — adaptor allow-list
 * - trustPosition() — create (or look up) a position, returns its id
 * - distrustPosition() — one-way revocation, no retroactive unwind
 * - getPositionHashToPositionId() — content-addressed lookup
 * - snapshot() / fromSnapshot() — durable form
 *
 * There is NO deletion and NO id reuse.
 */

import type { ConfigData } from "@cellar/types";
import { computePositionHash } from "./position-hash.js";
import type {
  AdaptorIdentity,
  PositionHash,
  PositionId,
  PositionRecord,
  RegistrySnapshot,
} from "./types.js";
import { RegistryError } from "./types.js";

interface AdaptorEntry<A extends AdaptorIdentity> {
  readonly adaptor: A;
  trusted: boolean;
}

export class PositionRegistry<A extends AdaptorIdentity = AdaptorIdentity> {
  readonly owner: string;
  private readonly _adaptors: Map<string, AdaptorEntry<A>> = new Map();
  private readonly _positions: Map<PositionId, PositionRecord> = new Map();
  private readonly _hashToId: Map<PositionHash, PositionId> = new Map();
  private _nextPositionId: PositionId = 1;

  constructor(owner: string) {
    this.owner = owner;
  }

  // ─── Adaptors ────────────────────────────────────────────────────────

  /**
   * Mark an adaptor as eligible for use.
   * Re-trusting the same adaptor is a no-op (or lifts a prior distrust).
   */
  trustAdaptor(caller: string, adaptor: A | null | undefined): void {
    this._assertOwner(caller);

    if (adaptor === null || adaptor === undefined) {
      throw new RegistryError("INVALID_ADAPTOR", "Adaptor reference is null");
    }
    if (adaptor.identifier.trim() === "") {
      throw new RegistryError("INVALID_ADAPTOR", "Adaptor identifier must be non-empty");
    }

    const existing = this._adaptors.get(adaptor.identifier);
    if (existing !== undefined) {
      if (existing.adaptor !== adaptor) {
        throw new RegistryError(
          "IDENTIFIER_CONFLICT",
          `Identifier "${adaptor.identifier}" is already held by a different adaptor`,
        );
      }
      existing.trusted = true;
      return;
    }

    this._adaptors.set(adaptor.identifier, { adaptor, trusted: true });
  }

  distrustAdaptor(caller: string, identifier: string): void {
    this._assertOwner(caller);
    this._requireAdaptorEntry(identifier).trusted = false;
  }

  isAdaptorTrusted(identifier: string): boolean {
    return this._adaptors.get(identifier)?.trusted === true;
  }

  /**
   * Get an adaptor by identifier, trusted or not.
   */
  getAdaptor(identifier: string): A {
    return this._requireAdaptorEntry(identifier).adaptor;
  }

  /**
   * Get an adaptor that is currently trusted.
   */
  assertAdaptorTrusted(identifier: string): A {
    const entry = this._requireAdaptorEntry(identifier);
    if (!entry.trusted) {
      throw new RegistryError("ADAPTOR_NOT_TRUSTED", `Adaptor is not trusted: "${identifier}"`);
    }
    return entry.adaptor;
  }

  listAdaptors(): readonly { readonly identifier: string; readonly trusted: boolean }[] {
    return [...this._adaptors.values()].map((e) => ({
      identifier: e.adaptor.identifier,
      trusted: e.trusted,
    }));
  }

  // ─── Positions ───────────────────────────────────────────────────────

  /**
   * Trust an (adaptor, configData) pair and return its position id.
   *
   * The same pair always maps to the same id: a second call returns the
   * id allocated by the first. A pair whose position was distrusted
   * cannot be trusted again.
   */
  trustPosition(caller: string, identifier: string, configData: ConfigData): PositionId {
    this._assertOwner(caller);
    const adaptor = this.assertAdaptorTrusted(identifier);

    try {
      adaptor.validateConfig(configData);
    } catch (err) {
      throw new RegistryError(
        "INVALID_POSITION_CONFIG",
        `Adaptor "${identifier}" rejected the position config: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const isDebt = adaptor.isDebt();
    const hash = computePositionHash(identifier, isDebt, configData);

    const existingId = this._hashToId.get(hash);
    if (existingId !== undefined) {
      const existing = this._requirePosition(existingId);
      if (!existing.trusted) {
        throw new RegistryError(
          "POSITION_DISTRUSTED",
          `Position ${String(existingId)} was distrusted and cannot be trusted again`,
        );
      }
      return existingId;
    }

    const id = this._nextPositionId;
    this._nextPositionId += 1;

    const record: PositionRecord = {
      id,
      hash,
      adaptor: identifier,
      configData,
      isDebt,
      trusted: true,
    };
    this._positions.set(id, record);
    this._hashToId.set(hash, id);

    return id;
  }

  /**
   * Revoke trust in a position.
   * Vaults already holding it keep it until they remove or force it out.
   */
  distrustPosition(caller: string, id: PositionId): void {
    this._assertOwner(caller);
    const record = this._requirePosition(id);
    this._positions.set(id, { ...record, trusted: false });
  }

  /**
   * Pure lookup. Returns 0 when the hash is unknown.
   */
  getPositionHashToPositionId(hash: PositionHash): PositionId {
    return this._hashToId.get(hash) ?? 0;
  }

  getPosition(id: PositionId): PositionRecord | undefined {
    return this._positions.get(id);
  }

  isPositionTrusted(id: PositionId): boolean {
    return this._positions.get(id)?.trusted === true;
  }

  /**
   * Get a position that is currently trusted, with its adaptor.
   */
  assertPositionTrusted(id: PositionId): PositionRecord {
    const record = this._requirePosition(id);
    if (!record.trusted) {
      throw new RegistryError("POSITION_NOT_TRUSTED", `Position is not trusted: ${String(id)}`);
    }
    return record;
  }

  listPositions(): readonly PositionRecord[] {
    return [...this._positions.values()];
  }

  get positionCount(): number {
    return this._positions.size;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      owner: this.owner,
      nextPositionId: this._nextPositionId,
      adaptors: this.listAdaptors(),
      positions: this.listPositions(),
    };
  }

  /**
   * Restore a registry from a snapshot.
   * Adaptor implementations are supplied by the caller; every identifier
   * in the snapshot must be matched, and every stored hash must match
   * its recomputation.
   */
  static fromSnapshot<A extends AdaptorIdentity>(
    snapshot: RegistrySnapshot,
    adaptors: readonly A[],
  ): PositionRegistry<A> {
    const registry = new PositionRegistry<A>(snapshot.owner);
    const byIdentifier = new Map<string, A>(
      adaptors.map((a): [string, A] => [a.identifier, a]),
    );

    for (const entry of snapshot.adaptors) {
      const adaptor = byIdentifier.get(entry.identifier);
      if (adaptor === undefined) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `No implementation supplied for adaptor "${entry.identifier}"`,
        );
      }
      registry._adaptors.set(entry.identifier, { adaptor, trusted: entry.trusted });
    }

    for (const record of snapshot.positions) {
      const expected = computePositionHash(record.adaptor, record.isDebt, record.configData);
      if (expected !== record.hash) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `Hash mismatch for position ${String(record.id)}`,
        );
      }
      if (record.id >= snapshot.nextPositionId) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `Position ${String(record.id)} is not below the id counter ${String(snapshot.nextPositionId)}`,
        );
      }
      registry._positions.set(record.id, { ...record });
      registry._hashToId.set(record.hash, record.id);
    }

    registry._nextPositionId = snapshot.nextPositionId;
    return registry;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertOwner(caller: string): void {
    if (caller !== this.owner) {
      throw new RegistryError("UNAUTHORIZED", `Caller "${caller}" is not the registry owner`);
    }
  }

  private _requireAdaptorEntry(identifier: string): AdaptorEntry<A> {
    const entry = this._adaptors.get(identifier);
    if (entry === undefined) {
      throw new RegistryError("UNKNOWN_ADAPTOR", `Unknown adaptor: "${identifier}"`);
    }
    return entry;
  }

  private _requirePosition(id: PositionId): PositionRecord {
    const record = this._positions.get(id);
    if (record === undefined) {
      throw new RegistryError("UNKNOWN_POSITION", `Unknown position: ${String(id)}`);
    }
    return record;
  }
}
