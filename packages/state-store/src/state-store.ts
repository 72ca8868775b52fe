/**
 * @cellar/state-store — Versioned state persistence.
 *
 * Keeps point-in-time captures of registry and cellar state so a
 * service can stop and resume without losing its ledger.
 *
 * Design principles:
 * - Every record carries a SHA-256 hash of its canonical (RFC 8785) state
 * - Records are versioned per key; the highest version is the current one
 * - A record that fails to parse or verify is an error, never skipped
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { isJsonValue } from "@cellar/types";
import type { JsonValue } from "@cellar/types";
import { StateStoreError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 */
export function computeStateHash(state: JsonValue): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/**
 * A stored state with metadata.
 */
export interface StoredState {
  readonly key: string;
  readonly version: number;
  readonly state: JsonValue;
  /** ISO-8601 */
  readonly createdAt: string;
  /** SHA-256 of the canonical state */
  readonly stateHash: string;
}

export interface SaveStateOptions {
  readonly key: string;
  readonly version: number;
  /** Must be plain JSON: no bigint, undefined, functions or non-finite numbers. */
  readonly state: unknown;
}

/**
 * True when the record's hash matches its state.
 */
export function verifyStateIntegrity(record: StoredState): boolean {
  if (record.stateHash === "") {
    return false;
  }
  return record.stateHash === computeStateHash(record.state);
}

export interface StateStore {
  /**
   * Save a state. Overwrites any record for the same key and version.
   */
  save(options: SaveStateOptions): StoredState;

  /** Highest-version record for the key, if any. */
  load(key: string): StoredState | undefined;

  loadAtVersion(key: string, version: number): StoredState | undefined;

  has(key: string): boolean;

  deleteAll(key: string): void;
}

function buildRecord(options: SaveStateOptions): StoredState {
  if (options.key === "") {
    throw new StateStoreError("INVALID_KEY", "State key must not be empty");
  }
  if (!Number.isSafeInteger(options.version) || options.version < 0) {
    throw new StateStoreError(
      "INVALID_VERSION",
      `Version must be a non-negative integer, got ${String(options.version)}`,
    );
  }
  let state: unknown;
  try {
    state = structuredClone(options.state);
  } catch (err) {
    throw new StateStoreError(
      "INVALID_STATE",
      `State for "${options.key}" cannot be copied: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isJsonValue(state)) {
    throw new StateStoreError("INVALID_STATE", `State for "${options.key}" is not plain JSON`);
  }
  return {
    key: options.key,
    version: options.version,
    state,
    createdAt: new Date().toISOString(),
    stateHash: computeStateHash(state),
  };
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/**
 * In-memory state store. Suitable for tests and development.
 */
export class InMemoryStateStore implements StateStore {
  /** key → version-sorted records */
  private readonly _records = new Map<string, StoredState[]>();

  save(options: SaveStateOptions): StoredState {
    const record = buildRecord(options);
    const records = (this._records.get(options.key) ?? []).filter((r) => r.version !== options.version);
    records.push(record);
    records.sort((a, b) => a.version - b.version);
    this._records.set(options.key, records);
    return record;
  }

  load(key: string): StoredState | undefined {
    const records = this._records.get(key);
    return records?.[records.length - 1];
  }

  loadAtVersion(key: string, version: number): StoredState | undefined {
    return this._records.get(key)?.find((r) => r.version === version);
  }

  has(key: string): boolean {
    return (this._records.get(key)?.length ?? 0) > 0;
  }

  deleteAll(key: string): void {
    this._records.delete(key);
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

const StoredStateSchema = z.object({
  key: z.string().min(1),
  version: z.number().int().nonnegative(),
  state: z.custom<JsonValue>((value) => isJsonValue(value), "state must be plain JSON"),
  createdAt: z.string(),
  stateHash: z.string().regex(/^[0-9a-f]{64}$/),
});

/**
 * File-based state store.
 *
 * One JSON file per record:
 *   <baseDir>/<key>/<version>.json
 */
export class FileStateStore implements StateStore {
  private readonly _baseDir: string;

  constructor(baseDir: string) {
    this._baseDir = baseDir;
    mkdirSync(this._baseDir, { recursive: true });
  }

  get baseDir(): string {
    return this._baseDir;
  }

  save(options: SaveStateOptions): StoredState {
    const record = buildRecord(options);
    mkdirSync(this._keyDir(options.key), { recursive: true });
    writeFileSync(this._recordPath(options.key, options.version), JSON.stringify(record, null, 2), "utf-8");
    return record;
  }

  load(key: string): StoredState | undefined {
    const latest = this._listVersions(key).at(-1);
    return latest === undefined ? undefined : this._readRecord(key, latest);
  }

  loadAtVersion(key: string, version: number): StoredState | undefined {
    return this._readRecord(key, version);
  }

  has(key: string): boolean {
    return this._listVersions(key).length > 0;
  }

  deleteAll(key: string): void {
    const dir = this._keyDir(key);
    if (!existsSync(dir)) {
      return;
    }
    for (const file of readdirSync(dir)) {
      unlinkSync(join(dir, file));
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _keyDir(key: string): string {
    // Keys become directory names
    return join(this._baseDir, key.replace(/[^a-zA-Z0-9_.-]/g, "_"));
  }

  private _recordPath(key: string, version: number): string {
    return join(this._keyDir(key), `${String(version)}.json`);
  }

  private _listVersions(key: string): number[] {
    const dir = this._keyDir(key);
    if (!existsSync(dir)) {
      return [];
    }
    const versions: number[] = [];
    for (const file of readdirSync(dir)) {
      const match = /^(\d+)\.json$/.exec(file);
      if (match?.[1] !== undefined) {
        versions.push(Number(match[1]));
      }
    }
    return versions.sort((a, b) => a - b);
  }

  private _readRecord(key: string, version: number): StoredState | undefined {
    const filePath = this._recordPath(key, version);
    if (!existsSync(filePath)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new StateStoreError(
        "CORRUPT_RECORD",
        `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const parsed = StoredStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateStoreError(
        "CORRUPT_RECORD",
        `${filePath} is not a state record: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }
    const record = parsed.data;
    if (!verifyStateIntegrity(record)) {
      throw new StateStoreError("INTEGRITY_MISMATCH", `${filePath} does not match its state hash`);
    }
    return record;
  }
}
