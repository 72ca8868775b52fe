/**
 * Tests for InMemoryStateStore and FileStateStore.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  FileStateStore,
  InMemoryStateStore,
  computeStateHash,
  verifyStateIntegrity,
} from "../src/index.js";
import type { StateStore, StoredState } from "../src/index.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

// =============================================================================
// Shared suite
// =============================================================================

function runSharedTests(createStore: () => StateStore) {
  describe("save and load", () => {
    it("saves and loads a record", () => {
      const store = createStore();
      const saved = store.save({ key: "cellar-1", version: 5, state: { supply: "42", name: "test" } });

      const record = store.load("cellar-1");
      expect(record?.key).toBe("cellar-1");
      expect(record?.version).toBe(5);
      expect(record?.state).toEqual({ supply: "42", name: "test" });
      expect(record?.stateHash).toBe(saved.stateHash);
      expect(record?.stateHash).toBe(computeStateHash({ name: "test", supply: "42" }));
    });

    it("returns undefined for an unknown key", () => {
      expect(createStore().load("nope")).toBeUndefined();
    });

    it("loads the highest version", () => {
      const store = createStore();
      store.save({ key: "k", version: 1, state: { v: 1 } });
      store.save({ key: "k", version: 10, state: { v: 10 } });
      store.save({ key: "k", version: 3, state: { v: 3 } });
      expect(store.load("k")?.state).toEqual({ v: 10 });
    });

    it("copies the state on save", () => {
      const store = createStore();
      const state = { items: ["a"] };
      store.save({ key: "k", version: 1, state });
      state.items.push("b");
      expect(store.load("k")?.state).toEqual({ items: ["a"] });
    });
  });

  describe("loadAtVersion", () => {
    it("loads a specific version", () => {
      const store = createStore();
      store.save({ key: "k", version: 1, state: { v: 1 } });
      store.save({ key: "k", version: 3, state: { v: 3 } });
      expect(store.loadAtVersion("k", 1)?.state).toEqual({ v: 1 });
      expect(store.loadAtVersion("k", 2)).toBeUndefined();
      expect(store.loadAtVersion("other", 1)).toBeUndefined();
    });

    it("overwrites a record at the same version", () => {
      const store = createStore();
      store.save({ key: "k", version: 3, state: { old: true } });
      store.save({ key: "k", version: 3, state: { new: true } });
      expect(store.loadAtVersion("k", 3)?.state).toEqual({ new: true });
    });
  });

  describe("has and deleteAll", () => {
    it("tracks whether a key has records", () => {
      const store = createStore();
      expect(store.has("k")).toBe(false);
      store.save({ key: "k", version: 1, state: {} });
      expect(store.has("k")).toBe(true);
    });

    it("deletes every record for one key only", () => {
      const store = createStore();
      store.save({ key: "a", version: 1, state: { v: 1 } });
      store.save({ key: "a", version: 2, state: { v: 2 } });
      store.save({ key: "b", version: 1, state: { v: 1 } });

      store.deleteAll("a");
      store.deleteAll("missing");

      expect(store.has("a")).toBe(false);
      expect(store.load("a")).toBeUndefined();
      expect(store.has("b")).toBe(true);
    });
  });

  describe("validation", () => {
    it("rejects state that is not plain JSON", () => {
      const store = createStore();
      expect(captureError(() => store.save({ key: "k", version: 1, state: { amount: 1n } }))).toMatchObject({
        code: "INVALID_STATE",
      });
      expect(captureError(() => store.save({ key: "k", version: 1, state: { f: () => 1 } }))).toMatchObject({
        code: "INVALID_STATE",
      });
    });

    it("rejects bad keys and versions", () => {
      const store = createStore();
      expect(captureError(() => store.save({ key: "", version: 1, state: {} }))).toMatchObject({
        code: "INVALID_KEY",
      });
      expect(captureError(() => store.save({ key: "k", version: -1, state: {} }))).toMatchObject({
        code: "INVALID_VERSION",
      });
      expect(captureError(() => store.save({ key: "k", version: 1.5, state: {} }))).toMatchObject({
        code: "INVALID_VERSION",
      });
    });
  });
}

describe("InMemoryStateStore", () => {
  runSharedTests(() => new InMemoryStateStore());
});

describe("FileStateStore", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "cellar-state-test-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  runSharedTests(() => new FileStateStore(join(testDir, "state")));

  it("keeps records across store instances", () => {
    const dir = join(testDir, "persistent");
    new FileStateStore(dir).save({ key: "cellar-1", version: 7, state: { supply: "100" } });

    const record = new FileStateStore(dir).load("cellar-1");
    expect(record?.version).toBe(7);
    expect(record?.state).toEqual({ supply: "100" });
  });

  it("creates its base directory", () => {
    const dir = join(testDir, "deep", "nested");
    const store = new FileStateStore(dir);
    expect(existsSync(dir)).toBe(true);
    expect(store.baseDir).toBe(dir);
  });

  it("sanitizes keys for the filesystem", () => {
    const store = new FileStateStore(join(testDir, "sanitize"));
    store.save({ key: "cellars/main:usdc", version: 1, state: { safe: true } });
    expect(existsSync(join(testDir, "sanitize", "cellars_main_usdc", "1.json"))).toBe(true);
    expect(store.load("cellars/main:usdc")?.state).toEqual({ safe: true });
  });

  it("fails on a record that is not JSON", () => {
    const store = new FileStateStore(join(testDir, "corrupt"));
    store.save({ key: "k", version: 1, state: {} });
    writeFileSync(join(testDir, "corrupt", "k", "1.json"), "{ not json", "utf-8");
    expect(captureError(() => store.load("k"))).toMatchObject({ code: "CORRUPT_RECORD", category: "external" });
  });

  it("fails on a record with the wrong shape", () => {
    const store = new FileStateStore(join(testDir, "shape"));
    store.save({ key: "k", version: 1, state: {} });
    writeFileSync(join(testDir, "shape", "k", "1.json"), JSON.stringify({ key: "k", version: 1 }), "utf-8");
    expect(captureError(() => store.load("k"))).toMatchObject({ code: "CORRUPT_RECORD" });
  });

  it("fails on a record whose state was edited", () => {
    const store = new FileStateStore(join(testDir, "tampered"));
    const saved = store.save({ key: "k", version: 1, state: { supply: "1" } });
    writeFileSync(
      join(testDir, "tampered", "k", "1.json"),
      JSON.stringify({ ...saved, state: { supply: "1000" } }),
      "utf-8",
    );
    expect(captureError(() => store.load("k"))).toMatchObject({
      code: "INTEGRITY_MISMATCH",
      category: "invariant",
    });
  });
});

// =============================================================================
// Integrity
// =============================================================================

describe("computeStateHash", () => {
  it("produces 64 hex characters", () => {
    expect(computeStateHash({ key: "value" })).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order", () => {
    expect(computeStateHash({ b: 2, a: 1 })).toBe(computeStateHash({ a: 1, b: 2 }));
  });

  it("changes with the state", () => {
    expect(computeStateHash({ x: 1 })).not.toBe(computeStateHash({ x: 2 }));
  });
});

describe("verifyStateIntegrity", () => {
  const state = { balances: [{ account: "alice", shares: "100" }] };
  const record: StoredState = {
    key: "k",
    version: 1,
    state,
    createdAt: "2026-01-01T00:00:00Z",
    stateHash: computeStateHash(state),
  };

  it("accepts a matching record", () => {
    expect(verifyStateIntegrity(record)).toBe(true);
  });

  it("rejects an edited state", () => {
    expect(verifyStateIntegrity({ ...record, state: { balances: [] } })).toBe(false);
  });

  it("rejects an empty hash", () => {
    expect(verifyStateIntegrity({ ...record, stateHash: "" })).toBe(false);
  });
});
