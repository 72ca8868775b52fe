/**
 * Tests for forced removal of distrusted positions, reentrancy and
 * snapshot / restore.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { BaseAdaptor, functionTable, strategistFunction } from "@cellar/adaptors";
import type { AssetId, ConfigData } from "@cellar/types";
import { Cellar } from "../src/index.js";
import type { CellarSnapshot } from "../src/index.js";
import {
  ALICE,
  BOB,
  CELLAR,
  REGISTRY_OWNER,
  STRATEGIST,
  USDC,
  USER_FUNDS,
  WETH,
  captureError,
  makeActiveHarness,
} from "./harness.js";

// =============================================================================
// forcePositionOut
// =============================================================================

describe("forcePositionOut", () => {
  it("refuses while the registry still trusts the position", () => {
    const { cellar, positions } = makeActiveHarness();
    expect(captureError(() => cellar.forcePositionOut(1, positions.weth, false))).toMatchObject({
      code: "POSITION_STILL_TRUSTED",
      category: "invariant",
    });
  });

  it("requires the index to hold the named position", () => {
    const { cellar, registry, positions } = makeActiveHarness();
    registry.distrustPosition(REGISTRY_OWNER, positions.weth);
    expect(captureError(() => cellar.forcePositionOut(0, positions.weth, false))).toMatchObject({
      code: "INVALID_INDEX",
    });
    expect(captureError(() => cellar.forcePositionOut(5, positions.weth, false))).toMatchObject({
      code: "INVALID_INDEX",
    });
  });

  it("removes a distrusted position whatever its balance", () => {
    const { cellar, registry, positions, tokens } = makeActiveHarness();
    tokens.mint(CELLAR, WETH, 1n);
    registry.distrustPosition(REGISTRY_OWNER, positions.weth);

    cellar.forcePositionOut(1, positions.weth, false);

    expect(cellar.getCreditPositions()).toEqual([positions.usdc, positions.usdcCollateral]);
    expect(cellar.isPositionUsed(positions.weth)).toBe(false);
    expect(cellar.isShutdown).toBe(false);
  });

  it("shuts the cellar down when the holding position is forced out", () => {
    const { cellar, registry, positions } = makeActiveHarness();
    cellar.deposit(ALICE, USER_FUNDS, ALICE);
    registry.distrustPosition(REGISTRY_OWNER, positions.usdc);

    cellar.forcePositionOut(0, positions.usdc, false);

    expect(cellar.holdingPosition).toBe(0);
    expect(cellar.isShutdown).toBe(true);
    expect(cellar.totalAssets()).toBe(0n);
  });

  it("forces out debt positions", () => {
    const { cellar, registry, positions } = makeActiveHarness();
    registry.distrustPosition(REGISTRY_OWNER, positions.wethDebt);
    cellar.forcePositionOut(0, positions.wethDebt, true);
    expect(cellar.getDebtPositions()).toEqual([]);
  });
});

// =============================================================================
// Reentrancy
// =============================================================================

/** Strategist function that calls straight back into the cellar. */
class ReentrantAdaptor extends BaseAdaptor<{ token: string }> {
  readonly identifier = "Reentrant Test Adaptor";
  target: Cellar | undefined;
  protected readonly configSchema = z.object({ token: z.string() });
  protected readonly functionTable = functionTable({
    reenter: strategistFunction(z.object({}), (_args, ctx) => {
      this.target?.deposit(ctx.vault, 1n, ctx.vault);
    }),
  });

  isDebt(): boolean {
    return false;
  }

  assetOf(configData: ConfigData): AssetId {
    return this.decodeConfig(configData).token;
  }

  balanceOf(): bigint {
    return 0n;
  }
}

describe("reentrancy", () => {
  it("rejects a strategist call that deposits back into the cellar", () => {
    const h = makeActiveHarness();
    const adaptor = new ReentrantAdaptor();
    adaptor.target = h.cellar;
    h.registry.trustAdaptor(REGISTRY_OWNER, adaptor);
    h.cellar.addAdaptorToCatalogue(STRATEGIST, adaptor.identifier);
    h.cellar.deposit(ALICE, USER_FUNDS, ALICE);

    expect(
      captureError(() =>
        h.cellar.callOnAdaptor(STRATEGIST, [
          { adaptor: adaptor.identifier, callData: [{ fn: "reenter", args: {} }] },
        ]),
      ),
    ).toMatchObject({ code: "REENTRANCY", category: "structural" });
    expect(h.cellar.totalSupply).toBe(USER_FUNDS);
    expect(h.tokens.balanceOf(CELLAR, USDC)).toBe(USER_FUNDS);

    // The guard is released after the failed batch.
    expect(h.cellar.deposit(BOB, 1n, BOB)).toBe(1n);
  });
});

// =============================================================================
// Snapshot / Restore
// =============================================================================

describe("snapshot", () => {
  function populated() {
    const h = makeActiveHarness();
    h.cellar.deposit(ALICE, USER_FUNDS, ALICE);
    h.cellar.deposit(BOB, 500n, BOB);
    h.cellar.approve(ALICE, BOB, 42n);
    h.cellar.callOnAdaptor(STRATEGIST, [
      {
        adaptor: h.adaptors.collateral.identifier,
        callData: [{ fn: "lend", args: { underlying: USDC, subAccountId: 0, amount: "1000" } }],
      },
    ]);
    return h;
  }

  it("captures the full ledger as plain data", () => {
    const { cellar, positions } = populated();
    const snapshot = cellar.snapshot();

    expect(snapshot.version).toBe(1);
    expect(snapshot.config).toEqual({
      address: CELLAR,
      owner: STRATEGIST,
      asset: USDC,
      name: CELLAR,
      shareLockPeriod: 1_200,
      rebalanceDeviation: "3000000000000000",
    });
    expect(snapshot.creditPositions).toEqual([positions.usdc, positions.weth, positions.usdcCollateral]);
    expect(snapshot.debtPositions).toEqual([positions.wethDebt]);
    expect(snapshot.holdingPosition).toBe(positions.usdc);
    expect(snapshot.totalSupply).toBe("10000000500");
    expect(snapshot.balances).toEqual([
      { account: ALICE, shares: "10000000000" },
      { account: BOB, shares: "500" },
    ]);
    expect(snapshot.allowances).toEqual([{ owner: ALICE, spender: BOB, shares: "42" }]);
    expect(snapshot.shareLocks).toEqual([
      { account: ALICE, since: 1_000 },
      { account: BOB, since: 1_000 },
    ]);
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  it("restores an identical cellar", () => {
    const { cellar, registry, env } = populated();
    const snapshot = cellar.snapshot();
    const restored = Cellar.fromSnapshot(snapshot, { registry, env });

    expect(restored.snapshot()).toEqual(snapshot);
    expect(restored.totalAssets()).toBe(cellar.totalAssets());
    expect(restored.allowance(ALICE, BOB)).toBe(42n);
  });

  it("rejects a snapshot whose balances do not add up", () => {
    const { cellar, registry, env } = populated();
    const snapshot: CellarSnapshot = { ...cellar.snapshot(), totalSupply: "1" };
    expect(captureError(() => Cellar.fromSnapshot(snapshot, { registry, env }))).toMatchObject({
      code: "INVALID_SNAPSHOT",
    });
  });

  it("rejects a snapshot whose positions disagree with the registry", () => {
    const { cellar, registry, env, positions } = populated();
    const original = cellar.snapshot();
    const snapshot: CellarSnapshot = {
      ...original,
      positionData: original.positionData.map((p) =>
        p.id === positions.usdc ? { ...p, configData: { token: "DAI" } } : p,
      ),
    };
    expect(captureError(() => Cellar.fromSnapshot(snapshot, { registry, env }))).toMatchObject({
      code: "INVALID_SNAPSHOT",
    });
  });

  it("rejects a snapshot that lists a position twice", () => {
    const { cellar, registry, env, positions } = populated();
    const original = cellar.snapshot();
    const snapshot: CellarSnapshot = {
      ...original,
      debtPositions: [...original.debtPositions, positions.usdc],
    };
    expect(captureError(() => Cellar.fromSnapshot(snapshot, { registry, env }))).toMatchObject({
      code: "INVALID_SNAPSHOT",
    });
  });

  it("rejects malformed amounts", () => {
    const { cellar, registry, env } = populated();
    const snapshot: CellarSnapshot = { ...cellar.snapshot(), totalSupply: "-5" };
    expect(captureError(() => Cellar.fromSnapshot(snapshot, { registry, env }))).toMatchObject({
      code: "INVALID_SNAPSHOT",
    });
  });
});

describe("checkpoint", () => {
  it("restores share balances and positions", () => {
    const { cellar, positions } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    const restore = cellar.checkpoint();

    cellar.deposit(BOB, 50n, BOB);
    cellar.removePosition(STRATEGIST, 1, false);
    restore();

    expect(cellar.totalSupply).toBe(100n);
    expect(cellar.balanceOf(BOB)).toBe(0n);
    expect(cellar.getCreditPositions()).toContain(positions.weth);
  });
});
