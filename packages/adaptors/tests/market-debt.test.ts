import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { WAD } from "@cellar/math";
import { MarketCollateralAdaptor, MarketDebtAdaptor } from "../src/index.js";
import {
  CELLAR,
  MIN_HEALTH,
  MIN_SELF_HEALTH,
  USDC,
  captureError,
  makeHarness,
} from "./harness.js";

const TEN_THOUSAND_USDC = 10_000_000_000n;

function makeAdaptors() {
  return {
    collateral: new MarketCollateralAdaptor("main", MIN_HEALTH),
    debt: new MarketDebtAdaptor({
      marketId: "main",
      minimumHealthFactor: MIN_HEALTH,
      minimumSelfLeverageHealthFactor: MIN_SELF_HEALTH,
    }),
  };
}

/** Cellar with 10,000 USDC supplied to sub-account 0 and both positions tracked. */
function leveragedSetup() {
  const h = makeHarness();
  const { collateral, debt } = makeAdaptors();
  const config = { underlying: USDC, subAccountId: 0 };
  h.track(collateral, config);
  h.track(debt, config);
  h.tokens.mint(CELLAR, USDC, TEN_THOUSAND_USDC);
  collateral.execute(
    { fn: "lend", args: { underlying: USDC, subAccountId: 0, amount: TEN_THOUSAND_USDC.toString() } },
    h.ctx,
  );
  return { ...h, collateral, debt };
}

describe("MarketDebtAdaptor", () => {
  it("requires 1 < self-leverage minimum <= minimum", () => {
    const build = (min: bigint, selfMin: bigint) =>
      captureError(
        () =>
          new MarketDebtAdaptor({ marketId: "main", minimumHealthFactor: min, minimumSelfLeverageHealthFactor: selfMin }),
      );
    expect(build(MIN_HEALTH, WAD)).toMatchObject({ code: "INVALID_MINIMUM_HEALTH_FACTOR" });
    expect(build(MIN_SELF_HEALTH, MIN_HEALTH)).toMatchObject({ code: "INVALID_MINIMUM_HEALTH_FACTOR" });
    expect(
      new MarketDebtAdaptor({
        marketId: "main",
        minimumHealthFactor: MIN_HEALTH,
        minimumSelfLeverageHealthFactor: MIN_HEALTH,
      }).minimumSelfLeverageHealthFactor,
    ).toBe(MIN_HEALTH);
  });

  it("reports zero withdrawable for every config", () => {
    const { ctx } = makeHarness();
    const { debt } = makeAdaptors();
    fc.assert(
      fc.property(
        fc.constantFrom("USDC", "WETH", "DAI"),
        fc.integer({ min: 0, max: 255 }),
        fc.option(fc.record({ isLiquid: fc.boolean() }), { nil: null }),
        (underlying, subAccountId, userConfig) => {
          expect(debt.withdrawableFrom({ underlying, subAccountId }, userConfig, ctx)).toBe(0n);
        },
      ),
      { numRuns: 100 },
    );
  });

  it("refuses user deposits and withdrawals", () => {
    const { ctx } = makeHarness();
    const { debt } = makeAdaptors();
    const config = { underlying: USDC, subAccountId: 0 };
    expect(captureError(() => debt.deposit(1n, config, null, ctx))).toMatchObject({
      code: "USER_DEPOSITS_NOT_ALLOWED",
      category: "structural",
    });
    expect(captureError(() => debt.withdraw(1n, "alice", config, null, ctx))).toMatchObject({
      code: "USER_WITHDRAWS_NOT_ALLOWED",
      category: "structural",
    });
  });

  it("refuses to borrow against an untracked position", () => {
    const { ctx, market } = makeHarness();
    const { debt } = makeAdaptors();
    expect(
      captureError(() =>
        debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 3, amount: "1" } }, ctx),
      ),
    ).toMatchObject({ code: "DEBT_POSITIONS_MUST_BE_TRACKED", category: "authorization" });
    expect(market.debtOf(`${CELLAR}#3`, USDC)).toBe(0n);
  });

  it("rejects assets the market does not list", () => {
    const { ctx } = makeHarness();
    const { debt } = makeAdaptors();
    expect(
      captureError(() =>
        debt.execute({ fn: "borrow", args: { underlying: "DAI", subAccountId: 0, amount: "1" } }, ctx),
      ),
    ).toMatchObject({ code: "UNDERLYING_NOT_SUPPORTED", category: "external" });
  });

  it("rejects sub-account ids outside 0..255", () => {
    const { ctx } = makeHarness();
    const { debt } = makeAdaptors();
    expect(
      captureError(() =>
        debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 256, amount: "1" } }, ctx),
      ),
    ).toMatchObject({ code: "INVALID_SUB_ACCOUNT_ID" });
  });

  it("rejects malformed arguments", () => {
    const { ctx } = makeHarness();
    const { debt } = makeAdaptors();
    expect(
      captureError(() =>
        debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 0, amount: "1.5" } }, ctx),
      ),
    ).toMatchObject({ code: "INVALID_CALL_DATA" });
    expect(
      captureError(() => debt.execute({ fn: "borrow", args: { underlying: USDC, amount: "1" } }, ctx)),
    ).toMatchObject({ code: "INVALID_CALL_DATA" });
  });

  it("borrows exactly to the minimum health factor and no further", () => {
    const { ctx, debt, tokens, market } = leveragedSetup();
    // 10,000 USDC at a 0.8 collateral factor backs 6,400 USDC at 1.25.
    debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 0, amount: "6400000000" } }, ctx);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(6_400_000_000n);
    expect(debt.balanceOf({ underlying: USDC, subAccountId: 0 }, ctx)).toBe(6_400_000_000n);

    expect(
      captureError(() =>
        debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 0, amount: "1" } }, ctx),
      ),
    ).toMatchObject({ code: "HEALTH_FACTOR_TOO_LOW", category: "invariant" });
    expect(market.debtOf(`${CELLAR}#0`, USDC)).toBe(6_400_000_001n);
  });

  it("repays up to the debt with max", () => {
    const { ctx, debt, tokens } = leveragedSetup();
    debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 0, amount: "1000" } }, ctx);
    tokens.mint(CELLAR, USDC, 5n);
    debt.execute({ fn: "repay", args: { underlying: USDC, subAccountId: 0, amount: "max" } }, ctx);
    expect(debt.balanceOf({ underlying: USDC, subAccountId: 0 }, ctx)).toBe(0n);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(5n);
  });

  it("repays only what the vault holds with max", () => {
    const { ctx, debt, tokens } = leveragedSetup();
    debt.execute({ fn: "borrow", args: { underlying: USDC, subAccountId: 0, amount: "1000" } }, ctx);
    tokens.transfer(CELLAR, "elsewhere", USDC, 400n);
    debt.execute({ fn: "repay", args: { underlying: USDC, subAccountId: 0, amount: "max" } }, ctx);
    expect(debt.balanceOf({ underlying: USDC, subAccountId: 0 }, ctx)).toBe(400n);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(0n);
  });

  it("holds self-leverage to the lower minimum", () => {
    const { ctx, debt, collateral } = leveragedSetup();
    const config = { underlying: USDC, subAccountId: 0 };
    // 0.8 * (10,000 + 32,000) / 32,000 = 1.05
    debt.execute({ fn: "selfBorrow", args: { ...config, amount: "32000000000" } }, ctx);
    expect(collateral.balanceOf(config, ctx)).toBe(42_000_000_000n);
    expect(debt.balanceOf(config, ctx)).toBe(32_000_000_000n);

    expect(
      captureError(() => debt.execute({ fn: "selfBorrow", args: { ...config, amount: "1" } }, ctx)),
    ).toMatchObject({ code: "HEALTH_FACTOR_TOO_LOW" });
  });

  it("unwinds self-leverage with selfRepay max", () => {
    const { ctx, debt, collateral } = leveragedSetup();
    const config = { underlying: USDC, subAccountId: 0 };
    debt.execute({ fn: "selfBorrow", args: { ...config, amount: "5000" } }, ctx);
    debt.execute({ fn: "selfRepay", args: { ...config, amount: "max" } }, ctx);
    expect(debt.balanceOf(config, ctx)).toBe(0n);
    expect(collateral.balanceOf(config, ctx)).toBe(TEN_THOUSAND_USDC);
  });

  it("lists its strategist functions", () => {
    expect(makeAdaptors().debt.functions()).toEqual(["borrow", "repay", "selfBorrow", "selfRepay"]);
    expect(makeAdaptors().debt.identifier).toBe("Market Debt Adaptor V1 (main)");
  });
});
