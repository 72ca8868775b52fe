/**
 * Tests for Cellar share accounting: conversions, deposits, mints,
 * withdrawals, redemptions, share locks and allowances.
 */

import { describe, it, expect } from "vitest";
import { MAX_UINT256 } from "@cellar/math";
import {
  ALICE,
  BOB,
  CELLAR,
  STRATEGIST,
  USDC,
  USER_FUNDS,
  captureError,
  makeActiveHarness,
  makeHarness,
} from "./harness.js";

/** 1,000 USDC */
const THOUSAND = 1_000_000_000n;

function unlocked() {
  const h = makeActiveHarness();
  h.cellar.deposit(ALICE, THOUSAND, ALICE);
  h.clock.advance(h.cellar.shareLockPeriod);
  return h;
}

// =============================================================================
// Conversions
// =============================================================================

describe("share conversions", () => {
  it("prices the first deposit 1:1", () => {
    const { cellar } = makeActiveHarness();
    expect(cellar.previewDeposit(THOUSAND)).toBe(THOUSAND);
    expect(cellar.previewMint(THOUSAND)).toBe(THOUSAND);
    expect(cellar.convertToShares(5n)).toBe(5n);
    expect(cellar.convertToAssets(5n)).toBe(5n);
  });

  it("rounds every preview against the caller", () => {
    const { cellar, tokens } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    // 150 assets backing 100 shares
    tokens.mint(CELLAR, USDC, 50n);

    expect(cellar.totalAssets()).toBe(150n);
    // 10 * 100 / 150 = 6.67
    expect(cellar.previewDeposit(10n)).toBe(6n);
    expect(cellar.convertToShares(10n)).toBe(6n);
    expect(cellar.previewWithdraw(10n)).toBe(7n);
    // 7 * 150 / 100 = 10.5
    expect(cellar.previewMint(7n)).toBe(11n);
    expect(cellar.previewRedeem(7n)).toBe(10n);
    expect(cellar.convertToAssets(7n)).toBe(10n);
  });

  it("refuses to price shares once net assets reach zero", () => {
    const { cellar, tokens } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    tokens.burn(CELLAR, USDC, 100n);
    expect(cellar.totalAssets()).toBe(0n);
    expect(captureError(() => cellar.previewDeposit(10n))).toMatchObject({
      code: "INSOLVENT",
      category: "invariant",
    });
    expect(cellar.previewRedeem(100n)).toBe(0n);
  });

  it("rejects negative amounts", () => {
    const { cellar } = makeActiveHarness();
    expect(captureError(() => cellar.previewDeposit(-1n))).toMatchObject({ code: "INVALID_AMOUNT" });
    expect(captureError(() => cellar.deposit(ALICE, -1n, ALICE))).toMatchObject({ code: "INVALID_AMOUNT" });
  });
});

// =============================================================================
// Deposit / Mint
// =============================================================================

describe("deposit and mint", () => {
  it("moves assets in, mints shares and starts the receiver's lock", () => {
    const { cellar, tokens, clock } = makeActiveHarness();
    const shares = cellar.deposit(ALICE, THOUSAND, BOB);

    expect(shares).toBe(THOUSAND);
    expect(cellar.balanceOf(BOB)).toBe(THOUSAND);
    expect(cellar.balanceOf(ALICE)).toBe(0n);
    expect(cellar.totalSupply).toBe(THOUSAND);
    expect(tokens.balanceOf(ALICE, USDC)).toBe(USER_FUNDS - THOUSAND);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(THOUSAND);
    expect(cellar.shareLockStart(BOB)).toBe(clock.now());
    expect(cellar.shareLockStart(ALICE)).toBeUndefined();
  });

  it("mints exact shares and pulls assets rounded up", () => {
    const { cellar, tokens } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    tokens.mint(CELLAR, USDC, 50n);

    const assets = cellar.mint(BOB, 7n, BOB);
    expect(assets).toBe(11n);
    expect(cellar.balanceOf(BOB)).toBe(7n);
    expect(tokens.balanceOf(BOB, USDC)).toBe(USER_FUNDS - 11n);
  });

  it("sends deposits on to the holding position", () => {
    const { cellar, market, positions } = makeActiveHarness();
    cellar.setHoldingPosition(STRATEGIST, positions.usdcCollateral);
    cellar.deposit(ALICE, THOUSAND, ALICE);

    expect(market.collateralOf(`${CELLAR}#0`, USDC)).toBe(THOUSAND);
    expect(cellar.totalAssets()).toBe(THOUSAND);
  });

  it("keeps deposits idle without a holding position", () => {
    const { cellar, tokens } = makeActiveHarness();
    cellar.setHoldingPosition(STRATEGIST, 0);
    cellar.deposit(ALICE, THOUSAND, ALICE);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(THOUSAND);
  });

  it("rejects a deposit that would mint zero shares and keeps the caller's tokens", () => {
    const { cellar, tokens } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    tokens.mint(CELLAR, USDC, 50n);

    expect(captureError(() => cellar.deposit(BOB, 1n, BOB))).toMatchObject({ code: "ZERO_SHARES" });
    expect(captureError(() => cellar.mint(BOB, 0n, BOB))).toMatchObject({ code: "ZERO_SHARES" });
    expect(tokens.balanceOf(BOB, USDC)).toBe(USER_FUNDS);
  });

  it("rolls back the share mint when the asset transfer fails", () => {
    const { cellar } = makeActiveHarness();
    expect(captureError(() => cellar.deposit(ALICE, USER_FUNDS + 1n, ALICE))).toMatchObject({
      code: "INSUFFICIENT_BALANCE",
    });
    expect(cellar.totalSupply).toBe(0n);
    expect(cellar.shareLockStart(ALICE)).toBeUndefined();
  });

  it("closes deposits during shutdown", () => {
    const { cellar } = makeActiveHarness();
    cellar.initiateShutdown(STRATEGIST);
    expect(cellar.maxDeposit(ALICE)).toBe(0n);
    expect(cellar.maxMint(ALICE)).toBe(0n);
    expect(captureError(() => cellar.deposit(ALICE, THOUSAND, ALICE))).toMatchObject({
      code: "SHUTDOWN",
      category: "structural",
    });
    expect(captureError(() => cellar.mint(ALICE, THOUSAND, ALICE))).toMatchObject({ code: "SHUTDOWN" });
  });

  it("has no deposit cap while open", () => {
    const { cellar } = makeHarness();
    expect(cellar.maxDeposit(ALICE)).toBe(MAX_UINT256);
    expect(cellar.maxMint(ALICE)).toBe(MAX_UINT256);
  });
});

// =============================================================================
// Share lock
// =============================================================================

describe("share lock", () => {
  it("locks shares until the lock period has fully elapsed", () => {
    const { cellar, clock } = makeActiveHarness();
    cellar.deposit(ALICE, THOUSAND, ALICE);

    expect(cellar.maxWithdraw(ALICE)).toBe(0n);
    expect(cellar.maxRedeem(ALICE)).toBe(0n);
    expect(captureError(() => cellar.withdraw(ALICE, 1n, ALICE, ALICE))).toMatchObject({
      code: "SHARES_LOCKED",
      category: "invariant",
    });

    clock.advance(1_199);
    expect(captureError(() => cellar.redeem(ALICE, 1n, ALICE, ALICE))).toMatchObject({ code: "SHARES_LOCKED" });

    clock.advance(1);
    expect(cellar.maxWithdraw(ALICE)).toBe(THOUSAND);
    expect(cellar.withdraw(ALICE, 1n, ALICE, ALICE)).toBe(1n);
  });

  it("blocks transfers out of a locked account", () => {
    const { cellar } = makeActiveHarness();
    cellar.deposit(ALICE, THOUSAND, ALICE);
    expect(captureError(() => cellar.transfer(ALICE, BOB, 1n))).toMatchObject({ code: "SHARES_LOCKED" });
  });

  it("restarts the lock on every deposit", () => {
    const { cellar, clock } = makeActiveHarness();
    cellar.deposit(ALICE, THOUSAND, ALICE);
    clock.advance(1_000);
    cellar.deposit(ALICE, THOUSAND, ALICE);
    clock.advance(1_000);
    expect(cellar.maxWithdraw(ALICE)).toBe(0n);
  });

  it("applies a zero lock period immediately", () => {
    const { cellar } = makeActiveHarness({ shareLockPeriod: 0 });
    cellar.deposit(ALICE, THOUSAND, ALICE);
    expect(cellar.maxRedeem(ALICE)).toBe(THOUSAND);
  });
});

// =============================================================================
// Withdraw / Redeem
// =============================================================================

describe("withdraw and redeem", () => {
  it("burns shares and pays the receiver", () => {
    const { cellar, tokens } = unlocked();
    const burned = cellar.withdraw(ALICE, 400_000_000n, BOB, ALICE);

    expect(burned).toBe(400_000_000n);
    expect(cellar.balanceOf(ALICE)).toBe(600_000_000n);
    expect(cellar.totalSupply).toBe(600_000_000n);
    expect(tokens.balanceOf(BOB, USDC)).toBe(USER_FUNDS + 400_000_000n);
  });

  it("burns shares rounded up on withdraw and pays assets rounded down on redeem", () => {
    const { cellar, tokens, clock } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    tokens.mint(CELLAR, USDC, 50n);
    clock.advance(cellar.shareLockPeriod);

    expect(cellar.withdraw(ALICE, 10n, ALICE, ALICE)).toBe(7n);
    // 93 shares over 140 assets: 7 * 140 / 93 = 10.5
    expect(cellar.redeem(ALICE, 7n, ALICE, ALICE)).toBe(10n);
  });

  it("caps withdrawals at the owner's share value", () => {
    const { cellar } = unlocked();
    expect(captureError(() => cellar.withdraw(ALICE, THOUSAND + 1n, ALICE, ALICE))).toMatchObject({
      code: "EXCEEDS_MAX_WITHDRAW",
    });
    expect(captureError(() => cellar.redeem(ALICE, THOUSAND + 1n, ALICE, ALICE))).toMatchObject({
      code: "EXCEEDS_MAX_REDEEM",
    });
  });

  it("rejects a redemption worth zero assets", () => {
    const { cellar, tokens, clock } = makeActiveHarness();
    cellar.deposit(ALICE, 100n, ALICE);
    tokens.burn(CELLAR, USDC, 99n);
    clock.advance(cellar.shareLockPeriod);
    // 1 share = 1 * 1 / 100
    expect(captureError(() => cellar.redeem(ALICE, 1n, ALICE, ALICE))).toMatchObject({ code: "ZERO_ASSETS" });
  });

  it("pulls liquidity from credit positions in list order", () => {
    const { cellar, tokens, market, adaptors } = unlocked();
    cellar.callOnAdaptor(STRATEGIST, [
      {
        adaptor: adaptors.collateral.identifier,
        callData: [{ fn: "lend", args: { underlying: USDC, subAccountId: 0, amount: "600000000" } }],
      },
    ]);
    expect(cellar.totalAssets()).toBe(THOUSAND);
    expect(cellar.totalAssetsWithdrawable()).toBe(THOUSAND);

    cellar.withdraw(ALICE, 700_000_000n, ALICE, ALICE);

    expect(tokens.balanceOf(CELLAR, USDC)).toBe(0n);
    expect(market.collateralOf(`${CELLAR}#0`, USDC)).toBe(300_000_000n);
    expect(tokens.balanceOf(ALICE, USDC)).toBe(USER_FUNDS - THOUSAND + 700_000_000n);
  });

  it("skips positions the strategist marked illiquid", () => {
    const h = makeActiveHarness();
    h.cellar.removePosition(STRATEGIST, 2, false);
    h.cellar.addPosition(STRATEGIST, 2, h.positions.usdcCollateral, { isLiquid: false }, false);
    h.cellar.deposit(ALICE, THOUSAND, ALICE);
    h.clock.advance(h.cellar.shareLockPeriod);
    h.cellar.callOnAdaptor(STRATEGIST, [
      {
        adaptor: h.adaptors.collateral.identifier,
        callData: [{ fn: "lend", args: { underlying: USDC, subAccountId: 0, amount: "600000000" } }],
      },
    ]);

    expect(h.cellar.totalAssets()).toBe(THOUSAND);
    expect(h.cellar.maxWithdraw(ALICE)).toBe(400_000_000n);
    // 400 of 1,000 assets withdrawable: 400 * 1000 / 1000
    expect(h.cellar.maxRedeem(ALICE)).toBe(400_000_000n);
    expect(captureError(() => h.cellar.withdraw(ALICE, 400_000_001n, ALICE, ALICE))).toMatchObject({
      code: "EXCEEDS_MAX_WITHDRAW",
    });
  });

  it("keeps withdrawals open during shutdown", () => {
    const { cellar, tokens } = unlocked();
    cellar.initiateShutdown(STRATEGIST);
    expect(cellar.redeem(ALICE, THOUSAND, ALICE, ALICE)).toBe(THOUSAND);
    expect(tokens.balanceOf(ALICE, USDC)).toBe(USER_FUNDS);
    expect(cellar.totalSupply).toBe(0n);
  });
});

// =============================================================================
// Allowances / Transfers
// =============================================================================

describe("allowances and transfers", () => {
  it("requires an allowance to redeem someone else's shares", () => {
    const { cellar, tokens } = unlocked();
    expect(captureError(() => cellar.redeem(BOB, 100n, BOB, ALICE))).toMatchObject({
      code: "INSUFFICIENT_ALLOWANCE",
      category: "authorization",
    });

    cellar.approve(ALICE, BOB, 150n);
    expect(cellar.redeem(BOB, 100n, BOB, ALICE)).toBe(100n);
    expect(cellar.allowance(ALICE, BOB)).toBe(50n);
    expect(cellar.balanceOf(ALICE)).toBe(THOUSAND - 100n);
    expect(tokens.balanceOf(BOB, USDC)).toBe(USER_FUNDS + 100n);
  });

  it("never draws down an unlimited allowance", () => {
    const { cellar } = unlocked();
    cellar.approve(ALICE, BOB, MAX_UINT256);
    cellar.withdraw(BOB, 100n, BOB, ALICE);
    expect(cellar.allowance(ALICE, BOB)).toBe(MAX_UINT256);
  });

  it("transfers shares without locking the receiver", () => {
    const { cellar } = unlocked();
    cellar.transfer(ALICE, BOB, 300n);
    expect(cellar.balanceOf(ALICE)).toBe(THOUSAND - 300n);
    expect(cellar.balanceOf(BOB)).toBe(300n);
    expect(cellar.shareLockStart(BOB)).toBeUndefined();
    expect(cellar.maxRedeem(BOB)).toBe(300n);
  });

  it("moves shares on behalf of the owner with an allowance", () => {
    const { cellar } = unlocked();
    cellar.approve(ALICE, BOB, 300n);
    cellar.transferFrom(BOB, ALICE, BOB, 300n);
    expect(cellar.balanceOf(BOB)).toBe(300n);
    expect(cellar.allowance(ALICE, BOB)).toBe(0n);
    expect(captureError(() => cellar.transferFrom(BOB, ALICE, BOB, 1n))).toMatchObject({
      code: "INSUFFICIENT_ALLOWANCE",
    });
  });

  it("rejects transfers beyond the balance and leaves the allowance intact", () => {
    const { cellar } = unlocked();
    cellar.approve(ALICE, BOB, MAX_UINT256 - 1n);
    expect(captureError(() => cellar.transferFrom(BOB, ALICE, BOB, THOUSAND + 1n))).toMatchObject({
      code: "INSUFFICIENT_SHARES",
    });
    expect(cellar.allowance(ALICE, BOB)).toBe(MAX_UINT256 - 1n);
    expect(captureError(() => cellar.transfer(ALICE, BOB, THOUSAND + 1n))).toMatchObject({
      code: "INSUFFICIENT_SHARES",
    });
  });
});
