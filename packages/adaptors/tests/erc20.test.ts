import { describe, it, expect } from "vitest";
import { Erc20Adaptor } from "../src/index.js";
import { CELLAR, USDC, captureError, makeHarness } from "./harness.js";

describe("Erc20Adaptor", () => {
  const adaptor = new Erc20Adaptor();

  it("reports the vault's token balance as balance and withdrawable", () => {
    const { tokens, ctx } = makeHarness();
    tokens.mint(CELLAR, USDC, 750n);

    expect(adaptor.isDebt()).toBe(false);
    expect(adaptor.assetOf({ token: USDC })).toBe(USDC);
    expect(adaptor.balanceOf({ token: USDC }, ctx)).toBe(750n);
    expect(adaptor.withdrawableFrom({ token: USDC }, null, ctx)).toBe(750n);
  });

  it("withdraws to the receiver", () => {
    const { tokens, ctx } = makeHarness();
    tokens.mint(CELLAR, USDC, 750n);
    adaptor.withdraw(250n, "alice", { token: USDC }, null, ctx);
    expect(tokens.balanceOf("alice", USDC)).toBe(250n);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(500n);
  });

  it("leaves deposits where they are", () => {
    const { tokens, ctx } = makeHarness();
    tokens.mint(CELLAR, USDC, 10n);
    adaptor.deposit(10n, { token: USDC }, null, ctx);
    expect(tokens.balanceOf(CELLAR, USDC)).toBe(10n);
  });

  it("rejects malformed config", () => {
    expect(captureError(() => adaptor.validateConfig({ token: "" }))).toMatchObject({
      code: "INVALID_CONFIG",
      category: "structural",
      adaptor: "ERC20 Adaptor V1",
    });
    expect(captureError(() => adaptor.validateConfig({ token: USDC, extra: 1 }))).toMatchObject({
      code: "INVALID_CONFIG",
    });
    expect(captureError(() => adaptor.validateConfig("USDC"))).toMatchObject({ code: "INVALID_CONFIG" });
  });

  it("exposes no strategist functions", () => {
    const { ctx } = makeHarness();
    expect(adaptor.functions()).toEqual([]);
    expect(captureError(() => adaptor.execute({ fn: "toString", args: {} }, ctx))).toMatchObject({
      code: "UNKNOWN_FUNCTION",
    });
  });
});
