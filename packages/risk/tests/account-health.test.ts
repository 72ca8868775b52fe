import { describe, it, expect } from "vitest";
import { WAD } from "@cellar/math";
import { FixedPriceOracle, InMemoryLendingMarket, InMemoryTokenBank } from "@cellar/protocols";
import { MAX_HEALTH_FACTOR, evaluateAccountHealth, isHealthy } from "../src/index.js";

const USDC = "USDC";
const WETH = "WETH";
const MIN_HEALTH = (WAD * 125n) / 100n;

function setup() {
  const tokens = new InMemoryTokenBank();
  const oracle = new FixedPriceOracle([
    { asset: USDC, decimals: 6, price: 100_000_000n },
    { asset: WETH, decimals: 18, price: 200_000_000_000n },
  ]);
  const market = new InMemoryLendingMarket({
    id: "main",
    referenceAsset: USDC,
    tokens,
    markets: [
      { asset: USDC, collateralFactor: (WAD * 8n) / 10n, borrowFactor: WAD },
      { asset: WETH, collateralFactor: (WAD * 3n) / 4n, borrowFactor: (WAD * 9n) / 10n },
    ],
  });
  tokens.mint("lender", USDC, 100_000_000_000n);
  tokens.mint("lender", WETH, 100n * WAD);
  market.supply("lender", USDC, 100_000_000_000n, "lender");
  market.supply("lender", WETH, 100n * WAD, "lender");
  tokens.mint("vault", USDC, 10_000_000_000n);
  market.supply("vault#0", USDC, 10_000_000_000n, "vault");
  return { market, oracle };
}

describe("evaluateAccountHealth", () => {
  it("reports the sentinel for an account without debt", () => {
    const { market, oracle } = setup();
    const health = evaluateAccountHealth(market, oracle, ["vault#0"]);
    expect(health.healthFactor).toBe(MAX_HEALTH_FACTOR);
    expect(health.collateralValue).toBe(8_000_000_000n);
    expect(health.debtValue).toBe(0n);
  });

  it("lands exactly on the minimum, and one unit more falls under it", () => {
    const { market, oracle } = setup();
    market.borrow("vault#0", USDC, 6_400_000_000n, "vault");
    const atLimit = evaluateAccountHealth(market, oracle, ["vault#0"]);
    expect(atLimit.healthFactor).toBe(MIN_HEALTH);
    expect(isHealthy(atLimit.healthFactor, MIN_HEALTH)).toBe(true);

    market.borrow("vault#0", USDC, 1n, "vault");
    const over = evaluateAccountHealth(market, oracle, ["vault#0"]);
    expect(isHealthy(over.healthFactor, MIN_HEALTH)).toBe(false);
  });

  it("prices cross-asset debt in the reference asset", () => {
    const { market, oracle } = setup();
    market.borrow("vault#0", WETH, WAD, "vault");
    const health = evaluateAccountHealth(market, oracle, ["vault#0"]);
    // 2000 USDC of debt divided by a 0.9 borrow factor, rounded up.
    expect(health.debtValue).toBe(2_222_222_223n);
    expect(health.healthFactor > (WAD * 359n) / 100n).toBe(true);
    expect(health.healthFactor < (WAD * 360n) / 100n).toBe(true);
  });

  it("combines several sub-accounts and counts each once", () => {
    const { market, oracle } = setup();
    market.borrow("vault#1", USDC, 4_000_000_000n, "vault");
    const separate = evaluateAccountHealth(market, oracle, ["vault#1"]);
    expect(separate.healthFactor).toBe(0n);

    const combined = evaluateAccountHealth(market, oracle, ["vault#0", "vault#1", "vault#0"]);
    expect(combined.healthFactor).toBe(2n * WAD);
  });
});
