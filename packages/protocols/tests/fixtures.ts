import { WAD } from "@cellar/math";
import {
  FixedPriceOracle,
  InMemoryLendingMarket,
  InMemorySwapRouter,
  InMemoryTokenBank,
  ManualClock,
  ProtocolEnvironment,
  VaultDirectory,
} from "../src/index.js";

export const USDC = "USDC";
export const WETH = "WETH";
export const DAI = "DAI";

export const ROUTER_RESERVE = "router-reserve";

/** 2000 USD per WETH, 1 USD per USDC and DAI. */
export function makeOracle(): FixedPriceOracle {
  return new FixedPriceOracle([
    { asset: USDC, decimals: 6, price: 100_000_000n },
    { asset: DAI, decimals: 18, price: 100_000_000n },
    { asset: WETH, decimals: 18, price: 200_000_000_000n },
  ]);
}

export function makeEnvironment(): {
  env: ProtocolEnvironment;
  tokens: InMemoryTokenBank;
  oracle: FixedPriceOracle;
  market: InMemoryLendingMarket;
  clock: ManualClock;
} {
  const tokens = new InMemoryTokenBank();
  const oracle = makeOracle();
  const clock = new ManualClock(1_000);
  const market = new InMemoryLendingMarket({
    id: "main",
    referenceAsset: USDC,
    tokens,
    markets: [
      { asset: USDC, collateralFactor: (WAD * 8n) / 10n, borrowFactor: WAD },
      { asset: WETH, collateralFactor: (WAD * 3n) / 4n, borrowFactor: (WAD * 9n) / 10n },
    ],
  });
  const swaps = new InMemorySwapRouter({ tokens, oracle, clock, reserveAccount: ROUTER_RESERVE });
  const env = new ProtocolEnvironment({
    tokens,
    oracle,
    markets: [market],
    swaps,
    vaults: new VaultDirectory(),
    clock,
  });
  return { env, tokens, oracle, market, clock };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
