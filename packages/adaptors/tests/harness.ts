import { WAD } from "@cellar/math";
import {
  FixedPriceOracle,
  InMemoryLendingMarket,
  InMemorySwapRouter,
  InMemoryTokenBank,
  ManualClock,
  ProtocolEnvironment,
  VaultDirectory,
} from "@cellar/protocols";
import { PositionRegistry } from "@cellar/registry";
import type { ConfigData, PositionId } from "@cellar/types";
import type { Adaptor, AdaptorContext } from "../src/index.js";

export const OWNER = "registry-owner";
export const CELLAR = "cellar-1";
export const USDC = "USDC";
export const WETH = "WETH";
export const LENDER = "lender";
export const ROUTER_RESERVE = "router-reserve";

/** 1.25 */
export const MIN_HEALTH = (WAD * 125n) / 100n;
/** 1.05 */
export const MIN_SELF_HEALTH = (WAD * 105n) / 100n;

export function makeHarness() {
  const tokens = new InMemoryTokenBank();
  const oracle = new FixedPriceOracle([
    { asset: USDC, decimals: 6, price: 100_000_000n },
    { asset: WETH, decimals: 18, price: 200_000_000_000n },
  ]);
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
  const env = new ProtocolEnvironment({
    tokens,
    oracle,
    markets: [market],
    swaps: new InMemorySwapRouter({ tokens, oracle, clock, reserveAccount: ROUTER_RESERVE }),
    vaults: new VaultDirectory(),
    clock,
  });

  tokens.mint(LENDER, USDC, 100_000_000_000n);
  market.supply(LENDER, USDC, 100_000_000_000n, LENDER);

  const registry = new PositionRegistry<Adaptor>(OWNER);
  const active = new Set<PositionId>();

  const ctx: AdaptorContext = {
    vault: CELLAR,
    env,
    positionIdForHash: (hash) => registry.getPositionHashToPositionId(hash),
    isPositionUsed: (id) => active.has(id),
  };

  /** Trust the position and put it on the cellar's active list. */
  function track(adaptor: Adaptor, configData: ConfigData): PositionId {
    registry.trustAdaptor(OWNER, adaptor);
    const id = registry.trustPosition(OWNER, adaptor.identifier, configData);
    active.add(id);
    return id;
  }

  return { tokens, oracle, clock, market, env, registry, active, ctx, track };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
