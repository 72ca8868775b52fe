/**
 * The execution environment a cellar runs in: token custody, prices,
 * lending markets, swap routing, other vaults and a clock.
 *
 * Checkpointing the environment checkpoints every stateful collaborator,
 * which is what makes a strategist batch all-or-nothing.
 */

import type { Checkpointable, Restore } from "@cellar/types";
import type { Clock } from "./clock.js";
import { ProtocolError } from "./errors.js";
import type { LendingMarket } from "./lending-market.js";
import type { PriceOracle } from "./price-oracle.js";
import type { VaultDirectory } from "./share-vault.js";
import type { SwapRouter } from "./swap-router.js";
import type { TokenBank } from "./token-bank.js";

export interface ProtocolEnvironmentOptions {
  readonly tokens: TokenBank;
  readonly oracle: PriceOracle;
  readonly markets: readonly LendingMarket[];
  readonly swaps: SwapRouter;
  readonly vaults: VaultDirectory;
  readonly clock: Clock;
}

export class ProtocolEnvironment implements Checkpointable {
  readonly tokens: TokenBank;
  readonly oracle: PriceOracle;
  readonly swaps: SwapRouter;
  readonly vaults: VaultDirectory;
  readonly clock: Clock;
  private readonly _markets: ReadonlyMap<string, LendingMarket>;

  constructor(options: ProtocolEnvironmentOptions) {
    this.tokens = options.tokens;
    this.oracle = options.oracle;
    this.swaps = options.swaps;
    this.vaults = options.vaults;
    this.clock = options.clock;

    const markets = new Map<string, LendingMarket>();
    for (const market of options.markets) {
      if (markets.has(market.id)) {
        throw new ProtocolError("INVALID_MARKET_PARAMS", `Duplicate market id: ${market.id}`);
      }
      markets.set(market.id, market);
    }
    this._markets = markets;
  }

  market(id: string): LendingMarket {
    const market = this._markets.get(id);
    if (market === undefined) {
      throw new ProtocolError("UNKNOWN_MARKET", `No lending market with id ${id}`);
    }
    return market;
  }

  marketIds(): readonly string[] {
    return [...this._markets.keys()];
  }

  checkpoint(): Restore {
    const restores: Restore[] = [
      this.tokens.checkpoint(),
      ...[...this._markets.values()].map((m) => m.checkpoint()),
      this.vaults.checkpoint(),
    ];
    return () => {
      for (const restore of restores.reverse()) {
        restore();
      }
    };
  }
}
