/**
 * Simulated protocol environment, described by a JSON file.
 *
 * The file lists priced assets, lending markets and opening balances.
 * Amounts in the file are human decimals ("1000.5"); they are scaled by
 * each asset's decimals when the environment is built.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { parseAmount } from "@cellar/math";
import {
  FixedPriceOracle,
  InMemoryLendingMarket,
  InMemorySwapRouter,
  InMemoryTokenBank,
  ManualClock,
  PRICE_DECIMALS,
  ProtocolEnvironment,
  VaultDirectory,
  systemClock,
} from "@cellar/protocols";
import type { Clock } from "@cellar/protocols";
import {
  Erc20Adaptor,
  MarketCollateralAdaptor,
  MarketDebtAdaptor,
  SwapAdaptor,
  VaultShareAdaptor,
  describeIssues,
} from "@cellar/adaptors";
import type { Adaptor } from "@cellar/adaptors";
import { ServiceError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

const DecimalSchema = z.string().regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal string");

export const ProtocolsFileSchema = z
  .object({
    /** Fixed start time in unix seconds; omitted means wall-clock time. */
    startTime: z.number().int().nonnegative().optional(),
    assets: z
      .array(
        z.object({
          asset: z.string().min(1),
          decimals: z.number().int().min(0).max(36),
          /** Price of one whole unit in the oracle's quote currency. */
          price: DecimalSchema,
        }),
      )
      .min(1),
    markets: z
      .array(
        z.object({
          id: z.string().min(1),
          referenceAsset: z.string().min(1),
          assets: z.array(
            z.object({
              asset: z.string().min(1),
              collateralFactor: DecimalSchema,
              borrowFactor: DecimalSchema,
            }),
          ),
        }),
      )
      .default([]),
    swapReserve: z.string().min(1).default("swap-router-reserve"),
    balances: z
      .array(z.object({ account: z.string().min(1), asset: z.string().min(1), amount: DecimalSchema }))
      .default([]),
    /** Liquidity supplied to a market by an outside lender. */
    supplies: z
      .array(
        z.object({
          market: z.string().min(1),
          account: z.string().min(1),
          asset: z.string().min(1),
          amount: DecimalSchema,
        }),
      )
      .default([]),
  })
  .superRefine((file, ctx) => {
    const assets = new Set(file.assets.map((a) => a.asset));
    const markets = new Set(file.markets.map((m) => m.id));
    const requireAsset = (asset: string, path: (string | number)[]): void => {
      if (!assets.has(asset)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `asset ${asset} is not priced` });
      }
    };
    file.markets.forEach((m, i) => {
      requireAsset(m.referenceAsset, ["markets", i, "referenceAsset"]);
      m.assets.forEach((a, j) => requireAsset(a.asset, ["markets", i, "assets", j, "asset"]));
    });
    file.balances.forEach((b, i) => requireAsset(b.asset, ["balances", i, "asset"]));
    file.supplies.forEach((s, i) => {
      requireAsset(s.asset, ["supplies", i, "asset"]);
      if (!markets.has(s.market)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["supplies", i, "market"], message: `unknown market ${s.market}` });
      }
    });
  });

export type ProtocolsFile = z.output<typeof ProtocolsFileSchema>;

/**
 * Validate a parsed protocols file.
 */
export function parseProtocolsFile(raw: unknown): ProtocolsFile {
  const parsed = ProtocolsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ServiceError("INVALID_PROTOCOLS_FILE", `Invalid protocols file: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read and validate a protocols file from disk.
 */
export function loadProtocolsFile(path: string): ProtocolsFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ServiceError(
      "INVALID_PROTOCOLS_FILE",
      `Cannot read protocols file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseProtocolsFile(raw);
}

// =============================================================================
// Builder
// =============================================================================

export interface AdaptorRiskSettings {
  readonly minimumHealthFactor: bigint;
  readonly minimumSelfLeverageHealthFactor: bigint;
}

export interface SimulatedEnvironment {
  readonly env: ProtocolEnvironment;
  readonly tokens: InMemoryTokenBank;
  readonly oracle: FixedPriceOracle;
  readonly clock: Clock;
  /** Every adaptor implementation the service can offer the registry. */
  readonly adaptors: readonly Adaptor[];
}

/**
 * Build collaborators and adaptor implementations from a protocols file.
 * Each lending market gets its own collateral and debt adaptor.
 */
export function buildEnvironment(file: ProtocolsFile, risk: AdaptorRiskSettings): SimulatedEnvironment {
  const tokens = new InMemoryTokenBank();
  const oracle = new FixedPriceOracle(
    file.assets.map((a) => ({ asset: a.asset, decimals: a.decimals, price: parseAmount(a.price, PRICE_DECIMALS) })),
  );
  const clock = file.startTime === undefined ? systemClock : new ManualClock(file.startTime);
  const scaled = (asset: string, amount: string): bigint => parseAmount(amount, oracle.decimalsOf(asset));

  const markets = file.markets.map(
    (m) =>
      new InMemoryLendingMarket({
        id: m.id,
        referenceAsset: m.referenceAsset,
        tokens,
        markets: m.assets.map((a) => ({
          asset: a.asset,
          collateralFactor: parseAmount(a.collateralFactor, 18),
          borrowFactor: parseAmount(a.borrowFactor, 18),
        })),
      }),
  );

  const env = new ProtocolEnvironment({
    tokens,
    oracle,
    markets,
    swaps: new InMemorySwapRouter({ tokens, oracle, clock, reserveAccount: file.swapReserve }),
    vaults: new VaultDirectory(),
    clock,
  });

  for (const balance of file.balances) {
    tokens.mint(balance.account, balance.asset, scaled(balance.asset, balance.amount));
  }
  for (const supply of file.supplies) {
    const amount = scaled(supply.asset, supply.amount);
    tokens.mint(supply.account, supply.asset, amount);
    env.market(supply.market).supply(supply.account, supply.asset, amount, supply.account);
  }

  const adaptors: Adaptor[] = [new Erc20Adaptor(), new SwapAdaptor(), new VaultShareAdaptor()];
  for (const market of markets) {
    adaptors.push(
      new MarketCollateralAdaptor(market.id, risk.minimumHealthFactor),
      new MarketDebtAdaptor({
        marketId: market.id,
        minimumHealthFactor: risk.minimumHealthFactor,
        minimumSelfLeverageHealthFactor: risk.minimumSelfLeverageHealthFactor,
      }),
    );
  }

  return { env, tokens, oracle, clock, adaptors };
}
