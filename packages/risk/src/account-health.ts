/**
 * Health of one or more market (sub-)accounts, priced through an oracle
 * in the market's reference asset and weighted by the market's factors.
 */

import type { AccountId } from "@cellar/types";
import type { LendingMarket, PriceOracle } from "@cellar/protocols";
import {
  computeHealthFactor,
  riskAdjustedCollateral,
  riskAdjustedDebt,
} from "./health-factor.js";
import type { CollateralBalance, DebtBalance } from "./health-factor.js";

export interface AccountHealth {
  readonly healthFactor: bigint;
  /** Risk-adjusted collateral in the reference asset. */
  readonly collateralValue: bigint;
  /** Risk-adjusted debt in the reference asset. */
  readonly debtValue: bigint;
}

export function evaluateAccountHealth(
  market: LendingMarket,
  oracle: PriceOracle,
  accounts: readonly AccountId[],
): AccountHealth {
  const collateral: CollateralBalance[] = [];
  const debt: DebtBalance[] = [];

  for (const account of new Set(accounts)) {
    for (const balance of market.accountAssets(account)) {
      const params = market.marketParams(balance.asset);
      if (balance.collateral > 0n) {
        collateral.push({
          value: oracle.getValue(balance.asset, balance.collateral, market.referenceAsset),
          collateralFactor: params.collateralFactor,
        });
      }
      if (balance.debt > 0n) {
        debt.push({
          value: oracle.getValue(balance.asset, balance.debt, market.referenceAsset),
          borrowFactor: params.borrowFactor,
        });
      }
    }
  }

  const collateralValue = riskAdjustedCollateral(collateral);
  const debtValue = riskAdjustedDebt(debt);
  return {
    healthFactor: computeHealthFactor({ collateral: collateralValue, debt: debtValue }),
    collateralValue,
    debtValue,
  };
}
