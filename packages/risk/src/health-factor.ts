/**
 * Health factor — risk-adjusted collateral over risk-adjusted debt.
 *
 * Pure functions. Zero debt and zero collateral are ordinary states:
 * zero debt yields MAX_HEALTH_FACTOR, zero collateral with debt yields 0,
 * and nothing in between overflows.
 *
 * Rounding always favours the lender: collateral rounds down, debt
 * rounds up, the ratio rounds down.
 */

import { MAX_UINT256, WAD, mulDivDown, mulDivUp, saturatingMulDiv } from "@cellar/math";

/** Returned when there is no debt. */
export const MAX_HEALTH_FACTOR = MAX_UINT256;

export interface CollateralBalance {
  /** Value in the reference asset. */
  readonly value: bigint;
  /** WAD; 0.8e18 lets 80% of the value back debt. */
  readonly collateralFactor: bigint;
}

export interface DebtBalance {
  /** Value in the reference asset. */
  readonly value: bigint;
  /** WAD; debt value is divided by it. */
  readonly borrowFactor: bigint;
}

export interface RiskTotals {
  readonly collateral: bigint;
  readonly debt: bigint;
}

export function riskAdjustedCollateral(balances: readonly CollateralBalance[]): bigint {
  let total = 0n;
  for (const b of balances) {
    total += mulDivDown(b.value, b.collateralFactor, WAD);
  }
  return total;
}

export function riskAdjustedDebt(balances: readonly DebtBalance[]): bigint {
  let total = 0n;
  for (const b of balances) {
    total += mulDivUp(b.value, WAD, b.borrowFactor);
  }
  return total;
}

export function computeHealthFactor(totals: RiskTotals): bigint {
  if (totals.debt === 0n) {
    return MAX_HEALTH_FACTOR;
  }
  return saturatingMulDiv(totals.collateral, WAD, totals.debt);
}

export function isHealthy(healthFactor: bigint, minimum: bigint): boolean {
  return healthFactor >= minimum;
}
