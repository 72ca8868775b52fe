/**
 * @cellar/risk — health factor evaluation for leveraged positions.
 */

export {
  MAX_HEALTH_FACTOR,
  computeHealthFactor,
  isHealthy,
  riskAdjustedCollateral,
  riskAdjustedDebt,
} from "./health-factor.js";
export type { CollateralBalance, DebtBalance, RiskTotals } from "./health-factor.js";

export { evaluateAccountHealth } from "./account-health.js";
export type { AccountHealth } from "./account-health.js";
