import type { ErrorCategory } from "@cellar/types";

/** Error codes raised by external protocol collaborators. */
export type ProtocolErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "UNSUPPORTED_ASSET"
  | "UNKNOWN_MARKET"
  | "INSUFFICIENT_LIQUIDITY"
  | "INSUFFICIENT_COLLATERAL"
  | "REPAY_EXCEEDS_DEBT"
  | "INVALID_SUB_ACCOUNT_ID"
  | "INVALID_PATH"
  | "DEADLINE_EXPIRED"
  | "SLIPPAGE"
  | "DUPLICATE_VAULT"
  | "INVALID_MARKET_PARAMS"
  | "UNKNOWN_VAULT"
  | "UNAUTHORIZED";

const STRUCTURAL: ReadonlySet<ProtocolErrorCode> = new Set<ProtocolErrorCode>([
  "INVALID_SUB_ACCOUNT_ID",
  "INVALID_MARKET_PARAMS",
  "DUPLICATE_VAULT",
  "UNKNOWN_VAULT",
]);

/**
 * Error from an external protocol. The engine propagates it as-is and
 * rolls back the enclosing batch.
 */
export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
    this.category =
      code === "UNAUTHORIZED" ? "authorization" : STRUCTURAL.has(code) ? "structural" : "external";
  }
}

export function assertAmount(amount: bigint, label: string): void {
  if (amount < 0n) {
    throw new ProtocolError("INVALID_AMOUNT", `${label} must be non-negative, got ${amount.toString()}`);
  }
}
