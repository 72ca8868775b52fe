import type { ErrorCategory } from "@cellar/types";

/** Error codes for arithmetic operations. */
export type MathErrorCode =
  | "INVALID_AMOUNT"
  | "NEGATIVE_AMOUNT"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the arithmetic helpers.
 * Always thrown — never returns error codes silently.
 */
export class MathError extends Error {
  public readonly code: MathErrorCode;
  public readonly category: ErrorCategory = "invariant";

  constructor(code: MathErrorCode, message: string) {
    super(message);
    this.name = "MathError";
    this.code = code;
  }
}
