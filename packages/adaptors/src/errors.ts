import type { ErrorCategory } from "@cellar/types";

export type AdaptorErrorCode =
  | "USER_DEPOSITS_NOT_ALLOWED"
  | "USER_WITHDRAWS_NOT_ALLOWED"
  | "UNKNOWN_FUNCTION"
  | "INVALID_CALL_DATA"
  | "INVALID_CONFIG"
  | "NOT_A_POSITION"
  | "INVALID_SUB_ACCOUNT_ID"
  | "INVALID_MINIMUM_HEALTH_FACTOR"
  | "UNDERLYING_NOT_SUPPORTED"
  | "DEBT_POSITIONS_MUST_BE_TRACKED"
  | "POSITION_NOT_USED"
  | "HEALTH_FACTOR_TOO_LOW";

const CATEGORY: Readonly<Record<AdaptorErrorCode, ErrorCategory>> = {
  USER_DEPOSITS_NOT_ALLOWED: "structural",
  USER_WITHDRAWS_NOT_ALLOWED: "structural",
  UNKNOWN_FUNCTION: "structural",
  INVALID_CALL_DATA: "structural",
  INVALID_CONFIG: "structural",
  NOT_A_POSITION: "structural",
  INVALID_SUB_ACCOUNT_ID: "structural",
  INVALID_MINIMUM_HEALTH_FACTOR: "structural",
  UNDERLYING_NOT_SUPPORTED: "external",
  DEBT_POSITIONS_MUST_BE_TRACKED: "authorization",
  POSITION_NOT_USED: "authorization",
  HEALTH_FACTOR_TOO_LOW: "invariant",
};

export class AdaptorError extends Error {
  public readonly code: AdaptorErrorCode;
  public readonly category: ErrorCategory;
  /** Identifier of the adaptor that raised the error. */
  public readonly adaptor: string;

  constructor(code: AdaptorErrorCode, adaptor: string, message: string) {
    super(message);
    this.name = "AdaptorError";
    this.code = code;
    this.category = CATEGORY[code];
    this.adaptor = adaptor;
  }
}
