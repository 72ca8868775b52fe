import type { ErrorCategory } from "@cellar/types";

export type StateStoreErrorCode =
  | "INVALID_KEY"
  | "INVALID_VERSION"
  | "INVALID_STATE"
  | "CORRUPT_RECORD"
  | "INTEGRITY_MISMATCH";

const CATEGORY: Readonly<Record<StateStoreErrorCode, ErrorCategory>> = {
  INVALID_KEY: "structural",
  INVALID_VERSION: "structural",
  INVALID_STATE: "structural",
  CORRUPT_RECORD: "external",
  INTEGRITY_MISMATCH: "invariant",
};

export class StateStoreError extends Error {
  public readonly code: StateStoreErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: StateStoreErrorCode, message: string) {
    super(message);
    this.name = "StateStoreError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
