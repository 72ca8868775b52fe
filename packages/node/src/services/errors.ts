/**
 * Errors raised by the service layer itself, as opposed to the
 * registry, cellars and collaborators it drives.
 */

import type { ErrorCategory } from "@cellar/types";

export type ServiceErrorCode =
  | "CELLAR_NOT_FOUND"
  | "CELLAR_EXISTS"
  | "ADAPTOR_NOT_AVAILABLE"
  | "INVALID_PROTOCOLS_FILE"
  | "INVALID_STORED_STATE";

const CATEGORY: Readonly<Record<ServiceErrorCode, ErrorCategory>> = {
  CELLAR_NOT_FOUND: "structural",
  CELLAR_EXISTS: "structural",
  ADAPTOR_NOT_AVAILABLE: "structural",
  INVALID_PROTOCOLS_FILE: "structural",
  INVALID_STORED_STATE: "external",
};

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
