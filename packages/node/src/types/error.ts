/**
 * Error envelopes for API responses.
 *
 * { error: { code, message, category?, details? } }
 *
 * `category` is present on domain errors; `details` on validation
 * failures (the zod issues).
 */

import type { CategorizedError, ErrorCategory } from "@cellar/types";

/**
 * Codes produced by the HTTP layer itself. Domain errors keep their own
 * codes (e.g. HEALTH_FACTOR_TOO_LOW).
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHENTICATED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly category?: ErrorCategory;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}

/** Envelope for an error raised by a domain package. */
export function domainErrorEnvelope(err: CategorizedError): ErrorEnvelope {
  return { error: { code: err.code, category: err.category, message: err.message } };
}
