/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Every domain error carries a code and a category. A handful of codes
 * have their own status; the rest map by category.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { CategorizedError, ErrorCategory } from "@cellar/types";
import { createErrorEnvelope, domainErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 424 | 500;

const STATUS_BY_CODE: Readonly<Record<string, ErrorStatus>> = {
  // Lookups
  CELLAR_NOT_FOUND: 404,
  ADAPTOR_NOT_AVAILABLE: 404,
  UNKNOWN_ADAPTOR: 404,
  UNKNOWN_POSITION: 404,
  UNKNOWN_MARKET: 404,
  UNKNOWN_VAULT: 404,

  // Conflicts with existing state
  CELLAR_EXISTS: 409,
  IDENTIFIER_CONFLICT: 409,
  REENTRANCY: 409,

  // Persistence failures are the node's problem, not the caller's
  INVALID_STORED_STATE: 500,
  CORRUPT_RECORD: 500,
  INTEGRITY_MISMATCH: 500,
};

const STATUS_BY_CATEGORY: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  authorization: 403,
  invariant: 422,
  structural: 400,
  external: 424,
};

const CATEGORIES: ReadonlySet<string> = new Set<ErrorCategory>([
  "authorization",
  "invariant",
  "external",
  "structural",
]);

function isCategory(value: unknown): value is ErrorCategory {
  return typeof value === "string" && CATEGORIES.has(value);
}

function isDomainError(err: Error): err is Error & CategorizedError {
  return "code" in err && typeof err.code === "string" && "category" in err && isCategory(err.category);
}

function statusOf(error: CategorizedError): ErrorStatus {
  return STATUS_BY_CODE[error.code] ?? STATUS_BY_CATEGORY[error.category];
}

function clientStatus(status: number): ErrorStatus {
  switch (status) {
    case 401:
      return 401;
    case 403:
      return 403;
    case 404:
      return 404;
    default:
      return 400;
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 *
 * `report` receives every error that becomes a 500, before the details
 * are hidden from the client.
 */
export function createErrorHandler(
  report?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      // Raised by Hono itself, e.g. a malformed JSON body
      return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), clientStatus(err.status));
    }

    if (!isDomainError(err)) {
      report?.(err, c);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const status = statusOf(err);
    if (status === 500) {
      report?.(err, c);
      return c.json(createErrorEnvelope(err.code, "Internal server error"), 500);
    }
    return c.json(domainErrorEnvelope(err), status);
  };
}
