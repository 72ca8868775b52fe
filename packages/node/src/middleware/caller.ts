/**
 * Caller identity middleware.
 *
 * Mutating routes act on behalf of an account: the registry owner, a
 * cellar's strategist or a depositor. The account is taken from the
 * X-Account-Id header; the domain layer decides what it may do.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const ACCOUNT_HEADER = "X-Account-Id";

export function requireCaller(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER)?.trim();
    if (account === undefined || account === "") {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", `Missing ${ACCOUNT_HEADER} header`),
        401,
      );
    }
    c.set("caller", account);
    return next();
  };
}
