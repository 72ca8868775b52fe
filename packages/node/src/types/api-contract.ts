/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountId } from "@cellar/types";
import type { CellarService } from "../services/cellar-service.js";

/**
 * Hono environment type for the Cellar node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The node's service (set for every /api route) */
    service: CellarService;

    /** Account the request acts as (set by caller middleware) */
    caller: AccountId;
  };
}
