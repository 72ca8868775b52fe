/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CellarService } from "./services/cellar-service.js";
import type { CellarServiceConfig } from "./services/cellar-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createRegistryRoutes } from "./routes/registry.js";
import { createCellarRoutes } from "./routes/cellars.js";
import { createAccountRoutes } from "./routes/accounts.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** An existing service, or the configuration to build one. */
  readonly service: CellarService | CellarServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives errors that become 500 responses. */
  readonly onInternalError?: (err: Error, c: Context) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CellarService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service =
    options.service instanceof CellarService ? options.service : new CellarService(options.service);
  const app = new Hono<AppEnv>();

  // Global middleware
  app.use("*", requestIdMiddleware());
  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.onError(createErrorHandler(options.onInternalError));

  // Health probes (no service context needed beyond the instance)
  app.route("/", createHealthRoutes(service));

  // API routes
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.route("/api/v1/registry", createRegistryRoutes());
  app.route("/api/v1/cellars", createCellarRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());

  return { app, service };
}
