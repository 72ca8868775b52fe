/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (every hosted cellar can be valued)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CellarService } from "../services/cellar-service.js";

export function createHealthRoutes(service: CellarService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ok, failures } = service.checkCellars();
    const body = {
      status: ok ? "ready" : "not_ready",
      cellars: service.listCellars().length,
      failures,
      timestamp: new Date().toISOString(),
    };
    return ok ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
