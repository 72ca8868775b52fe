/**
 * Position registry routes.
 *
 * GET  /api/v1/registry                        — Owner and counts
 * GET  /api/v1/registry/adaptors               — Adaptor implementations and their trust
 * POST /api/v1/registry/adaptors/trust         — Trust an adaptor (owner)
 * POST /api/v1/registry/adaptors/distrust      — Distrust an adaptor (owner)
 * GET  /api/v1/registry/positions              — List positions
 * POST /api/v1/registry/positions              — Trust a position (owner)
 * POST /api/v1/registry/positions/lookup       — Id for (adaptor, configData), 0 if none
 * GET  /api/v1/registry/positions/:id          — Get a position
 * POST /api/v1/registry/positions/:id/distrust — Distrust a position (owner)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AdaptorIdentifierSchema, PositionConfigSchema } from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { validateJson } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createRegistryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({
      data: {
        owner: service.registryOwner,
        adaptors: service.listAdaptors().filter((a) => a.registered).length,
        positions: service.listPositions().length,
      },
    });
  });

  // ─── Adaptors ───────────────────────────────────────────────────────

  routes.get("/adaptors", (c) => {
    return c.json({ data: c.get("service").listAdaptors() });
  });

  routes.post("/adaptors/trust", requireCaller(), validateJson(AdaptorIdentifierSchema), (c) => {
    const { identifier } = c.req.valid("json");
    c.get("service").trustAdaptor(c.get("caller"), identifier);
    return c.json({ data: { identifier, trusted: true } });
  });

  routes.post("/adaptors/distrust", requireCaller(), validateJson(AdaptorIdentifierSchema), (c) => {
    const { identifier } = c.req.valid("json");
    c.get("service").distrustAdaptor(c.get("caller"), identifier);
    return c.json({ data: { identifier, trusted: false } });
  });

  // ─── Positions ──────────────────────────────────────────────────────

  routes.get("/positions", (c) => {
    return c.json({ data: c.get("service").listPositions() });
  });

  routes.post("/positions", requireCaller(), validateJson(PositionConfigSchema), (c) => {
    const body = c.req.valid("json");
    const record = c.get("service").trustPosition(c.get("caller"), body.adaptor, body.configData);
    return c.json({ data: record }, 201);
  });

  routes.post("/positions/lookup", validateJson(PositionConfigSchema), (c) => {
    const body = c.req.valid("json");
    return c.json({ data: { id: c.get("service").lookupPosition(body.adaptor, body.configData) } });
  });

  routes.get("/positions/:id", (c) => {
    const id = parsePositionId(c.req.param("id"));
    const record = id === undefined ? undefined : c.get("service").getPosition(id);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Position '${c.req.param("id")}' not found`),
        404,
      );
    }
    return c.json({ data: record });
  });

  routes.post("/positions/:id/distrust", requireCaller(), (c) => {
    const id = parsePositionId(c.req.param("id"));
    if (id === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Position '${c.req.param("id")}' not found`),
        404,
      );
    }
    return c.json({ data: c.get("service").distrustPosition(c.get("caller"), id) });
  });

  return routes;
}

function parsePositionId(raw: string): number | undefined {
  return /^[1-9]\d{0,8}$/.test(raw) ? Number(raw) : undefined;
}
