/**
 * Token balances in the simulated environment.
 *
 * GET /api/v1/accounts/:account/balances/:asset — Base-unit balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account/balances/:asset", (c) => {
    const account = c.req.param("account");
    const asset = c.req.param("asset");
    const balance = c.get("service").tokenBalance(account, asset);
    return c.json({ data: { account, asset, balance: balance.toString() } });
  });

  return routes;
}
