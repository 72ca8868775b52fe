/**
 * Cellar routes.
 *
 * POST /api/v1/cellars                                    — Create a cellar (caller becomes owner)
 * GET  /api/v1/cellars                                    — List cellar summaries
 * GET  /api/v1/cellars/:address                           — Summary
 * GET  /api/v1/cellars/:address/positions                 — Per-position balances and values
 * GET  /api/v1/cellars/:address/catalogue                 — Allowed adaptors and positions
 * GET  /api/v1/cellars/:address/accounts/:account         — One shareholder
 *
 * POST /api/v1/cellars/:address/deposit | mint | withdraw | redeem
 * POST /api/v1/cellars/:address/approve | transfer
 *
 * POST /api/v1/cellars/:address/catalogue/adaptors[/remove]
 * POST /api/v1/cellars/:address/catalogue/positions[/remove]
 * POST /api/v1/cellars/:address/positions[/remove | /swap | /force-out]
 * POST /api/v1/cellars/:address/holding-position
 * POST /api/v1/cellars/:address/share-lock-period
 * POST /api/v1/cellars/:address/rebalance-deviation
 * POST /api/v1/cellars/:address/call-on-adaptor
 * POST /api/v1/cellars/:address/shutdown[/lift]
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AdaptorIdentifierSchema,
  AddPositionSchema,
  ApproveSchema,
  CallOnAdaptorSchema,
  CataloguePositionSchema,
  CreateCellarSchema,
  DepositSchema,
  ForcePositionOutSchema,
  HoldingPositionSchema,
  MintSchema,
  RebalanceDeviationSchema,
  RedeemSchema,
  RemovePositionSchema,
  ShareLockPeriodSchema,
  SwapPositionsSchema,
  TransferSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { validateJson } from "../middleware/validate.js";

export function createCellarRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Lifecycle and views ────────────────────────────────────────────

  routes.post("/", requireCaller(), validateJson(CreateCellarSchema), (c) => {
    const service = c.get("service");
    const cellar = service.createCellar(c.get("caller"), c.req.valid("json"));
    return c.json({ data: service.summarize(cellar) }, 201);
  });

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listCellars().map((cellar) => service.summarize(cellar)) });
  });

  routes.get("/:address", (c) => {
    const service = c.get("service");
    return c.json({ data: service.summarize(service.getCellar(c.req.param("address"))) });
  });

  routes.get("/:address/positions", (c) => {
    const service = c.get("service");
    return c.json({ data: service.positionBalances(service.getCellar(c.req.param("address"))) });
  });

  routes.get("/:address/catalogue", (c) => {
    const service = c.get("service");
    return c.json({ data: service.getCellar(c.req.param("address")).catalogue() });
  });

  routes.get("/:address/accounts/:account", (c) => {
    const service = c.get("service");
    const cellar = service.getCellar(c.req.param("address"));
    return c.json({ data: service.shareholder(cellar, c.req.param("account")) });
  });

  // ─── Share flows ────────────────────────────────────────────────────

  routes.post("/:address/deposit", requireCaller(), validateJson(DepositSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const shares = c.get("service").updateCellar(c.req.param("address"), (cellar) =>
      cellar.deposit(caller, body.assets, body.receiver ?? caller),
    );
    return c.json({ data: { assets: body.assets.toString(), shares: shares.toString() } });
  });

  routes.post("/:address/mint", requireCaller(), validateJson(MintSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const assets = c.get("service").updateCellar(c.req.param("address"), (cellar) =>
      cellar.mint(caller, body.shares, body.receiver ?? caller),
    );
    return c.json({ data: { assets: assets.toString(), shares: body.shares.toString() } });
  });

  routes.post("/:address/withdraw", requireCaller(), validateJson(WithdrawSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const shares = c.get("service").updateCellar(c.req.param("address"), (cellar) =>
      cellar.withdraw(caller, body.assets, body.receiver ?? caller, body.owner ?? caller),
    );
    return c.json({ data: { assets: body.assets.toString(), shares: shares.toString() } });
  });

  routes.post("/:address/redeem", requireCaller(), validateJson(RedeemSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const assets = c.get("service").updateCellar(c.req.param("address"), (cellar) =>
      cellar.redeem(caller, body.shares, body.receiver ?? caller, body.owner ?? caller),
    );
    return c.json({ data: { assets: assets.toString(), shares: body.shares.toString() } });
  });

  routes.post("/:address/approve", requireCaller(), validateJson(ApproveSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    c.get("service").updateCellar(c.req.param("address"), (cellar) => {
      cellar.approve(caller, body.spender, body.shares);
    });
    return c.json({ data: { owner: caller, spender: body.spender, shares: body.shares.toString() } });
  });

  routes.post("/:address/transfer", requireCaller(), validateJson(TransferSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const from = body.from ?? caller;
    c.get("service").updateCellar(c.req.param("address"), (cellar) => {
      if (from === caller) {
        cellar.transfer(caller, body.to, body.shares);
      } else {
        cellar.transferFrom(caller, from, body.to, body.shares);
      }
    });
    return c.json({ data: { from, to: body.to, shares: body.shares.toString() } });
  });

  // ─── Catalogue ──────────────────────────────────────────────────────

  routes.post("/:address/catalogue/adaptors", requireCaller(), validateJson(AdaptorIdentifierSchema), (c) => {
    const caller = c.get("caller");
    const { identifier } = c.req.valid("json");
    const catalogue = c.get("service").updateCellar(c.req.param("address"), (cellar) => {
      cellar.addAdaptorToCatalogue(caller, identifier);
      return cellar.catalogue();
    });
    return c.json({ data: catalogue });
  });

  routes.post(
    "/:address/catalogue/adaptors/remove",
    requireCaller(),
    validateJson(AdaptorIdentifierSchema),
    (c) => {
      const caller = c.get("caller");
      const { identifier } = c.req.valid("json");
      const catalogue = c.get("service").updateCellar(c.req.param("address"), (cellar) => {
        cellar.removeAdaptorFromCatalogue(caller, identifier);
        return cellar.catalogue();
      });
      return c.json({ data: catalogue });
    },
  );

  routes.post("/:address/catalogue/positions", requireCaller(), validateJson(CataloguePositionSchema), (c) => {
    const caller = c.get("caller");
    const { positionId } = c.req.valid("json");
    const catalogue = c.get("service").updateCellar(c.req.param("address"), (cellar) => {
      cellar.addPositionToCatalogue(caller, positionId);
      return cellar.catalogue();
    });
    return c.json({ data: catalogue });
  });

  routes.post(
    "/:address/catalogue/positions/remove",
    requireCaller(),
    validateJson(CataloguePositionSchema),
    (c) => {
      const caller = c.get("caller");
      const { positionId } = c.req.valid("json");
      const catalogue = c.get("service").updateCellar(c.req.param("address"), (cellar) => {
        cellar.removePositionFromCatalogue(caller, positionId);
        return cellar.catalogue();
      });
      return c.json({ data: catalogue });
    },
  );

  // ─── Active positions ───────────────────────────────────────────────

  routes.post("/:address/positions", requireCaller(), validateJson(AddPositionSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.addPosition(caller, body.index, body.positionId, body.userConfig, body.inDebtArray);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  routes.post("/:address/positions/remove", requireCaller(), validateJson(RemovePositionSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.removePosition(caller, body.index, body.inDebtArray);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  routes.post("/:address/positions/swap", requireCaller(), validateJson(SwapPositionsSchema), (c) => {
    const caller = c.get("caller");
    const body = c.req.valid("json");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.swapPositions(caller, body.index1, body.index2, body.inDebtArray);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  // Anyone may evict a position the registry has distrusted
  routes.post("/:address/positions/force-out", validateJson(ForcePositionOutSchema), (c) => {
    const body = c.req.valid("json");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.forcePositionOut(body.index, body.positionId, body.inDebtArray);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  // ─── Parameters ─────────────────────────────────────────────────────

  routes.post("/:address/holding-position", requireCaller(), validateJson(HoldingPositionSchema), (c) => {
    const caller = c.get("caller");
    const { positionId } = c.req.valid("json");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.setHoldingPosition(caller, positionId);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  routes.post("/:address/share-lock-period", requireCaller(), validateJson(ShareLockPeriodSchema), (c) => {
    const caller = c.get("caller");
    const { seconds } = c.req.valid("json");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.setShareLockPeriod(caller, seconds);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  routes.post(
    "/:address/rebalance-deviation",
    requireCaller(),
    validateJson(RebalanceDeviationSchema),
    (c) => {
      const caller = c.get("caller");
      const { deviation } = c.req.valid("json");
      const service = c.get("service");
      const cellar = service.updateCellar(c.req.param("address"), (target) => {
        target.setRebalanceDeviation(caller, deviation);
        return target;
      });
      return c.json({ data: service.summarize(cellar) });
    },
  );

  // ─── Strategist batches ─────────────────────────────────────────────

  routes.post("/:address/call-on-adaptor", requireCaller(), validateJson(CallOnAdaptorSchema), (c) => {
    const caller = c.get("caller");
    const { calls } = c.req.valid("json");
    const result = c.get("service").updateCellar(c.req.param("address"), (cellar) =>
      cellar.callOnAdaptor(caller, calls),
    );
    return c.json({
      data: {
        calls: result.calls,
        totalAssetsBefore: result.totalAssetsBefore.toString(),
        totalAssetsAfter: result.totalAssetsAfter.toString(),
      },
    });
  });

  // ─── Shutdown ───────────────────────────────────────────────────────

  routes.post("/:address/shutdown", requireCaller(), (c) => {
    const caller = c.get("caller");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.initiateShutdown(caller);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  routes.post("/:address/shutdown/lift", requireCaller(), (c) => {
    const caller = c.get("caller");
    const service = c.get("service");
    const cellar = service.updateCellar(c.req.param("address"), (target) => {
      target.liftShutdown(caller);
      return target;
    });
    return c.json({ data: service.summarize(cellar) });
  });

  return routes;
}
