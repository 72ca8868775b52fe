/**
 * @cellar/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { FileStateStore, InMemoryStateStore } from "@cellar/state-store";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { loadProtocolsFile } from "./services/environment.js";

const BUNDLED_PROTOCOLS_FILE = fileURLToPath(new URL("../config/protocols.json", import.meta.url));

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const protocolsFile = config.PROTOCOLS_FILE ?? BUNDLED_PROTOCOLS_FILE;
  const store =
    config.STATE_DIR !== undefined ? new FileStateStore(config.STATE_DIR) : new InMemoryStateStore();
  if (config.STATE_DIR === undefined) {
    logger.warn("STATE_DIR not set; registry and cellar state will not survive a restart");
  }

  const { app, service } = createApp({
    service: {
      registryOwner: config.REGISTRY_OWNER,
      protocols: loadProtocolsFile(protocolsFile),
      risk: {
        minimumHealthFactor: config.MIN_HEALTH_FACTOR,
        minimumSelfLeverageHealthFactor: config.MIN_SELF_LEVERAGE_HEALTH_FACTOR,
      },
      defaultShareLockPeriod: config.DEFAULT_SHARE_LOCK_PERIOD,
      defaultRebalanceDeviation: config.DEFAULT_REBALANCE_DEVIATION,
      store,
      logger,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      protocolsFile,
      registryOwner: service.registryOwner,
      cellars: service.listCellars().length,
    },
    "Cellar node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
