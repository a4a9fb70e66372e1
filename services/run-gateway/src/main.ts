// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/main`
 * Purpose: Service entry point with graceful shutdown.
 * Scope: Calls env(), builds the container and starts the HTTP server. Does not contain run logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false and a closed supervisor stop run intake immediately
 *   - Active runs get SHUTDOWN_TIMEOUT_MS to finish before they are aborted
 * Side-effects: IO (HTTP listener, process signals)
 * Links: src/bootstrap/container.ts, src/server.ts
 * @public
 */

import type { Server } from "node:http";

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import type { HealthState } from "./health.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { createGatewayServer } from "./server.js";

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  // Load and validate env
  const config = env();

  // Create logger (composition root owns logger creation)
  const logger = makeLogger();

  logger.info(
    {
      logLevel: config.LOG_LEVEL,
      authEnabled: config.GATEWAY_AUTH_TOKEN !== undefined,
      rateLimitPerMinute: config.RATE_LIMIT_PER_MINUTE,
      allowedTools: config.ALLOWED_TOOLS,
    },
    "Starting run gateway"
  );

  const container = createContainer(config, logger);
  const healthState: HealthState = { ready: false };
  const server = createGatewayServer({
    handler: container.handler,
    supervisor: container.supervisor,
    health: healthState,
    logger,
    maxBodyBytes: container.config.maxBodyBytes,
  });

  await listen(server, config.PORT, config.HOST);
  healthState.ready = true;
  logger.info({ host: config.HOST, port: config.PORT }, "Run gateway ready for traffic");

  // Graceful shutdown
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false; // Stop accepting new runs
    logger.info({ signal }, "Received signal, shutting down");

    try {
      const closed = close(server);
      const report = await container.supervisor.shutdown({
        timeoutMs: container.config.shutdownTimeoutMs,
        reason: `shutdown on ${signal}`,
      });
      server.closeAllConnections();
      await closed;
      logger.info({ ...report }, "Run gateway stopped");
      flushLogger();
      process.exit(report.remaining === 0 ? 0 : 1);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
