// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/bootstrap/container`
 * Purpose: Composition root that wires env config into the run pipeline.
 * Scope: Middleware selection and agent construction. No sockets, no signal handlers.
 * Invariants:
 * - Stage order: audit, auth, rate limit, tool filter, agent (first listed is outermost)
 * - Auth is installed only when GATEWAY_AUTH_TOKEN is set
 * - RATE_LIMIT_PER_MINUTE=0 and an unset ALLOWED_TOOLS skip their stages
 * Side-effects: none
 * Links: src/bootstrap/env.ts, src/server.ts
 * @internal
 */

import {
  auditMiddleware,
  authMiddleware,
  bearerTokenAuthorizer,
  composeMiddleware,
  type RunHandler,
  type RunMiddleware,
  RunSupervisor,
  rateLimitMiddleware,
  toolFilterMiddleware,
} from "@runwire/run-protocol";

import { createEchoAgent } from "../agents/echo-agent.js";
import type { Logger } from "../observability/logger.js";
import type { Env } from "./env.js";

export interface GatewayContainer {
  handler: RunHandler;
  supervisor: RunSupervisor;
  config: {
    maxBodyBytes: number;
    shutdownTimeoutMs: number;
  };
  logger: Logger;
}

export function buildMiddleware(
  config: Pick<Env, "GATEWAY_AUTH_TOKEN" | "RATE_LIMIT_PER_MINUTE" | "ALLOWED_TOOLS">
): RunMiddleware[] {
  const stages: RunMiddleware[] = [auditMiddleware()];
  if (config.GATEWAY_AUTH_TOKEN) {
    stages.push(authMiddleware(bearerTokenAuthorizer(config.GATEWAY_AUTH_TOKEN)));
  }
  if (config.RATE_LIMIT_PER_MINUTE > 0) {
    stages.push(rateLimitMiddleware({ limit: config.RATE_LIMIT_PER_MINUTE, windowMs: 60_000 }));
  }
  if (config.ALLOWED_TOOLS) {
    stages.push(toolFilterMiddleware(config.ALLOWED_TOOLS));
  }
  return stages;
}

/**
 * Build the gateway container from validated env and logger.
 * The agent defaults to the echo agent; tests may pass their own.
 */
export function createContainer(
  config: Env,
  logger: Logger,
  agent: RunHandler = createEchoAgent()
): GatewayContainer {
  return {
    handler: composeMiddleware(...buildMiddleware(config))(agent),
    supervisor: new RunSupervisor(logger.child({ component: "supervisor" })),
    config: {
      maxBodyBytes: config.MAX_BODY_BYTES,
      shutdownTimeoutMs: config.SHUTDOWN_TIMEOUT_MS,
    },
    logger,
  };
}
