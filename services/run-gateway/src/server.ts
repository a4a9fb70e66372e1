// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/server`
 * Purpose: HTTP front door that streams runs as Server-Sent Events.
 * Scope: POST /runs plus the health routes. Run semantics live in @runwire/run-protocol.
 * Invariants:
 * - Body is size-limited (413) and decoded before anything is streamed (400 on failure)
 * - A run is registered with the supervisor for the whole stream (503 while draining, 409 on a duplicate runId)
 * - Writes wait for "drain" when the socket buffer is full
 * - Client disconnect aborts the run; the engine reports it as CANCELLED
 * Side-effects: IO (HTTP)
 * Links: src/health.ts, @runwire/run-protocol executeRun
 * @public
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";

import {
  decodeRunRequest,
  executeRun,
  type FrameSink,
  isRunRequestDecodeError,
  isSupervisorClosedError,
  RunAlreadyActiveError,
  type RunHandler,
  type RunLease,
  type RunRequest,
  type RunSupervisor,
  SSE_CONTENT_TYPE,
} from "@runwire/run-protocol";

import { HEALTH_PATHS, type HealthState, respondHealth } from "./health.js";
import type { Logger } from "./observability/logger.js";

export const RUNS_PATH = "/runs";

export interface GatewayServerDeps {
  handler: RunHandler;
  supervisor: RunSupervisor;
  health: HealthState;
  logger: Logger;
  maxBodyBytes: number;
}

export class PayloadTooLargeError extends Error {
  public readonly code = "PAYLOAD_TOO_LARGE" as const;
  constructor(public readonly limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * Collect the request body as UTF-8 text.
 * @throws PayloadTooLargeError once more than `limit` bytes arrive
 */
export function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let exceeded = false;

    req.on("data", (chunk: Buffer) => {
      if (exceeded) return;
      size += chunk.length;
      if (size > limit) {
        exceeded = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!exceeded) resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });
}

/** Frame sink over an HTTP response that honors socket backpressure. */
export function responseSink(res: ServerResponse): FrameSink {
  return {
    write: (frame) =>
      new Promise<void>((resolve, reject) => {
        if (res.destroyed || res.writableEnded) {
          reject(new Error("response closed"));
          return;
        }
        if (res.write(frame)) {
          resolve();
          return;
        }
        const cleanup = (): void => {
          res.off("drain", onDrain);
          res.off("close", onClose);
        };
        const onDrain = (): void => {
          cleanup();
          resolve();
        };
        const onClose = (): void => {
          cleanup();
          reject(new Error("response closed before drain"));
        };
        res.once("drain", onDrain);
        res.once("close", onClose);
      }),
  };
}

function sendJson(res: ServerResponse, status: number, body: Record<string, unknown>): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function handleRun(
  req: IncomingMessage,
  res: ServerResponse,
  deps: GatewayServerDeps
): Promise<void> {
  let request: RunRequest;
  try {
    request = decodeRunRequest(await readBody(req, deps.maxBodyBytes));
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      res.setHeader("Connection", "close");
      sendJson(res, 413, { error: "payload_too_large", limit: error.limit });
      return;
    }
    if (isRunRequestDecodeError(error)) {
      sendJson(res, 400, { error: "invalid_request", field: error.field, reason: error.reason });
      return;
    }
    throw error;
  }

  let lease: RunLease;
  try {
    lease = deps.supervisor.register(request);
  } catch (error) {
    if (isSupervisorClosedError(error)) {
      sendJson(res, 503, { error: "shutting_down" });
      return;
    }
    if (error instanceof RunAlreadyActiveError) {
      sendJson(res, 409, { error: "run_already_active", runId: error.runId });
      return;
    }
    throw error;
  }

  const log = deps.logger.child({ runId: request.runId, threadId: request.threadId });
  const onClose = (): void => {
    if (!res.writableFinished) deps.supervisor.abort(request.runId, "client disconnected");
  };
  res.on("close", onClose);

  try {
    res.writeHead(200, {
      "Content-Type": SSE_CONTENT_TYPE,
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    res.flushHeaders();

    const outcome = await executeRun({
      request,
      handler: deps.handler,
      sink: responseSink(res),
      logger: log,
      signal: lease.signal,
    });

    const summary = {
      status: outcome.status,
      eventCount: outcome.eventCount,
      violations: outcome.violations.length,
      code: outcome.error?.code,
    };
    if (outcome.transportError) {
      log.warn({ ...summary, err: outcome.transportError }, "run stream broken");
    } else {
      log.info(summary, "run stream closed");
    }
  } finally {
    res.off("close", onClose);
    lease.release();
    if (!res.writableEnded) res.end();
  }
}

async function route(
  req: IncomingMessage,
  res: ServerResponse,
  deps: GatewayServerDeps
): Promise<void> {
  const path = new URL(req.url ?? "/", "http://localhost").pathname;

  if (HEALTH_PATHS.has(path)) {
    respondHealth(path, deps.health.ready && deps.supervisor.accepting, res);
    return;
  }
  if (path === RUNS_PATH) {
    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      sendJson(res, 405, { error: "method_not_allowed" });
      return;
    }
    await handleRun(req, res, deps);
    return;
  }
  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end("not found");
}

export function createGatewayServer(deps: GatewayServerDeps): Server {
  return createServer((req, res) => {
    void route(req, res, deps).catch((err: unknown) => {
      deps.logger.error({ err, url: req.url }, "request failed");
      if (res.headersSent) {
        res.destroy();
      } else {
        sendJson(res, 500, { error: "internal_error" });
      }
    });
  });
}
