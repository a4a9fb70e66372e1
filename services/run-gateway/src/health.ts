// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/health`
 * Purpose: Health probe routes for orchestrators.
 * Scope: /livez (liveness), /readyz (readiness), /version. Mounted by the gateway server.
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * Side-effects: none
 * Links: src/server.ts, src/main.ts
 * @internal
 */

import type { ServerResponse } from "node:http";

export interface HealthState {
  ready: boolean;
}

/** Build metadata from env vars (set at build time or runtime) */
const versionInfo = {
  sha: process.env.GIT_SHA ?? "unknown",
  service: "run-gateway",
  buildTs: process.env.BUILD_TS ?? "unknown",
};

export const HEALTH_PATHS: ReadonlySet<string> = new Set(["/livez", "/readyz", "/version"]);

export function respondHealth(path: string, ready: boolean, res: ServerResponse): void {
  if (path === "/livez") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("ok");
  } else if (path === "/readyz") {
    if (ready) {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else {
      res.writeHead(503, { "Content-Type": "text/plain" });
      res.end("not ready");
    }
  } else {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify(versionInfo));
  }
}
