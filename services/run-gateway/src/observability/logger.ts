// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/observability/logger`
 * Purpose: Pino logger factory for the gateway. The composition root is the only caller.
 * Scope: Logger construction and flush. Library packages receive a LoggerLike instead.
 * Invariants:
 * - JSON to stdout, ISO timestamps, messageKey "msg"
 * - Silenced under Vitest / NODE_ENV=test
 * - One shared destination so flushLogger() drains every logger before exit
 * Side-effects: Writes to stdout
 * Links: src/observability/redact.ts, src/main.ts
 * @internal
 */

import pino, { type Logger } from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger };

type Destination = ReturnType<typeof pino.destination>;

let destination: Destination | null = null;

function sharedDestination(): Destination {
  if (!destination) {
    destination = pino.destination({
      dest: 1,
      sync: process.env.NODE_ENV !== "production",
      minLength: process.env.NODE_ENV === "production" ? 4096 : 0,
    });
  }
  return destination;
}

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTest = process.env.VITEST === "true" || process.env.NODE_ENV === "test";
  if (isTest) return makeNoopLogger();

  return pino(
    {
      level: process.env.LOG_LEVEL ?? "info",
      base: {
        ...bindings,
        app: "runwire",
        service: process.env.SERVICE_NAME ?? "run-gateway",
      },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    sharedDestination()
  );
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Drain buffered log lines; call before process.exit. */
export function flushLogger(): void {
  destination?.flushSync();
}
