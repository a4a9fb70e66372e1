// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/pipeline/stages`
 * Purpose: Built-in middleware stages: auth, rate limit, tool filter, audit.
 * Scope: Request gating and event observation. Stages never reorder or rewrite events.
 * Invariants:
 *   - A rejecting stage yields exactly one RUN_ERROR and never calls next
 *   - rateLimitMiddleware uses a fixed window and an injected clock; expired
 *     windows are evicted, so the tracked key set stays bounded by recent traffic
 *   - toolFilterMiddleware only narrows request.tools
 * Side-effects: none (audit logs through ctx.logger)
 * Links: src/pipeline/middleware.ts, src/run/error-codes.ts
 * @public
 */

import { timingSafeEqual } from "node:crypto";

import { isJsonObject } from "@runwire/json-patch";

import { isTerminalEventType } from "../events/event-types";
import { createRunErrorEvent } from "../events/factories";
import type { RunErrorEvent } from "../events/schemas";
import type { RunRequest } from "../requests/run-request";
import type { RunErrorCode } from "../run/error-codes";
import type { RunMiddleware } from "./middleware";

function rejection(code: RunErrorCode, message: string): RunErrorEvent {
  return createRunErrorEvent(message, code);
}

// ============================================================================
// Auth
// ============================================================================

export type Authorizer = (request: RunRequest) => boolean | Promise<boolean>;

export function authMiddleware(authorize: Authorizer): RunMiddleware {
  return (next) =>
    async function* auth(request, ctx) {
      if (!(await authorize(request))) {
        ctx.logger.warn({ runId: request.runId, threadId: request.threadId }, "run unauthorized");
        yield rejection("AUTH_ERROR", "unauthorized");
        return;
      }
      yield* next(request, ctx);
    };
}

/**
 * Accepts requests whose `forwardedProps.authorization` is `Bearer <token>`.
 * Comparison is constant-time.
 */
export function bearerTokenAuthorizer(token: string): Authorizer {
  const expected = Buffer.from(`Bearer ${token}`);
  return (request) => {
    const props = request.forwardedProps;
    if (!isJsonObject(props)) return false;
    const header = props.authorization;
    if (typeof header !== "string") return false;
    const actual = Buffer.from(header);
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  };
}

// ============================================================================
// Rate limit
// ============================================================================

export interface RateLimitOptions {
  /** Runs admitted per key per window */
  readonly limit: number;
  readonly windowMs: number;
  /** Bucket key. Default: threadId */
  readonly key?: (request: RunRequest) => string;
  readonly now?: () => number;
}

/**
 * Fixed-window admission counter. Expired windows are swept at most once per
 * window length, so idle keys never outlive two windows.
 */
export class FixedWindowCounter {
  private readonly windows = new Map<string, { start: number; count: number }>();
  private nextSweep = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Keys currently holding a window */
  get size(): number {
    return this.windows.size;
  }

  admit(key: string): boolean {
    const at = this.now();
    if (at >= this.nextSweep) this.sweep(at);

    const current = this.windows.get(key);
    if (!current || at - current.start >= this.windowMs) {
      this.windows.set(key, { start: at, count: 1 });
      return true;
    }
    if (current.count >= this.limit) return false;
    current.count += 1;
    return true;
  }

  private sweep(at: number): void {
    for (const [key, entry] of this.windows) {
      if (at - entry.start >= this.windowMs) this.windows.delete(key);
    }
    this.nextSweep = at + this.windowMs;
  }
}

export function rateLimitMiddleware(options: RateLimitOptions): RunMiddleware {
  const keyOf = options.key ?? ((request: RunRequest) => request.threadId);
  const counter = new FixedWindowCounter(options.limit, options.windowMs, options.now);

  return (next) =>
    async function* rateLimit(request, ctx) {
      const key = keyOf(request);
      if (!counter.admit(key)) {
        ctx.logger.warn({ runId: request.runId, key }, "run rate limited");
        yield rejection("RATE_LIMITED", `rate limit of ${options.limit} runs exceeded`);
        return;
      }
      yield* next(request, ctx);
    };
}

// ============================================================================
// Tool filter
// ============================================================================

export function toolFilterMiddleware(allowedTools: Iterable<string>): RunMiddleware {
  const allowed = new Set(allowedTools);
  return (next) =>
    function toolFilter(request, ctx) {
      const tools = request.tools.filter((tool) => allowed.has(tool.name));
      if (tools.length !== request.tools.length) {
        ctx.logger.debug?.(
          {
            runId: request.runId,
            dropped: request.tools
              .filter((tool) => !allowed.has(tool.name))
              .map((tool) => tool.name),
          },
          "tools removed by allowlist"
        );
      }
      return next({ ...request, tools }, ctx);
    };
}

// ============================================================================
// Audit
// ============================================================================

export function auditMiddleware(): RunMiddleware {
  return (next) =>
    async function* audit(request, ctx) {
      const startedAt = Date.now();
      let count = 0;
      for await (const event of next(request, ctx)) {
        count += 1;
        ctx.logger.debug?.({ runId: request.runId, type: event.type }, "run event");
        if (isTerminalEventType(event.type)) {
          ctx.logger.info(
            {
              runId: request.runId,
              threadId: request.threadId,
              outcome: event.type === "RUN_FINISHED" ? "finished" : "errored",
              ...(event.type === "RUN_ERROR" && event.code ? { code: event.code } : {}),
              eventCount: count,
              durationMs: Date.now() - startedAt,
            },
            "run outcome"
          );
        }
        yield event;
      }
    };
}
