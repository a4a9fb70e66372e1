// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/pipeline/middleware`
 * Purpose: Run handler contract and explicit function composition of middleware stages.
 * Scope: Types and composition only. Built-in stages live in stages.ts.
 * Invariants:
 *   - A handler is lazy: nothing runs until its event sequence is iterated
 *   - composeMiddleware(a, b, c)(h) === a(b(c(h))): first listed is outermost
 *   - Stages may short-circuit by yielding their own events instead of calling next
 * Side-effects: none
 * Links: src/pipeline/stages.ts, src/engine/run-engine.ts
 * @public
 */

import type { ProtocolEvent } from "../events/schemas";
import type { LoggerLike } from "../logging";
import type { RunRequest } from "../requests/run-request";
import type { StateSynchronizer } from "../state/state-synchronizer";

/** Per-run capabilities handed to every stage and the producer. */
export interface RunContext {
  /** Fires on client disconnect, shutdown or explicit cancellation */
  readonly signal: AbortSignal;
  /** Shared-state diffing for this run */
  readonly state: StateSynchronizer;
  readonly logger: LoggerLike;
}

export type RunHandler = (
  request: RunRequest,
  ctx: RunContext
) => AsyncIterable<ProtocolEvent>;

export type RunMiddleware = (next: RunHandler) => RunHandler;

export function composeMiddleware(...stages: readonly RunMiddleware[]): RunMiddleware {
  return (handler) => stages.reduceRight<RunHandler>((next, stage) => stage(next), handler);
}
