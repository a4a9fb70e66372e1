// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/tests/fixtures`
 * Purpose: Shared test fixtures: ids, requests, mock logger, canned event streams.
 * Scope: Test-only helpers. Does not touch network or filesystem.
 * Invariants: Fixed ids so assertions are deterministic
 * Side-effects: none
 * Links: tests/
 * @internal
 */

import { vi } from "vitest";

import {
  createRunFinishedEvent,
  createRunStartedEvent,
  createTextMessageContentEvent,
  createTextMessageEndEvent,
  createTextMessageStartEvent,
} from "../src/events/factories";
import type { ProtocolEvent } from "../src/events/schemas";
import type { RunHandler } from "../src/pipeline/middleware";
import {
  type RunRequest,
  type RunRequestInput,
  RunRequestSchema,
} from "../src/requests/run-request";

export const FIXED_IDS = {
  threadId: "t1",
  runId: "r1",
  messageId: "m1",
  toolCallId: "tc1",
} as const;

export function makeRequest(overrides: Partial<RunRequestInput> = {}): RunRequest {
  return RunRequestSchema.parse({
    threadId: FIXED_IDS.threadId,
    runId: FIXED_IDS.runId,
    ...overrides,
  });
}

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/** RUN_STARTED, one "Hi" message, RUN_FINISHED. */
export function minimalRunEvents(): ProtocolEvent[] {
  return [
    createRunStartedEvent(FIXED_IDS.threadId, FIXED_IDS.runId),
    createTextMessageStartEvent(FIXED_IDS.messageId),
    createTextMessageContentEvent(FIXED_IDS.messageId, "Hi"),
    createTextMessageEndEvent(FIXED_IDS.messageId),
    createRunFinishedEvent(FIXED_IDS.threadId, FIXED_IDS.runId),
  ];
}

/** Handler that replays a fixed list of events. */
export function replayHandler(events: readonly ProtocolEvent[]): RunHandler {
  return async function* replay() {
    yield* events;
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

/** Parse the JSON payloads out of an SSE body. */
export function payloadsOf(body: string): unknown[] {
  return body
    .split("\n\n")
    .filter((frame) => frame.length > 0)
    .map((frame) => JSON.parse(frame.replace(/^data: /, "")));
}
