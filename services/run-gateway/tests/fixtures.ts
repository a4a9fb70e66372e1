// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/tests/fixtures`
 * Purpose: Reusable fixtures for gateway tests.
 * Scope: Requests, run contexts and an in-process server harness.
 * Invariants: Servers bind to 127.0.0.1 on an ephemeral port and are closed by the caller.
 * Side-effects: IO (loopback sockets) for startTestServer only
 * Links: tests/*.test.ts
 * @internal
 */

import {
  NOOP_LOGGER,
  type ProtocolEvent,
  type RunContext,
  type RunHandler,
  type RunRequest,
  type RunRequestInput,
  RunRequestSchema,
  RunSupervisor,
  readEvents,
  StateSynchronizer,
} from "@runwire/run-protocol";

import type { HealthState } from "../src/health.js";
import { makeNoopLogger } from "../src/observability/logger.js";
import { createGatewayServer } from "../src/server.js";

export const FIXED_IDS = {
  threadId: "thread-1",
  runId: "run-1",
  userMessageId: "u1",
} as const;

export function makeRequest(overrides: Partial<RunRequestInput> = {}): RunRequest {
  return RunRequestSchema.parse({
    threadId: FIXED_IDS.threadId,
    runId: FIXED_IDS.runId,
    ...overrides,
  });
}

export function userMessage(content: string, id: string = FIXED_IDS.userMessageId) {
  return { id, role: "user", content } as const;
}

export function makeContext(signal: AbortSignal = new AbortController().signal): RunContext {
  return { signal, state: new StateSynchronizer(), logger: NOOP_LOGGER };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

/** Decode an SSE body back into protocol events. */
export function eventsOf(body: string): Promise<ProtocolEvent[]> {
  return collect(readEvents([body]));
}

export interface TestServer {
  baseUrl: string;
  supervisor: RunSupervisor;
  health: HealthState;
  close(): Promise<void>;
}

export async function startTestServer(
  handler: RunHandler,
  options: { maxBodyBytes?: number } = {}
): Promise<TestServer> {
  const supervisor = new RunSupervisor();
  const health: HealthState = { ready: true };
  const server = createGatewayServer({
    handler,
    supervisor,
    health,
    logger: makeNoopLogger(),
    maxBodyBytes: options.maxBodyBytes ?? 1_048_576,
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    supervisor,
    health,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
