// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/tests/engine/run-engine.test`
 * Purpose: Tests for executeRun: validation, synthesized terminal events, transport failure and cancellation.
 * Scope: Engine driven by in-memory handlers and sinks. No sockets.
 * Invariants:
 *   - ALWAYS_TERMINAL: every outcome is finished or errored and the stream ends with a terminal event
 *     (unless the sink itself failed)
 *   - VIOLATIONS_REPORTED through onViolation and the outcome
 * Side-effects: none
 * Links: src/engine/run-engine.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import { executeRun } from "../../src/engine/run-engine";
import { ProtocolViolationError, TransportError } from "../../src/errors";
import {
  createCustomEvent,
  createRunFinishedEvent,
  createRunStartedEvent,
  createTextMessageContentEvent,
  createTextMessageStartEvent,
} from "../../src/events/factories";
import type { ProtocolEvent } from "../../src/events/schemas";
import type { RunHandler } from "../../src/pipeline/middleware";
import { RunErrorException } from "../../src/run/error-codes";
import { MemoryFrameSink } from "../../src/transport/sink";
import {
  createMockLogger,
  FIXED_IDS,
  makeRequest,
  minimalRunEvents,
  payloadsOf,
  replayHandler,
} from "../fixtures";

const { threadId, runId, messageId } = FIXED_IDS;

function typesIn(sink: MemoryFrameSink): unknown[] {
  return payloadsOf(sink.body).map((payload) =>
    typeof payload === "object" && payload !== null && "type" in payload
      ? payload.type
      : undefined
  );
}

describe("executeRun", () => {
  it("streams a valid run and finishes", async () => {
    const sink = new MemoryFrameSink();

    const outcome = await executeRun({
      request: makeRequest(),
      handler: replayHandler(minimalRunEvents()),
      sink,
    });

    expect(outcome).toEqual({
      threadId,
      runId,
      status: "finished",
      eventCount: 5,
      violations: [],
    });
    expect(sink.frames).toHaveLength(5);
    expect(payloadsOf(sink.body)[2]).toEqual({
      type: "TEXT_MESSAGE_CONTENT",
      messageId,
      delta: "Hi",
    });
  });

  it("stops a dangling run and synthesizes VALIDATION_ERROR", async () => {
    const sink = new MemoryFrameSink();
    const onViolation = vi.fn();
    const afterwards = vi.fn();
    const handler: RunHandler = async function* () {
      yield createRunStartedEvent(threadId, runId);
      yield createTextMessageStartEvent(messageId);
      yield createRunFinishedEvent(threadId, runId);
      afterwards();
    };

    const outcome = await executeRun({ request: makeRequest(), handler, sink, onViolation });

    expect(outcome.status).toBe("errored");
    expect(outcome.violations).toHaveLength(1);
    expect(outcome.violations[0]).toMatchObject({ violation: "dangling_context" });
    expect(onViolation).toHaveBeenCalledWith(expect.any(ProtocolViolationError));
    expect(outcome.error).toMatchObject({ type: "RUN_ERROR", code: "VALIDATION_ERROR" });
    expect(typesIn(sink)).toEqual(["RUN_STARTED", "TEXT_MESSAGE_START", "RUN_ERROR"]);
    expect(afterwards).not.toHaveBeenCalled();
  });

  it("rejects a producer whose first event is not RUN_STARTED", async () => {
    const sink = new MemoryFrameSink();

    const outcome = await executeRun({
      request: makeRequest(),
      handler: replayHandler([createTextMessageContentEvent(messageId, "Hi")]),
      sink,
    });

    expect(outcome.violations[0]).toMatchObject({ violation: "first_event" });
    expect(typesIn(sink)).toEqual(["RUN_ERROR"]);
  });

  it("maps a producer exception to RUN_ERROR with its code", async () => {
    const sink = new MemoryFrameSink();
    const logger = createMockLogger();
    const handler: RunHandler = async function* () {
      yield createRunStartedEvent(threadId, runId);
      throw new RunErrorException("TOOL_ERROR", "search backend unavailable");
    };

    const outcome = await executeRun({ request: makeRequest(), handler, sink, logger });

    expect(outcome.status).toBe("errored");
    expect(outcome.error).toEqual({
      type: "RUN_ERROR",
      message: "search backend unavailable",
      code: "TOOL_ERROR",
    });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ code: "TOOL_ERROR" }),
      "producer failed"
    );
  });

  it("turns a handler that throws before yielding into RUN_ERROR", async () => {
    const sink = new MemoryFrameSink();
    const logger = createMockLogger();
    const handler: RunHandler = () => {
      throw new Error("boom");
    };

    const outcome = await executeRun({ request: makeRequest(), handler, sink, logger });

    expect(outcome.status).toBe("errored");
    expect(outcome.error).toEqual({
      type: "RUN_ERROR",
      message: "boom",
      code: "INTERNAL_ERROR",
    });
    expect(typesIn(sink)).toEqual(["RUN_ERROR"]);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ code: "INTERNAL_ERROR" }),
      "producer failed"
    );
  });

  it("synthesizes INTERNAL_ERROR when the producer ends silently", async () => {
    const sink = new MemoryFrameSink();

    const outcome = await executeRun({
      request: makeRequest(),
      handler: replayHandler([createRunStartedEvent(threadId, runId)]),
      sink,
    });

    expect(outcome.error).toMatchObject({
      code: "INTERNAL_ERROR",
      message: "producer ended without a terminal event",
    });
  });

  it("reports an event after RUN_FINISHED as late without writing it", async () => {
    const sink = new MemoryFrameSink();
    const events: ProtocolEvent[] = [...minimalRunEvents(), createCustomEvent("late", 1)];

    const outcome = await executeRun({
      request: makeRequest(),
      handler: replayHandler(events),
      sink,
    });

    expect(outcome.status).toBe("finished");
    expect(outcome.violations[0]).toMatchObject({ violation: "late_event" });
    expect(sink.frames).toHaveLength(5);
  });

  it("errors only the run when the sink fails", async () => {
    const logger = createMockLogger();
    let writes = 0;
    let stopped = false;
    const handler: RunHandler = async function* () {
      try {
        yield* minimalRunEvents();
      } finally {
        stopped = true;
      }
    };
    const sink = {
      write: (): void => {
        writes += 1;
        if (writes === 2) throw new Error("EPIPE");
      },
    };

    const outcome = await executeRun({ request: makeRequest(), handler, sink, logger });

    expect(outcome.status).toBe("errored");
    expect(outcome.transportError).toBeInstanceOf(TransportError);
    expect(outcome.eventCount).toBe(1);
    expect(outcome.error).toBeUndefined();
    expect(writes).toBe(2);
    expect(stopped).toBe(true);
  });

  it("synthesizes CANCELLED when the external signal aborts the producer", async () => {
    const sink = new MemoryFrameSink();
    const controller = new AbortController();
    const handler: RunHandler = async function* (_request, ctx) {
      yield createRunStartedEvent(threadId, runId);
      controller.abort();
      if (ctx.signal.aborted) return;
      yield createRunFinishedEvent(threadId, runId);
    };

    const outcome = await executeRun({
      request: makeRequest(),
      handler,
      sink,
      signal: controller.signal,
    });

    expect(outcome.error).toMatchObject({ code: "CANCELLED", message: "run cancelled" });
    expect(typesIn(sink)).toEqual(["RUN_STARTED", "RUN_ERROR"]);
  });

  it("hands the producer a per-run state synchronizer", async () => {
    const sink = new MemoryFrameSink();
    const handler: RunHandler = async function* (_request, ctx) {
      yield createRunStartedEvent(threadId, runId);
      for (const state of [{ n: 0 }, { n: 0 }, { n: 1 }]) {
        const event = ctx.state.sync(state);
        if (event) yield event;
      }
      yield createRunFinishedEvent(threadId, runId);
    };

    await executeRun({ request: makeRequest(), handler, sink });

    expect(typesIn(sink)).toEqual([
      "RUN_STARTED",
      "STATE_SNAPSHOT",
      "STATE_DELTA",
      "RUN_FINISHED",
    ]);
  });

  it("turns a reserved-path sync failure into VALIDATION_ERROR", async () => {
    const sink = new MemoryFrameSink();
    const handler: RunHandler = async function* (_request, ctx) {
      yield createRunStartedEvent(threadId, runId);
      const event = ctx.state.sync(JSON.parse('{"__proto__":{"polluted":true}}'));
      if (event) yield event;
    };

    const outcome = await executeRun({ request: makeRequest(), handler, sink });

    expect(outcome.violations[0]).toMatchObject({ code: "SECURITY_VIOLATION" });
    expect(outcome.error).toMatchObject({ code: "VALIDATION_ERROR" });
    expect(typesIn(sink)).toEqual(["RUN_STARTED", "RUN_ERROR"]);
  });
});
