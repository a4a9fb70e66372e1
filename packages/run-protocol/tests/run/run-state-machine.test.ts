// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/tests/run/run-state-machine.test`
 * Purpose: Tests for run lifecycle transitions, ordering rules and open-context pairing.
 * Scope: RunStateMachine in isolation.
 * Invariants:
 *   - RUN_STARTED_FIRST, PAIRING, NO_DANGLING_FINISH, LATE_EVENT
 *   - Violations are returned, never thrown
 * Side-effects: none
 * Links: src/run/run-state-machine.ts
 * @internal
 */

import { beforeEach, describe, expect, it } from "vitest";

import {
  ProtocolViolationError,
  type ProtocolViolationKind,
  RunAlreadyActiveError,
  SecurityViolationError,
} from "../../src/errors";
import {
  createCustomEvent,
  createRunErrorEvent,
  createRunFinishedEvent,
  createRunStartedEvent,
  createStateDeltaEvent,
  createStepFinishedEvent,
  createStepStartedEvent,
  createTextMessageContentEvent,
  createTextMessageEndEvent,
  createTextMessageStartEvent,
  createToolCallArgsEvent,
  createToolCallEndEvent,
  createToolCallResultEvent,
  createToolCallStartEvent,
} from "../../src/events/factories";
import type { ProtocolEvent } from "../../src/events/schemas";
import { RunStateMachine, type SubmitResult } from "../../src/run/run-state-machine";
import { FIXED_IDS, minimalRunEvents } from "../fixtures";

const { threadId, runId, messageId, toolCallId } = FIXED_IDS;

function violationOf(result: SubmitResult): ProtocolViolationKind {
  if (result.ok) throw new Error("expected a violation");
  if (!(result.violation instanceof ProtocolViolationError)) {
    throw new Error(`expected a protocol violation, got ${result.violation.name}`);
  }
  return result.violation.violation;
}

function submitAll(machine: RunStateMachine, events: readonly ProtocolEvent[]): void {
  for (const event of events) {
    const result = machine.submit(event);
    if (!result.ok) throw result.violation;
  }
}

describe("RunStateMachine", () => {
  let machine: RunStateMachine;

  beforeEach(() => {
    machine = new RunStateMachine();
    machine.open({ threadId, runId });
  });

  describe("lifecycle", () => {
    it("finishes a minimal run with an empty open context", () => {
      submitAll(machine, minimalRunEvents());

      expect(machine.status).toBe("finished");
      expect(machine.isTerminal).toBe(true);
      expect(machine.openContext()).toEqual({ messages: [], toolCalls: [], steps: [] });
      expect(machine.events.map((e) => e.type)).toEqual([
        "RUN_STARTED",
        "TEXT_MESSAGE_START",
        "TEXT_MESSAGE_CONTENT",
        "TEXT_MESSAGE_END",
        "RUN_FINISHED",
      ]);
    });

    it("rejects RUN_FINISHED while a message is still open", () => {
      submitAll(machine, minimalRunEvents().slice(0, 3));

      const result = machine.submit(createRunFinishedEvent(threadId, runId));

      expect(violationOf(result)).toBe("dangling_context");
      expect(machine.status).toBe("active");
      expect(machine.openContext().messages).toEqual([messageId]);
    });

    it("starts idle and opens to active", () => {
      const fresh = new RunStateMachine();
      expect(fresh.status).toBe("idle");
      expect(fresh.record).toBeNull();

      fresh.open({ threadId, runId, parentRunId: "r0" });

      expect(fresh.status).toBe("active");
      expect(fresh.record).toMatchObject({ threadId, runId, parentRunId: "r0" });
    });

    it("refuses to open twice", () => {
      expect(() => machine.open({ threadId, runId })).toThrow(RunAlreadyActiveError);
    });

    it("rejects events before the run request", () => {
      const fresh = new RunStateMachine();

      expect(violationOf(fresh.submit(createRunStartedEvent(threadId, runId)))).toBe(
        "run_not_open"
      );
    });
  });

  describe("first event", () => {
    it("accepts only RUN_STARTED first", () => {
      const result = machine.submit(createTextMessageStartEvent(messageId));

      expect(violationOf(result)).toBe("first_event");
      expect(machine.events).toHaveLength(0);
    });

    it("rejects a RUN_STARTED for a different run", () => {
      expect(violationOf(machine.submit(createRunStartedEvent(threadId, "other")))).toBe(
        "run_identity_mismatch"
      );
    });

    it("rejects a second RUN_STARTED", () => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);

      expect(violationOf(machine.submit(createRunStartedEvent(threadId, runId)))).toBe(
        "duplicate_start"
      );
    });

    it("accepts RUN_ERROR before RUN_STARTED", () => {
      const result = machine.submit(createRunErrorEvent("unauthorized", "AUTH_ERROR"));

      expect(result.ok).toBe(true);
      expect(machine.status).toBe("errored");
    });
  });

  describe("text pairing", () => {
    beforeEach(() => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);
    });

    it("rejects content for an unopened message", () => {
      const result = machine.submit(createTextMessageContentEvent("ghost", "boo"));

      expect(violationOf(result)).toBe("unopened_context");
      expect(result.ok ? undefined : result.violation).toMatchObject({
        contextId: "ghost",
        eventType: "TEXT_MESSAGE_CONTENT",
      });
    });

    it("rejects any reference to a message after its end", () => {
      submitAll(machine, [
        createTextMessageStartEvent(messageId),
        createTextMessageEndEvent(messageId),
      ]);

      expect(violationOf(machine.submit(createTextMessageContentEvent(messageId, "x")))).toBe(
        "unopened_context"
      );
      expect(violationOf(machine.submit(createTextMessageEndEvent(messageId)))).toBe(
        "unopened_context"
      );
      expect(violationOf(machine.submit(createTextMessageStartEvent(messageId)))).toBe(
        "duplicate_start"
      );
    });

    it("tracks interleaved messages independently", () => {
      submitAll(machine, [
        createTextMessageStartEvent("a"),
        createTextMessageStartEvent("b"),
        createTextMessageContentEvent("a", "1"),
        createTextMessageEndEvent("a"),
        createTextMessageContentEvent("b", "2"),
      ]);

      expect(machine.openContext().messages).toEqual(["b"]);
    });
  });

  describe("tool calls", () => {
    beforeEach(() => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);
    });

    it("accepts a full tool call followed by its result", () => {
      submitAll(machine, [
        createToolCallStartEvent(toolCallId, "search"),
        createToolCallArgsEvent(toolCallId, '{"q":"x"}'),
        createToolCallEndEvent(toolCallId),
        createToolCallResultEvent("m2", toolCallId, "3 hits"),
        createRunFinishedEvent(threadId, runId),
      ]);

      expect(machine.status).toBe("finished");
    });

    it("rejects a result while arguments are still streaming", () => {
      submitAll(machine, [createToolCallStartEvent(toolCallId, "search")]);

      expect(
        violationOf(machine.submit(createToolCallResultEvent("m2", toolCallId, "early")))
      ).toBe("tool_call_open");
    });

    it("rejects args for an unopened tool call", () => {
      expect(violationOf(machine.submit(createToolCallArgsEvent("nope", "{}")))).toBe(
        "unopened_context"
      );
    });

    it("rejects RUN_FINISHED with an open tool call", () => {
      submitAll(machine, [createToolCallStartEvent(toolCallId, "search")]);

      const result = machine.submit(createRunFinishedEvent(threadId, runId));

      expect(violationOf(result)).toBe("dangling_context");
      expect(result.ok ? "" : result.violation.message).toContain("toolCalls=[tc1]");
    });
  });

  describe("steps", () => {
    beforeEach(() => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);
    });

    it("allows a step name to be reused once closed", () => {
      submitAll(machine, [
        createStepStartedEvent("plan"),
        createStepFinishedEvent("plan"),
        createStepStartedEvent("plan"),
      ]);

      expect(machine.openContext().steps).toEqual(["plan"]);
    });

    it("rejects starting a step that is open", () => {
      submitAll(machine, [createStepStartedEvent("plan")]);

      expect(violationOf(machine.submit(createStepStartedEvent("plan")))).toBe(
        "duplicate_start"
      );
    });

    it("rejects finishing a step that never started", () => {
      expect(violationOf(machine.submit(createStepFinishedEvent("plan")))).toBe(
        "unopened_context"
      );
    });
  });

  describe("state and extension events", () => {
    beforeEach(() => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);
    });

    it("rejects a delta that touches a reserved identifier", () => {
      const result = machine.submit(
        createStateDeltaEvent([
          { op: "add", path: "/ok", value: 1 },
          { op: "add", path: "/__proto__/polluted", value: true },
        ])
      );

      expect(result.ok).toBe(false);
      const violation = result.ok ? null : result.violation;
      expect(violation).toBeInstanceOf(SecurityViolationError);
      expect(violation).toMatchObject({
        path: "/__proto__/polluted",
        segment: "__proto__",
        opIndex: 1,
      });
    });

    it("accepts custom events anywhere inside an active run", () => {
      expect(machine.submit(createCustomEvent("progress", 50)).ok).toBe(true);
    });
  });

  describe("terminal finality", () => {
    it("aborts with RUN_ERROR regardless of open context", () => {
      submitAll(machine, [
        createRunStartedEvent(threadId, runId),
        createTextMessageStartEvent(messageId),
        createRunErrorEvent("model crashed", "INTERNAL_ERROR"),
      ]);

      expect(machine.status).toBe("errored");
    });

    it("rejects every event after RUN_FINISHED as late", () => {
      submitAll(machine, minimalRunEvents());

      expect(violationOf(machine.submit(createCustomEvent("after", null)))).toBe(
        "late_event"
      );
      expect(violationOf(machine.submit(createRunErrorEvent("too late")))).toBe(
        "late_event"
      );
      expect(machine.status).toBe("finished");
      expect(machine.events).toHaveLength(5);
    });

    it("fail() synthesizes a RUN_ERROR with the given code", () => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);

      const result = machine.fail("TIMEOUT", "model did not answer");

      expect(result).toEqual({
        ok: true,
        event: { type: "RUN_ERROR", message: "model did not answer", code: "TIMEOUT" },
      });
      expect(violationOf(machine.fail("TIMEOUT", "again"))).toBe("late_event");
    });

    it("markErrored() ends the run without logging an event", () => {
      submitAll(machine, [createRunStartedEvent(threadId, runId)]);

      machine.markErrored();

      expect(machine.status).toBe("errored");
      expect(machine.events).toHaveLength(1);
    });
  });
});
