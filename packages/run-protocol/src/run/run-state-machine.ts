// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/run/run-state-machine`
 * Purpose: Per-run validator enforcing event ordering and open/close pairing.
 * Scope: Pure synchronous state tracking for one run. Does not frame, write or log events.
 * Invariants:
 *   - STATES: idle -> active -> finished | errored; terminal states never change
 *   - RUN_STARTED_FIRST: the first accepted event is RUN_STARTED or RUN_ERROR
 *   - ERROR_BEFORE_START: RUN_ERROR is accepted as the very first event, so a run rejected
 *     before it starts (auth, rate limit) ends errored straight from idle
 *   - PAIRING: content/end require an open id; a start for an open or already used id is rejected
 *   - NO_DANGLING_FINISH: RUN_FINISHED requires empty open context
 *   - LATE_EVENT: every submission after a terminal state is rejected
 *   - VIOLATIONS_RETURNED: submit() never throws for a bad event; it returns the violation
 * Side-effects: none
 * Links: src/errors.ts, src/engine/run-engine.ts
 * @public
 */

import { findReservedPath } from "@runwire/json-patch";

import {
  ProtocolViolationError,
  type ProtocolViolationKind,
  RunAlreadyActiveError,
  type RunValidationError,
  SecurityViolationError,
} from "../errors";
import type { EventType } from "../events/event-types";
import { createRunErrorEvent } from "../events/factories";
import type { ProtocolEvent, RunErrorEvent } from "../events/schemas";
import type { RunIdentity } from "../requests/run-request";

export type RunStatus = "idle" | "active" | "finished" | "errored";

export type SubmitResult =
  | { readonly ok: true; readonly event: ProtocolEvent }
  | { readonly ok: false; readonly violation: RunValidationError };

export interface OpenContextSnapshot {
  readonly messages: readonly string[];
  readonly toolCalls: readonly string[];
  readonly steps: readonly string[];
}

/** Read-only view of the run record. */
export interface RunRecord extends RunIdentity {
  readonly status: RunStatus;
  readonly events: readonly ProtocolEvent[];
}

export class RunStateMachine {
  private _status: RunStatus = "idle";
  private identity: RunIdentity | null = null;
  private started = false;
  private readonly log: ProtocolEvent[] = [];

  private readonly openMessages = new Set<string>();
  private readonly usedMessageIds = new Set<string>();
  private readonly openToolCalls = new Set<string>();
  private readonly usedToolCallIds = new Set<string>();
  private readonly openSteps = new Set<string>();

  get status(): RunStatus {
    return this._status;
  }

  get isTerminal(): boolean {
    return this._status === "finished" || this._status === "errored";
  }

  /** Append-only log of accepted events. */
  get events(): readonly ProtocolEvent[] {
    return this.log;
  }

  /** Run record; null until open() is called. */
  get record(): RunRecord | null {
    if (!this.identity) return null;
    return { ...this.identity, status: this._status, events: this.log };
  }

  /**
   * Accept a decoded run request: idle -> active.
   * @throws RunAlreadyActiveError when the machine was already opened
   */
  open(identity: RunIdentity): void {
    if (this._status !== "idle") {
      throw new RunAlreadyActiveError(this.identity?.runId ?? identity.runId);
    }
    this.identity = {
      threadId: identity.threadId,
      runId: identity.runId,
      ...(identity.parentRunId === undefined
        ? {}
        : { parentRunId: identity.parentRunId }),
    };
    this._status = "active";
  }

  openContext(): OpenContextSnapshot {
    return {
      messages: [...this.openMessages],
      toolCalls: [...this.openToolCalls],
      steps: [...this.openSteps],
    };
  }

  hasOpenContext(): boolean {
    return (
      this.openMessages.size > 0 || this.openToolCalls.size > 0 || this.openSteps.size > 0
    );
  }

  /** Validate one event and, when legal, apply it to the run. */
  submit(event: ProtocolEvent): SubmitResult {
    const violation = this.check(event);
    if (violation) return { ok: false, violation };
    this.accept(event);
    return { ok: true, event };
  }

  /** Synthesize and submit a RUN_ERROR. */
  fail(code: string, message: string): SubmitResult {
    const event: RunErrorEvent = createRunErrorEvent(message, code);
    return this.submit(event);
  }

  /** Record a transport failure: the run ends errored without emitting anything. */
  markErrored(): void {
    if (!this.isTerminal) this._status = "errored";
  }

  private check(event: ProtocolEvent): RunValidationError | null {
    if (this.isTerminal) {
      return violation(
        "late_event",
        event.type,
        `${event.type} received after run reached ${this._status}`
      );
    }

    if (event.type === "RUN_ERROR") return null;

    if (this._status === "idle" || !this.identity) {
      return violation("run_not_open", event.type, `${event.type} before run request`);
    }

    if (!this.started) {
      if (event.type !== "RUN_STARTED") {
        return violation(
          "first_event",
          event.type,
          `first event must be RUN_STARTED, got ${event.type}`
        );
      }
      return this.checkIdentity(event.type, event.threadId, event.runId);
    }

    switch (event.type) {
      case "RUN_STARTED":
        return violation("duplicate_start", event.type, "run already started");

      case "RUN_FINISHED": {
        const mismatch = this.checkIdentity(event.type, event.threadId, event.runId);
        if (mismatch) return mismatch;
        if (this.hasOpenContext()) {
          const open = this.openContext();
          return violation(
            "dangling_context",
            event.type,
            `run finished with open context: messages=[${open.messages.join(",")}] toolCalls=[${open.toolCalls.join(",")}] steps=[${open.steps.join(",")}]`
          );
        }
        return null;
      }

      case "TEXT_MESSAGE_START":
        if (this.openMessages.has(event.messageId) || this.usedMessageIds.has(event.messageId)) {
          return violation(
            "duplicate_start",
            event.type,
            `message ${event.messageId} already started`,
            event.messageId
          );
        }
        return null;

      case "TEXT_MESSAGE_CONTENT":
      case "TEXT_MESSAGE_END":
        if (!this.openMessages.has(event.messageId)) {
          return violation(
            "unopened_context",
            event.type,
            `message ${event.messageId} is not open`,
            event.messageId
          );
        }
        return null;

      case "TOOL_CALL_START":
        if (
          this.openToolCalls.has(event.toolCallId) ||
          this.usedToolCallIds.has(event.toolCallId)
        ) {
          return violation(
            "duplicate_start",
            event.type,
            `tool call ${event.toolCallId} already started`,
            event.toolCallId
          );
        }
        return null;

      case "TOOL_CALL_ARGS":
      case "TOOL_CALL_END":
        if (!this.openToolCalls.has(event.toolCallId)) {
          return violation(
            "unopened_context",
            event.type,
            `tool call ${event.toolCallId} is not open`,
            event.toolCallId
          );
        }
        return null;

      case "TOOL_CALL_RESULT":
        if (this.openToolCalls.has(event.toolCallId)) {
          return violation(
            "tool_call_open",
            event.type,
            `tool call ${event.toolCallId} still streaming arguments`,
            event.toolCallId
          );
        }
        return null;

      case "STEP_STARTED":
        if (this.openSteps.has(event.stepName)) {
          return violation(
            "duplicate_start",
            event.type,
            `step ${event.stepName} already open`,
            event.stepName
          );
        }
        return null;

      case "STEP_FINISHED":
        if (!this.openSteps.has(event.stepName)) {
          return violation(
            "unopened_context",
            event.type,
            `step ${event.stepName} is not open`,
            event.stepName
          );
        }
        return null;

      case "STATE_DELTA": {
        const hit = findReservedPath(event.delta);
        return hit ? new SecurityViolationError(hit.path, hit.segment, hit.opIndex) : null;
      }

      case "STATE_SNAPSHOT":
      case "MESSAGES_SNAPSHOT":
      case "CUSTOM":
      case "RAW":
        return null;
    }
  }

  private checkIdentity(
    eventType: EventType,
    threadId: string,
    runId: string
  ): ProtocolViolationError | null {
    if (!this.identity) return null;
    if (threadId !== this.identity.threadId || runId !== this.identity.runId) {
      return violation(
        "run_identity_mismatch",
        eventType,
        `${eventType} for ${threadId}/${runId} does not match run ${this.identity.threadId}/${this.identity.runId}`
      );
    }
    return null;
  }

  private accept(event: ProtocolEvent): void {
    this.log.push(event);

    switch (event.type) {
      case "RUN_STARTED":
        this.started = true;
        break;
      case "RUN_FINISHED":
        this._status = "finished";
        break;
      case "RUN_ERROR":
        this._status = "errored";
        break;
      case "TEXT_MESSAGE_START":
        this.openMessages.add(event.messageId);
        this.usedMessageIds.add(event.messageId);
        break;
      case "TEXT_MESSAGE_END":
        this.openMessages.delete(event.messageId);
        break;
      case "TOOL_CALL_START":
        this.openToolCalls.add(event.toolCallId);
        this.usedToolCallIds.add(event.toolCallId);
        break;
      case "TOOL_CALL_END":
        this.openToolCalls.delete(event.toolCallId);
        break;
      case "STEP_STARTED":
        this.openSteps.add(event.stepName);
        break;
      case "STEP_FINISHED":
        this.openSteps.delete(event.stepName);
        break;
      default:
        break;
    }
  }
}

function violation(
  kind: ProtocolViolationKind,
  eventType: EventType,
  message: string,
  contextId?: string
): ProtocolViolationError {
  return new ProtocolViolationError(kind, eventType, message, contextId);
}
