// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/errors`
 * Purpose: Domain error classes for run validation, state sync, transport and decoding.
 * Scope: Error definitions and type guards. Does not perform I/O or contain protocol logic.
 * Invariants:
 *   - All errors have a readonly `code` discriminant for type guards
 *   - ProtocolViolationError is reported to the producer, never silently dropped
 *   - TransportError is terminal for its run only
 * Side-effects: none
 * Links: src/run/run-state-machine.ts, src/engine/run-engine.ts
 * @public
 */

import type { EventType } from "./events/event-types";

/**
 * Kinds of ordering violations.
 * - run_not_open: event submitted before the run request was received
 * - first_event: first event of a run is not RUN_STARTED
 * - duplicate_start: start for an id/step that is open (or an id already used in this run)
 * - unopened_context: content/end for an id that is not open
 * - dangling_context: RUN_FINISHED while messages, tool calls or steps are still open
 * - tool_call_open: TOOL_CALL_RESULT for a tool call whose arguments are still streaming
 * - run_identity_mismatch: RUN_STARTED/RUN_FINISHED ids differ from the run request
 * - late_event: any event after RUN_FINISHED or RUN_ERROR
 */
export const PROTOCOL_VIOLATION_KINDS = [
  "run_not_open",
  "first_event",
  "duplicate_start",
  "unopened_context",
  "dangling_context",
  "tool_call_open",
  "run_identity_mismatch",
  "late_event",
] as const;

export type ProtocolViolationKind = (typeof PROTOCOL_VIOLATION_KINDS)[number];

export class ProtocolViolationError extends Error {
  public readonly code = "PROTOCOL_VIOLATION" as const;
  constructor(
    public readonly violation: ProtocolViolationKind,
    public readonly eventType: EventType,
    message: string,
    /** Message id, tool call id or step name the violation refers to */
    public readonly contextId?: string
  ) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}

export class SecurityViolationError extends Error {
  public readonly code = "SECURITY_VIOLATION" as const;
  constructor(
    public readonly path: string,
    public readonly segment: string,
    public readonly opIndex: number
  ) {
    super(
      `patch operation ${opIndex} targets reserved identifier "${segment}" (${path})`
    );
    this.name = "SecurityViolationError";
  }
}

export class ReservedKeyError extends Error {
  public readonly code = "RESERVED_KEY" as const;
  constructor(
    /** Dotted path of the offending member */
    public readonly field: string,
    public readonly segment: string
  ) {
    super(`event payload carries reserved key "${segment}" at ${field}`);
    this.name = "ReservedKeyError";
  }
}

export class StateDivergenceError extends Error {
  public readonly code = "STATE_DIVERGENCE" as const;
  constructor() {
    super("patched state does not match the requested state");
    this.name = "StateDivergenceError";
  }
}

export class TransportError extends Error {
  public readonly code = "TRANSPORT_FAILURE" as const;
  constructor(
    public readonly runId: string,
    options?: { cause?: unknown }
  ) {
    super(`transport sink rejected a frame for run ${runId}`, options);
    this.name = "TransportError";
  }
}

export class EventDecodeError extends Error {
  public readonly code = "EVENT_DECODE_FAILED" as const;
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`invalid event: ${field}: ${reason}`);
    this.name = "EventDecodeError";
  }
}

export class RunRequestDecodeError extends Error {
  public readonly code = "RUN_REQUEST_DECODE_FAILED" as const;
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`invalid run request: ${field}: ${reason}`);
    this.name = "RunRequestDecodeError";
  }
}

export class ChannelClosedError extends Error {
  public readonly code = "CHANNEL_CLOSED" as const;
  constructor() {
    super("channel is closed");
    this.name = "ChannelClosedError";
  }
}

export class SupervisorClosedError extends Error {
  public readonly code = "SUPERVISOR_CLOSED" as const;
  constructor() {
    super("supervisor is shutting down and accepts no new runs");
    this.name = "SupervisorClosedError";
  }
}

export class RunAlreadyActiveError extends Error {
  public readonly code = "RUN_ALREADY_ACTIVE" as const;
  constructor(public readonly runId: string) {
    super(`run ${runId} is already active`);
    this.name = "RunAlreadyActiveError";
  }
}

/** Anything the state machine can reject an event with. */
export type RunValidationError = ProtocolViolationError | SecurityViolationError;

// Type guards

export function isProtocolViolationError(
  error: unknown
): error is ProtocolViolationError {
  return error instanceof Error && error.name === "ProtocolViolationError";
}

export function isLateEventError(error: unknown): error is ProtocolViolationError {
  return isProtocolViolationError(error) && error.violation === "late_event";
}

export function isSecurityViolationError(
  error: unknown
): error is SecurityViolationError {
  return error instanceof Error && error.name === "SecurityViolationError";
}

export function isReservedKeyError(error: unknown): error is ReservedKeyError {
  return error instanceof Error && error.name === "ReservedKeyError";
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof Error && error.name === "TransportError";
}

export function isEventDecodeError(error: unknown): error is EventDecodeError {
  return error instanceof Error && error.name === "EventDecodeError";
}

export function isRunRequestDecodeError(
  error: unknown
): error is RunRequestDecodeError {
  return error instanceof Error && error.name === "RunRequestDecodeError";
}

export function isChannelClosedError(error: unknown): error is ChannelClosedError {
  return error instanceof Error && error.name === "ChannelClosedError";
}

export function isSupervisorClosedError(
  error: unknown
): error is SupervisorClosedError {
  return error instanceof Error && error.name === "SupervisorClosedError";
}
