// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/events/factories`
 * Purpose: Construct immutable protocol events.
 * Scope: Event constructors for producers and the engine. Does not validate ordering.
 * Invariants:
 *   - EVENTS_IMMUTABLE: every returned event is deep-frozen
 *   - Payloads are copied before freezing; caller-owned objects are never frozen
 *   - No payload member is named `__proto__`, so every constructed event survives decodeEvent(encodeEvent(e))
 * Side-effects: none
 * Links: src/events/schemas.ts, src/run/run-state-machine.ts
 * @public
 */

import {
  findReservedKey,
  type JsonValue,
  type PatchOperation,
  parsePointer,
} from "@runwire/json-patch";

import { ReservedKeyError } from "../errors";
import { EventType } from "./event-types";
import type {
  CustomEvent,
  Message,
  MessageRole,
  MessagesSnapshotEvent,
  ProtocolEvent,
  RunErrorEvent,
  RunFinishedEvent,
  RunStartedEvent,
  StateDeltaEvent,
  StateSnapshotEvent,
  StepFinishedEvent,
  StepStartedEvent,
  TextMessageContentEvent,
  TextMessageEndEvent,
  TextMessageStartEvent,
  ToolCallArgsEvent,
  ToolCallEndEvent,
  ToolCallResultEvent,
  ToolCallStartEvent,
} from "./schemas";

const UNDECODABLE_KEYS = ["__proto__"] as const;

/**
 * First member that JSON text can carry but schema decoding cannot rebuild
 * (an own `__proto__` key), as a dotted field path.
 */
export function findUndecodableKey(value: unknown): { field: string; segment: string } | null {
  const hit = findReservedKey(value, "", UNDECODABLE_KEYS);
  return hit ? { field: parsePointer(hit.pointer).join("."), segment: hit.segment } : null;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Copy and freeze an arbitrary event.
 * @throws ReservedKeyError when a payload member is named `__proto__`
 */
export function createEvent<E extends ProtocolEvent>(event: E): E {
  const hit = findUndecodableKey(event);
  if (hit) throw new ReservedKeyError(hit.field, hit.segment);
  return deepFreeze(structuredClone(event));
}

export function createRunStartedEvent(
  threadId: string,
  runId: string,
  parentRunId?: string
): RunStartedEvent {
  return createEvent({
    type: EventType.RUN_STARTED,
    threadId,
    runId,
    ...(parentRunId === undefined ? {} : { parentRunId }),
  });
}

export function createRunFinishedEvent(
  threadId: string,
  runId: string,
  result?: JsonValue
): RunFinishedEvent {
  return createEvent({
    type: EventType.RUN_FINISHED,
    threadId,
    runId,
    ...(result === undefined ? {} : { result }),
  });
}

export function createRunErrorEvent(message: string, code?: string): RunErrorEvent {
  return createEvent({
    type: EventType.RUN_ERROR,
    message,
    ...(code === undefined ? {} : { code }),
  });
}

export function createStepStartedEvent(stepName: string): StepStartedEvent {
  return createEvent({ type: EventType.STEP_STARTED, stepName });
}

export function createStepFinishedEvent(stepName: string): StepFinishedEvent {
  return createEvent({ type: EventType.STEP_FINISHED, stepName });
}

export function createTextMessageStartEvent(
  messageId: string,
  role: MessageRole = "assistant"
): TextMessageStartEvent {
  return createEvent({ type: EventType.TEXT_MESSAGE_START, messageId, role });
}

export function createTextMessageContentEvent(
  messageId: string,
  delta: string
): TextMessageContentEvent {
  return createEvent({ type: EventType.TEXT_MESSAGE_CONTENT, messageId, delta });
}

export function createTextMessageEndEvent(messageId: string): TextMessageEndEvent {
  return createEvent({ type: EventType.TEXT_MESSAGE_END, messageId });
}

export function createToolCallStartEvent(
  toolCallId: string,
  toolCallName: string,
  parentMessageId?: string
): ToolCallStartEvent {
  return createEvent({
    type: EventType.TOOL_CALL_START,
    toolCallId,
    toolCallName,
    ...(parentMessageId === undefined ? {} : { parentMessageId }),
  });
}

export function createToolCallArgsEvent(
  toolCallId: string,
  delta: string
): ToolCallArgsEvent {
  return createEvent({ type: EventType.TOOL_CALL_ARGS, toolCallId, delta });
}

export function createToolCallEndEvent(toolCallId: string): ToolCallEndEvent {
  return createEvent({ type: EventType.TOOL_CALL_END, toolCallId });
}

export function createToolCallResultEvent(
  messageId: string,
  toolCallId: string,
  content: string
): ToolCallResultEvent {
  return createEvent({
    type: EventType.TOOL_CALL_RESULT,
    messageId,
    toolCallId,
    content,
    role: "tool",
  });
}

export function createStateSnapshotEvent(snapshot: JsonValue): StateSnapshotEvent {
  return createEvent({ type: EventType.STATE_SNAPSHOT, snapshot });
}

export function createStateDeltaEvent(
  delta: readonly PatchOperation[]
): StateDeltaEvent {
  return createEvent({ type: EventType.STATE_DELTA, delta: [...delta] });
}

export function createMessagesSnapshotEvent(
  messages: readonly Message[]
): MessagesSnapshotEvent {
  return createEvent({ type: EventType.MESSAGES_SNAPSHOT, messages: [...messages] });
}

export function createCustomEvent(name: string, value: JsonValue): CustomEvent {
  return createEvent({ type: EventType.CUSTOM, name, value });
}
