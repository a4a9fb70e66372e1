// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/events/event-types`
 * Purpose: Closed enumeration of protocol event kinds and their families.
 * Scope: Constants and classification. Does not define payload shapes.
 * Invariants:
 *   - CLOSED_EVENT_SET: EVENT_TYPES is exhaustive; adding a kind requires a schema in schemas.ts
 *   - Every kind belongs to exactly one family
 * Side-effects: none
 * Links: src/events/schemas.ts
 * @public
 */

export const EventType = {
  RUN_STARTED: "RUN_STARTED",
  RUN_FINISHED: "RUN_FINISHED",
  RUN_ERROR: "RUN_ERROR",
  STEP_STARTED: "STEP_STARTED",
  STEP_FINISHED: "STEP_FINISHED",
  TEXT_MESSAGE_START: "TEXT_MESSAGE_START",
  TEXT_MESSAGE_CONTENT: "TEXT_MESSAGE_CONTENT",
  TEXT_MESSAGE_END: "TEXT_MESSAGE_END",
  TOOL_CALL_START: "TOOL_CALL_START",
  TOOL_CALL_ARGS: "TOOL_CALL_ARGS",
  TOOL_CALL_END: "TOOL_CALL_END",
  TOOL_CALL_RESULT: "TOOL_CALL_RESULT",
  STATE_SNAPSHOT: "STATE_SNAPSHOT",
  STATE_DELTA: "STATE_DELTA",
  MESSAGES_SNAPSHOT: "MESSAGES_SNAPSHOT",
  CUSTOM: "CUSTOM",
  RAW: "RAW",
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const EVENT_TYPES = Object.values(EventType);

export type EventFamily = "lifecycle" | "text" | "tool" | "state" | "extension";

const FAMILY_BY_TYPE: Readonly<Record<EventType, EventFamily>> = {
  RUN_STARTED: "lifecycle",
  RUN_FINISHED: "lifecycle",
  RUN_ERROR: "lifecycle",
  STEP_STARTED: "lifecycle",
  STEP_FINISHED: "lifecycle",
  TEXT_MESSAGE_START: "text",
  TEXT_MESSAGE_CONTENT: "text",
  TEXT_MESSAGE_END: "text",
  TOOL_CALL_START: "tool",
  TOOL_CALL_ARGS: "tool",
  TOOL_CALL_END: "tool",
  TOOL_CALL_RESULT: "tool",
  STATE_SNAPSHOT: "state",
  STATE_DELTA: "state",
  MESSAGES_SNAPSHOT: "state",
  CUSTOM: "extension",
  RAW: "extension",
};

export function isEventType(value: unknown): value is EventType {
  return typeof value === "string" && Object.hasOwn(FAMILY_BY_TYPE, value);
}

export function eventFamily(type: EventType): EventFamily {
  return FAMILY_BY_TYPE[type];
}

/** RUN_FINISHED and RUN_ERROR end a run. */
export function isTerminalEventType(type: EventType): boolean {
  return type === EventType.RUN_FINISHED || type === EventType.RUN_ERROR;
}
