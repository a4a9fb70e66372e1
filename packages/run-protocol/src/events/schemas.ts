// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/events/schemas`
 * Purpose: Payload schemas for every protocol event and for the records they carry.
 * Scope: zod schemas and inferred types for events, messages, tools and context entries. Does not encode or decode.
 * Invariants:
 *   - One schema per EventType; ProtocolEventSchema discriminates on `type`
 *   - Unknown fields are stripped on parse (forward compatibility), never rejected
 *   - No schema applies defaults, so decode(encode(e)) reproduces e exactly
 *   - Event types are Readonly; decoded and factory-built events are frozen at runtime
 * Side-effects: none
 * Links: src/events/codec.ts, src/requests/run-request.ts
 * @public
 */

import { JsonObjectSchema, JsonValueSchema, PatchOperationSchema } from "@runwire/json-patch";
import { z } from "zod";

import { EventType } from "./event-types";

// ============================================================================
// Records carried by events and run requests
// ============================================================================

export const MESSAGE_ROLES = [
  "user",
  "assistant",
  "system",
  "developer",
  "tool",
  "activity",
] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function"),
  function: z.object({
    name: z.string(),
    /** JSON-encoded arguments, as streamed through TOOL_CALL_ARGS */
    arguments: z.string(),
  }),
});

export const UserMessageSchema = z.object({
  id: z.string(),
  role: z.literal("user"),
  content: z.string(),
  name: z.string().optional(),
});

export const AssistantMessageSchema = z.object({
  id: z.string(),
  role: z.literal("assistant"),
  content: z.string().optional(),
  name: z.string().optional(),
  toolCalls: z.array(ToolCallSchema).optional(),
});

export const SystemMessageSchema = z.object({
  id: z.string(),
  role: z.literal("system"),
  content: z.string(),
  name: z.string().optional(),
});

export const DeveloperMessageSchema = z.object({
  id: z.string(),
  role: z.literal("developer"),
  content: z.string(),
  name: z.string().optional(),
});

export const ToolMessageSchema = z.object({
  id: z.string(),
  role: z.literal("tool"),
  content: z.string(),
  toolCallId: z.string(),
  error: z.string().optional(),
});

export const ActivityMessageSchema = z.object({
  id: z.string(),
  role: z.literal("activity"),
  activityType: z.string(),
  content: JsonObjectSchema,
});

export const MessageSchema = z.discriminatedUnion("role", [
  UserMessageSchema,
  AssistantMessageSchema,
  SystemMessageSchema,
  DeveloperMessageSchema,
  ToolMessageSchema,
  ActivityMessageSchema,
]);

export const ToolSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  /** JSON Schema describing the tool arguments */
  parameters: JsonValueSchema,
});

export const ContextEntrySchema = z.object({
  description: z.string(),
  value: z.string(),
});

export type ToolCall = z.infer<typeof ToolCallSchema>;
export type Message = z.infer<typeof MessageSchema>;
export type UserMessage = z.infer<typeof UserMessageSchema>;
export type AssistantMessage = z.infer<typeof AssistantMessageSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type ContextEntry = z.infer<typeof ContextEntrySchema>;

// ============================================================================
// Events
// ============================================================================

const baseEventShape = {
  /** Producer clock, epoch milliseconds */
  timestamp: z.number().optional(),
  /** Upstream event this one was translated from */
  rawEvent: JsonValueSchema.optional(),
};

export const RunStartedEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.RUN_STARTED),
  threadId: z.string(),
  runId: z.string(),
  parentRunId: z.string().optional(),
});

export const RunFinishedEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.RUN_FINISHED),
  threadId: z.string(),
  runId: z.string(),
  result: JsonValueSchema.optional(),
});

export const RunErrorEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.RUN_ERROR),
  message: z.string(),
  /** Usually a RunErrorCode; kept open for producer-specific codes */
  code: z.string().optional(),
});

export const StepStartedEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.STEP_STARTED),
  stepName: z.string(),
});

export const StepFinishedEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.STEP_FINISHED),
  stepName: z.string(),
});

export const TextMessageStartEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TEXT_MESSAGE_START),
  messageId: z.string(),
  role: z.enum(MESSAGE_ROLES).optional(),
});

export const TextMessageContentEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TEXT_MESSAGE_CONTENT),
  messageId: z.string(),
  delta: z.string(),
});

export const TextMessageEndEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TEXT_MESSAGE_END),
  messageId: z.string(),
});

export const ToolCallStartEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TOOL_CALL_START),
  toolCallId: z.string(),
  toolCallName: z.string(),
  parentMessageId: z.string().optional(),
});

export const ToolCallArgsEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TOOL_CALL_ARGS),
  toolCallId: z.string(),
  delta: z.string(),
});

export const ToolCallEndEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TOOL_CALL_END),
  toolCallId: z.string(),
});

export const ToolCallResultEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.TOOL_CALL_RESULT),
  messageId: z.string(),
  toolCallId: z.string(),
  content: z.string(),
  role: z.literal("tool").optional(),
});

export const StateSnapshotEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.STATE_SNAPSHOT),
  snapshot: JsonValueSchema,
});

export const StateDeltaEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.STATE_DELTA),
  delta: z.array(PatchOperationSchema),
});

export const MessagesSnapshotEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.MESSAGES_SNAPSHOT),
  messages: z.array(MessageSchema),
});

export const CustomEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.CUSTOM),
  name: z.string(),
  value: JsonValueSchema,
});

export const RawEventSchema = z.object({
  ...baseEventShape,
  type: z.literal(EventType.RAW),
  event: JsonValueSchema,
  source: z.string().optional(),
});

export const ProtocolEventSchema = z.discriminatedUnion("type", [
  RunStartedEventSchema,
  RunFinishedEventSchema,
  RunErrorEventSchema,
  StepStartedEventSchema,
  StepFinishedEventSchema,
  TextMessageStartEventSchema,
  TextMessageContentEventSchema,
  TextMessageEndEventSchema,
  ToolCallStartEventSchema,
  ToolCallArgsEventSchema,
  ToolCallEndEventSchema,
  ToolCallResultEventSchema,
  StateSnapshotEventSchema,
  StateDeltaEventSchema,
  MessagesSnapshotEventSchema,
  CustomEventSchema,
  RawEventSchema,
]);

export type RunStartedEvent = Readonly<z.infer<typeof RunStartedEventSchema>>;
export type RunFinishedEvent = Readonly<z.infer<typeof RunFinishedEventSchema>>;
export type RunErrorEvent = Readonly<z.infer<typeof RunErrorEventSchema>>;
export type StepStartedEvent = Readonly<z.infer<typeof StepStartedEventSchema>>;
export type StepFinishedEvent = Readonly<z.infer<typeof StepFinishedEventSchema>>;
export type TextMessageStartEvent = Readonly<
  z.infer<typeof TextMessageStartEventSchema>
>;
export type TextMessageContentEvent = Readonly<
  z.infer<typeof TextMessageContentEventSchema>
>;
export type TextMessageEndEvent = Readonly<z.infer<typeof TextMessageEndEventSchema>>;
export type ToolCallStartEvent = Readonly<z.infer<typeof ToolCallStartEventSchema>>;
export type ToolCallArgsEvent = Readonly<z.infer<typeof ToolCallArgsEventSchema>>;
export type ToolCallEndEvent = Readonly<z.infer<typeof ToolCallEndEventSchema>>;
export type ToolCallResultEvent = Readonly<
  z.infer<typeof ToolCallResultEventSchema>
>;
export type StateSnapshotEvent = Readonly<z.infer<typeof StateSnapshotEventSchema>>;
export type StateDeltaEvent = Readonly<z.infer<typeof StateDeltaEventSchema>>;
export type MessagesSnapshotEvent = Readonly<
  z.infer<typeof MessagesSnapshotEventSchema>
>;
export type CustomEvent = Readonly<z.infer<typeof CustomEventSchema>>;
export type RawEvent = Readonly<z.infer<typeof RawEventSchema>>;

/**
 * Union of every event a run may emit.
 * Consumers switch on `type`.
 */
export type ProtocolEvent =
  | RunStartedEvent
  | RunFinishedEvent
  | RunErrorEvent
  | StepStartedEvent
  | StepFinishedEvent
  | TextMessageStartEvent
  | TextMessageContentEvent
  | TextMessageEndEvent
  | ToolCallStartEvent
  | ToolCallArgsEvent
  | ToolCallEndEvent
  | ToolCallResultEvent
  | StateSnapshotEvent
  | StateDeltaEvent
  | MessagesSnapshotEvent
  | CustomEvent
  | RawEvent;

/** Narrow a ProtocolEvent to the member with the given `type`. */
export type EventOfType<T extends ProtocolEvent["type"]> = Extract<
  ProtocolEvent,
  { type: T }
>;
