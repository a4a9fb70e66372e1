// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol`
 * Purpose: Barrel export for the run protocol: events, run state machine, state sync, transport and engine.
 * Scope: Re-exports public API from submodules. Does NOT implement logic.
 * Invariants:
 *   - PACKAGES_NO_SRC_IMPORTS: consumers import from this barrel, never from src/ paths
 *   - Library code never creates loggers; callers inject a LoggerLike
 * Side-effects: none
 * Links: src/engine/run-engine.ts
 * @public
 */

// Channels
export { BoundedChannel } from "./channel/bounded-channel";
export {
  type ChannelProducerOptions,
  channelProducer,
  type Emit,
} from "./channel/channel-producer";
// Engine
export {
  type ExecuteRunOptions,
  executeRun,
  type RunOutcome,
} from "./engine/run-engine";
export {
  type RunLease,
  RunSupervisor,
  type ShutdownOptions,
  type ShutdownReport,
} from "./engine/run-supervisor";
// Errors
export {
  ChannelClosedError,
  EventDecodeError,
  isChannelClosedError,
  isEventDecodeError,
  isLateEventError,
  isProtocolViolationError,
  isReservedKeyError,
  isRunRequestDecodeError,
  isSecurityViolationError,
  isSupervisorClosedError,
  isTransportError,
  PROTOCOL_VIOLATION_KINDS,
  ProtocolViolationError,
  type ProtocolViolationKind,
  ReservedKeyError,
  RunAlreadyActiveError,
  RunRequestDecodeError,
  type RunValidationError,
  SecurityViolationError,
  StateDivergenceError,
  SupervisorClosedError,
  TransportError,
} from "./errors";
// Events
export { decodeEvent, encodeEvent } from "./events/codec";
export {
  EVENT_TYPES,
  type EventFamily,
  EventType,
  eventFamily,
  isEventType,
  isTerminalEventType,
} from "./events/event-types";
export {
  createCustomEvent,
  createEvent,
  createMessagesSnapshotEvent,
  createRunErrorEvent,
  createRunFinishedEvent,
  createRunStartedEvent,
  createStateDeltaEvent,
  createStateSnapshotEvent,
  createStepFinishedEvent,
  createStepStartedEvent,
  createTextMessageContentEvent,
  createTextMessageEndEvent,
  createTextMessageStartEvent,
  createToolCallArgsEvent,
  createToolCallEndEvent,
  createToolCallResultEvent,
  createToolCallStartEvent,
  deepFreeze,
  findUndecodableKey,
} from "./events/factories";
export * from "./events/schemas";
// Logging
export { childLogger, type LoggerLike, NOOP_LOGGER } from "./logging";
// Pipeline
export {
  composeMiddleware,
  type RunContext,
  type RunHandler,
  type RunMiddleware,
} from "./pipeline/middleware";
export {
  type Authorizer,
  auditMiddleware,
  authMiddleware,
  bearerTokenAuthorizer,
  FixedWindowCounter,
  type RateLimitOptions,
  rateLimitMiddleware,
  toolFilterMiddleware,
} from "./pipeline/stages";
// Requests
export {
  decodeRunRequest,
  type RunIdentity,
  type RunRequest,
  type RunRequestInput,
  RunRequestSchema,
} from "./requests/run-request";
// Run
export {
  isRunErrorCode,
  isRunErrorException,
  normalizeErrorToRunErrorCode,
  RUN_ERROR_CODES,
  type RunErrorCode,
  RunErrorException,
} from "./run/error-codes";
export {
  type OpenContextSnapshot,
  type RunRecord,
  RunStateMachine,
  type RunStatus,
  type SubmitResult,
} from "./run/run-state-machine";
// State
export { StateReplica } from "./state/state-replica";
export { type StateSyncEvent, StateSynchronizer } from "./state/state-synchronizer";
// Transport
export {
  encodeFrame,
  FrameDecoder,
  type FrameSource,
  readEvents,
  readFrames,
  readRunRequests,
  SSE_CONTENT_TYPE,
} from "./transport/frames";
export { type FrameSink, MemoryFrameSink, writeFrame } from "./transport/sink";
