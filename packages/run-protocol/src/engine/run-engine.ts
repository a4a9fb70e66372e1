// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/engine/run-engine`
 * Purpose: Drive one run: pull producer events, validate, frame and write them to a sink.
 * Scope: Per-run orchestration. Does not own sockets, timers or process lifecycle.
 * Invariants:
 *   - EVENTS_IN_ORDER: events are validated and written strictly in producer order
 *   - ALWAYS_TERMINAL: every run ends finished or errored; the engine synthesizes
 *     RUN_ERROR when the producer cannot (violation, exception, silent end)
 *   - VIOLATIONS_REPORTED: every rejected event is reported via onViolation and the outcome
 *   - TRANSPORT_TERMINAL: a sink failure errors this run only; nothing more is written
 *   - Producer is always stopped (iterator return) before executeRun resolves
 * Side-effects: IO (through the sink), logging
 * Links: src/run/run-state-machine.ts, src/transport/sink.ts, src/pipeline/middleware.ts
 * @public
 */

import {
  isLateEventError,
  isProtocolViolationError,
  isSecurityViolationError,
  isTransportError,
  type RunValidationError,
  type TransportError,
} from "../errors";
import type { ProtocolEvent, RunErrorEvent } from "../events/schemas";
import { childLogger, type LoggerLike, NOOP_LOGGER } from "../logging";
import type { RunContext, RunHandler } from "../pipeline/middleware";
import type { RunRequest } from "../requests/run-request";
import { normalizeErrorToRunErrorCode, type RunErrorCode } from "../run/error-codes";
import { RunStateMachine, type SubmitResult } from "../run/run-state-machine";
import { StateSynchronizer } from "../state/state-synchronizer";
import { type FrameSink, writeFrame } from "../transport/sink";

export interface ExecuteRunOptions {
  readonly request: RunRequest;
  readonly handler: RunHandler;
  readonly sink: FrameSink;
  readonly logger?: LoggerLike;
  /** External cancellation (client disconnect, shutdown) */
  readonly signal?: AbortSignal;
  readonly onViolation?: (violation: RunValidationError) => void;
}

export interface RunOutcome {
  readonly threadId: string;
  readonly runId: string;
  readonly status: "finished" | "errored";
  /** Events accepted and written, synthesized ones included */
  readonly eventCount: number;
  readonly violations: readonly RunValidationError[];
  /** The RUN_ERROR that ended the run, when it ended that way */
  readonly error?: RunErrorEvent;
  readonly transportError?: TransportError;
}

export async function executeRun(options: ExecuteRunOptions): Promise<RunOutcome> {
  const { request, handler, sink } = options;
  const log = childLogger(options.logger ?? NOOP_LOGGER, {
    runId: request.runId,
    threadId: request.threadId,
  });

  const machine = new RunStateMachine();
  machine.open(request);

  const controller = new AbortController();
  const onAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) onAbort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const ctx: RunContext = {
    signal: controller.signal,
    state: new StateSynchronizer(),
    logger: log,
  };

  const violations: RunValidationError[] = [];
  const report = (violation: RunValidationError): void => {
    violations.push(violation);
    log.warn(
      {
        code: violation.code,
        ...(isProtocolViolationError(violation)
          ? { violation: violation.violation, eventType: violation.eventType }
          : { path: violation.path, opIndex: violation.opIndex }),
      },
      violation.message
    );
    options.onViolation?.(violation);
  };

  // Filled in by the write helpers below.
  const tally: { written: number; errorEvent?: RunErrorEvent } = { written: 0 };
  let transportError: TransportError | undefined;

  const write = async (event: ProtocolEvent): Promise<void> => {
    await writeFrame(sink, event, request.runId);
    tally.written += 1;
    if (event.type === "RUN_ERROR") tally.errorEvent = event;
  };

  /** Write an engine-made RUN_ERROR; a terminal run takes none. */
  const synthesize = async (code: RunErrorCode, message: string): Promise<void> => {
    const result: SubmitResult = machine.fail(code, message);
    if (result.ok) await write(result.event);
  };

  // Created on the first pull so a handler that throws synchronously fails like any other producer.
  let iterator: AsyncIterator<ProtocolEvent> | undefined;
  let producerOpen = true;
  const stopProducer = async (): Promise<void> => {
    if (!producerOpen) return;
    producerOpen = false;
    controller.abort();
    try {
      await iterator?.return?.();
    } catch (error) {
      log.warn({ err: error }, "producer failed while stopping");
    }
  };

  try {
    for (;;) {
      let next: IteratorResult<ProtocolEvent>;
      try {
        iterator ??= handler(request, ctx)[Symbol.asyncIterator]();
        next = await iterator.next();
      } catch (error) {
        producerOpen = false;
        if (isProtocolViolationError(error) || isSecurityViolationError(error)) {
          report(error);
        }
        if (machine.isTerminal) {
          log.warn({ err: error }, "producer failed after terminal event");
          break;
        }
        const code: RunErrorCode = controller.signal.aborted
          ? "CANCELLED"
          : normalizeErrorToRunErrorCode(error);
        log.error({ err: error, code }, "producer failed");
        await synthesize(code, error instanceof Error ? error.message : String(error));
        break;
      }

      if (next.done) {
        producerOpen = false;
        break;
      }

      const result = machine.submit(next.value);
      if (!result.ok) {
        report(result.violation);
        await stopProducer();
        if (!isLateEventError(result.violation)) {
          await synthesize("VALIDATION_ERROR", result.violation.message);
        }
        break;
      }

      await write(result.event);
    }

    if (!machine.isTerminal) {
      const cancelled = controller.signal.aborted;
      await synthesize(
        cancelled ? "CANCELLED" : "INTERNAL_ERROR",
        cancelled ? "run cancelled" : "producer ended without a terminal event"
      );
    }
  } catch (error) {
    if (!isTransportError(error)) throw error;
    transportError = error;
    machine.markErrored();
    log.error({ err: error.cause ?? error }, "transport failed; run aborted");
  } finally {
    await stopProducer();
    options.signal?.removeEventListener("abort", onAbort);
  }

  return {
    threadId: request.threadId,
    runId: request.runId,
    status: machine.status === "finished" ? "finished" : "errored",
    eventCount: tally.written,
    violations,
    ...(tally.errorEvent === undefined ? {} : { error: tally.errorEvent }),
    ...(transportError === undefined ? {} : { transportError }),
  };
}
