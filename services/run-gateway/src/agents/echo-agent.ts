// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/agents/echo-agent`
 * Purpose: Demo run handler that streams the last user message back.
 * Scope: Producer only. Validation, framing and terminal synthesis belong to the engine.
 * Invariants:
 * - One "echo" step wraps the turn
 * - State is seeded from the request, so the only state event is a delta of { turns, lastMessage }
 * - Honors ctx.signal between chunks
 * Side-effects: Timers when delayMs > 0
 * Links: @runwire/run-protocol executeRun, src/bootstrap/container.ts
 * @public
 */

import { setTimeout as sleep } from "node:timers/promises";

import { isJsonObject, type JsonObject } from "@runwire/json-patch";
import {
  createRunFinishedEvent,
  createRunStartedEvent,
  createStepFinishedEvent,
  createStepStartedEvent,
  createTextMessageContentEvent,
  createTextMessageEndEvent,
  createTextMessageStartEvent,
  type Message,
  type RunHandler,
} from "@runwire/run-protocol";

export const ECHO_STEP = "echo";

export interface EchoAgentOptions {
  /** Characters per TEXT_MESSAGE_CONTENT delta (default: 16) */
  readonly chunkSize?: number;
  /** Pause between deltas, for demos (default: 0) */
  readonly delayMs?: number;
}

export function lastUserText(messages: readonly Message[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === "user") return message.content;
  }
  return "";
}

export function chunkText(text: string, size: number): string[] {
  const chunks: string[] = [];
  for (let offset = 0; offset < text.length; offset += size) {
    chunks.push(text.slice(offset, offset + size));
  }
  return chunks;
}

export function createEchoAgent(options: EchoAgentOptions = {}): RunHandler {
  const chunkSize = Math.max(1, options.chunkSize ?? 16);
  const delayMs = options.delayMs ?? 0;

  return async function* echoAgent(request, ctx) {
    const { threadId, runId, parentRunId } = request;
    yield createRunStartedEvent(threadId, runId, parentRunId);
    yield createStepStartedEvent(ECHO_STEP);

    const text = lastUserText(request.messages);
    if (text.length > 0) {
      const messageId = `${runId}:echo`;
      yield createTextMessageStartEvent(messageId);
      for (const chunk of chunkText(text, chunkSize)) {
        if (delayMs > 0) await sleep(delayMs, undefined, { signal: ctx.signal });
        if (ctx.signal.aborted) return;
        yield createTextMessageContentEvent(messageId, chunk);
      }
      yield createTextMessageEndEvent(messageId);
    }

    const base: JsonObject = isJsonObject(request.state) ? request.state : {};
    const turns = typeof base.turns === "number" ? base.turns + 1 : 1;
    ctx.state.seed(request.state);
    const delta = ctx.state.sync({ ...base, turns, lastMessage: text });
    if (delta) yield delta;

    yield createStepFinishedEvent(ECHO_STEP);
    yield createRunFinishedEvent(threadId, runId, { echoed: text.length });
  };
}
