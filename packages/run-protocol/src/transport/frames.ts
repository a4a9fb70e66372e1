// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/transport/frames`
 * Purpose: Server-Sent Events framing of protocol events and incremental frame decoding.
 * Scope: Envelope only. Never inspects payloads beyond JSON decoding at the edges.
 * Invariants:
 *   - ONE_EVENT_PER_FRAME: encodeFrame renders `data: <json>\n\n`
 *   - Stream parsing is eventsource-parser's: frames split on a blank line, LF, CR
 *     and CRLF endings are accepted, multi-line `data:` fields join with "\n",
 *     comment lines and event/id/retry fields never reach the payload
 *   - Frames without a `data:` field yield nothing
 *   - A trailing frame without a terminating blank line is flushed at end of stream
 * Side-effects: none
 * Links: src/transport/sink.ts, src/events/codec.ts
 * @public
 */

import {
  createParser,
  type EventSourceMessage,
  type EventSourceParser,
} from "eventsource-parser";

import { decodeEvent, encodeEvent } from "../events/codec";
import type { ProtocolEvent } from "../events/schemas";
import { decodeRunRequest, type RunRequest } from "../requests/run-request";

export const SSE_CONTENT_TYPE = "text/event-stream";

export function encodeFrame(event: ProtocolEvent): string {
  return `data: ${encodeEvent(event)}\n\n`;
}

/**
 * Incremental decoder: feed chunks in, get complete frame payloads out.
 *
 * Usage:
 * ```typescript
 * const decoder = new FrameDecoder();
 * for (const payload of decoder.push(chunk)) handle(payload);
 * for (const payload of decoder.end()) handle(payload);
 * ```
 */
export class FrameDecoder {
  private readonly text = new TextDecoder();
  private readonly queue: string[] = [];
  private readonly parser: EventSourceParser = createParser({
    onEvent: (event: EventSourceMessage) => {
      this.queue.push(event.data);
    },
  });

  /** Feed one chunk; returns every payload completed by it. */
  push(chunk: string | Uint8Array): string[] {
    this.parser.feed(typeof chunk === "string" ? chunk : this.text.decode(chunk, { stream: true }));
    return this.drain();
  }

  /** Flush whatever remains at end of stream. */
  end(): string[] {
    const rest = this.text.decode();
    if (rest !== "") this.parser.feed(rest);
    // A blank line dispatches a frame whose terminator never arrived.
    this.parser.feed("\n\n");
    return this.drain();
  }

  private drain(): string[] {
    return this.queue.splice(0, this.queue.length);
  }
}

export type FrameSource = AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

/** Split a chunked text/byte stream into frame payloads. */
export async function* readFrames(source: FrameSource): AsyncGenerator<string> {
  const decoder = new FrameDecoder();
  for await (const chunk of source) {
    yield* decoder.push(chunk);
  }
  yield* decoder.end();
}

/** Decode every frame of a stream as a protocol event. */
export async function* readEvents(source: FrameSource): AsyncGenerator<ProtocolEvent> {
  for await (const payload of readFrames(source)) {
    yield decodeEvent(payload);
  }
}

/** Decode every frame of a stream as a run request. */
export async function* readRunRequests(source: FrameSource): AsyncGenerator<RunRequest> {
  for await (const payload of readFrames(source)) {
    yield decodeRunRequest(payload);
  }
}
