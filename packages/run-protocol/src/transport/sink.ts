// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/transport/sink`
 * Purpose: Frame sink contract, failure wrapping and an in-memory sink.
 * Scope: Write side of the transport. Backpressure belongs to the sink implementation.
 * Invariants:
 *   - A sink accepts one framed unit at a time and may block (return a promise)
 *   - Any throw or rejection from a sink surfaces as TransportError for that run only
 * Side-effects: IO (whatever the sink does)
 * Links: src/transport/frames.ts, src/engine/run-engine.ts
 * @public
 */

import { TransportError } from "../errors";
import type { ProtocolEvent } from "../events/schemas";
import { encodeFrame } from "./frames";

export interface FrameSink {
  write(frame: string): Promise<void> | void;
}

/** Frame one event and hand it to the sink. */
export async function writeFrame(
  sink: FrameSink,
  event: ProtocolEvent,
  runId: string
): Promise<void> {
  try {
    await sink.write(encodeFrame(event));
  } catch (error) {
    throw new TransportError(runId, { cause: error });
  }
}

/** Collects frames in memory. Useful for tests and request/response bridges. */
export class MemoryFrameSink implements FrameSink {
  readonly frames: string[] = [];

  write(frame: string): void {
    this.frames.push(frame);
  }

  /** Concatenated stream body. */
  get body(): string {
    return this.frames.join("");
  }
}
