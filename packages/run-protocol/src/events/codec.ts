// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/events/codec`
 * Purpose: Lossless JSON encoding and validated decoding of protocol events.
 * Scope: Single-event text <-> object conversion. Does not frame events for a stream.
 * Invariants:
 *   - ROUND_TRIP: decodeEvent(encodeEvent(e)) deep-equals e for every valid event
 *   - Unknown fields are ignored; a missing required field fails with its name
 *   - An own `__proto__` member fails with its field instead of being dropped
 *   - Decoded events are deep-frozen
 * Side-effects: none
 * Links: src/events/schemas.ts, src/transport/frames.ts
 * @public
 */

import type { z } from "zod";

import { EventDecodeError } from "../errors";
import { deepFreeze, findUndecodableKey } from "./factories";
import { type ProtocolEvent, ProtocolEventSchema } from "./schemas";

export function encodeEvent(event: ProtocolEvent): string {
  return JSON.stringify(event);
}

/**
 * Decode one event from JSON text or an already-parsed value.
 * @throws EventDecodeError naming the offending field
 */
export function decodeEvent(input: unknown): ProtocolEvent {
  let value: unknown = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new EventDecodeError(
        "<body>",
        error instanceof Error ? error.message : "malformed JSON"
      );
    }
  }

  const hit = findUndecodableKey(value);
  if (hit) {
    throw new EventDecodeError(hit.field, `reserved key "${hit.segment}"`);
  }

  const result = ProtocolEventSchema.safeParse(value);
  if (!result.success) {
    const { field, reason } = firstIssue(result.error);
    throw new EventDecodeError(field, reason);
  }
  return deepFreeze(result.data);
}

/** Flatten a zod error into the first failing field and its message. */
export function firstIssue(error: z.ZodError): { field: string; reason: string } {
  const issue = error.issues[0];
  if (!issue) return { field: "<root>", reason: "invalid" };
  return {
    field: issue.path.length > 0 ? issue.path.join(".") : "<root>",
    reason: issue.message,
  };
}
