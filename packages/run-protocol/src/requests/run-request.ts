// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/requests/run-request`
 * Purpose: Inbound run request contract and its decoder.
 * Scope: Validates request payloads from any transport. Does not open runs.
 * Invariants:
 *   - threadId and runId are required and non-empty
 *   - state / forwardedProps default to {}, messages / tools / context to []
 *   - Unknown fields are ignored; an own `__proto__` member is rejected with its field
 * Side-effects: none
 * Links: src/events/schemas.ts, src/engine/run-engine.ts
 * @public
 */

import { JsonValueSchema } from "@runwire/json-patch";
import { z } from "zod";

import { RunRequestDecodeError } from "../errors";
import { firstIssue } from "../events/codec";
import { findUndecodableKey } from "../events/factories";
import { ContextEntrySchema, MessageSchema, ToolSchema } from "../events/schemas";

export const RunRequestSchema = z.object({
  threadId: z.string().min(1, "threadId must not be empty"),
  runId: z.string().min(1, "runId must not be empty"),
  parentRunId: z.string().optional(),
  state: JsonValueSchema.default({}),
  messages: z.array(MessageSchema).default([]),
  tools: z.array(ToolSchema).default([]),
  context: z.array(ContextEntrySchema).default([]),
  /** Opaque carrier for auth and client configuration */
  forwardedProps: JsonValueSchema.default({}),
});

export type RunRequest = z.infer<typeof RunRequestSchema>;

/** Input shape before defaults are applied. */
export type RunRequestInput = z.input<typeof RunRequestSchema>;

/** Identity fields every run carries. */
export type RunIdentity = Pick<RunRequest, "threadId" | "runId" | "parentRunId">;

/**
 * Decode a run request from JSON text or an already-parsed body.
 * @throws RunRequestDecodeError naming the offending field
 */
export function decodeRunRequest(input: unknown): RunRequest {
  let value: unknown = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new RunRequestDecodeError(
        "<body>",
        error instanceof Error ? error.message : "malformed JSON"
      );
    }
  }

  const hit = findUndecodableKey(value);
  if (hit) {
    throw new RunRequestDecodeError(hit.field, `reserved key "${hit.segment}"`);
  }

  const result = RunRequestSchema.safeParse(value);
  if (!result.success) {
    const { field, reason } = firstIssue(result.error);
    throw new RunRequestDecodeError(field, reason);
  }
  return result.data;
}
