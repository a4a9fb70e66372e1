// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/run/error-codes`
 * Purpose: Canonical RUN_ERROR codes, a producer-side error carrying one, and error normalization.
 * Scope: Single source of truth for run error codes. Does not emit events.
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: RUN_ERROR_CODES is the closed list producers pick from
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToRunErrorCode() is the canonical normalizer
 *   - The wire field stays an open string; membership is not enforced on decode
 * Side-effects: none
 * Links: src/engine/run-engine.ts, src/pipeline/stages.ts
 * @public
 */

import {
  isEventDecodeError,
  isProtocolViolationError,
  isRunRequestDecodeError,
  isSecurityViolationError,
} from "../errors";

/**
 * Canonical error codes carried on RUN_ERROR.
 * - INTERNAL_ERROR: unexpected failure inside the producer or engine
 * - VALIDATION_ERROR: malformed request or protocol violation
 * - AUTH_ERROR: caller not authorized
 * - RATE_LIMITED: caller exceeded its budget
 * - TOOL_ERROR: a tool invocation failed fatally
 * - TIMEOUT: producer gave up waiting
 * - CANCELLED: run was cancelled (client disconnect, shutdown, AbortSignal)
 */
export const RUN_ERROR_CODES = [
  "INTERNAL_ERROR",
  "VALIDATION_ERROR",
  "AUTH_ERROR",
  "RATE_LIMITED",
  "TOOL_ERROR",
  "TIMEOUT",
  "CANCELLED",
] as const;

export type RunErrorCode = (typeof RUN_ERROR_CODES)[number];

export function isRunErrorCode(x: unknown): x is RunErrorCode {
  return typeof x === "string" && (RUN_ERROR_CODES as readonly string[]).includes(x);
}

/**
 * Error a producer throws to end its run with a specific code.
 * The engine turns it into a RUN_ERROR carrying `code` and `message`.
 */
export class RunErrorException extends Error {
  readonly code: RunErrorCode;

  constructor(code: RunErrorCode, message?: string) {
    super(message ?? `run failed: ${code}`);
    this.name = "RunErrorException";
    this.code = code;
  }
}

export function isRunErrorException(error: unknown): error is RunErrorException {
  return error instanceof RunErrorException;
}

/**
 * Normalize any error to a stable RunErrorCode.
 *
 * Priority:
 * 1. AbortError → CANCELLED, TimeoutError → TIMEOUT
 * 2. Errors with a RunErrorCode `.code` → that code
 * 3. Validation failures (protocol, security, decode) → VALIDATION_ERROR
 * 4. Default → INTERNAL_ERROR
 */
export function normalizeErrorToRunErrorCode(error: unknown): RunErrorCode {
  if (error instanceof Error && error.name === "AbortError") {
    return "CANCELLED";
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return "TIMEOUT";
  }

  if (error instanceof Error && "code" in error && isRunErrorCode(error.code)) {
    return error.code;
  }

  if (
    isProtocolViolationError(error) ||
    isSecurityViolationError(error) ||
    isEventDecodeError(error) ||
    isRunRequestDecodeError(error)
  ) {
    return "VALIDATION_ERROR";
  }

  return "INTERNAL_ERROR";
}
