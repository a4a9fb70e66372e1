// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/logging`
 * Purpose: Minimal logger interface accepted by library code.
 * Scope: Type plus a no-op implementation. Does not create real loggers.
 * Invariants:
 *   - Compatible with pino.Logger (structural subset)
 *   - Library code never imports pino; the composition root injects it
 * Side-effects: none
 * @public
 */

/** Minimal logger interface - pino-compatible subset. */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): LoggerLike;
}

const noop = (): void => {};

export const NOOP_LOGGER: LoggerLike = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
  child: () => NOOP_LOGGER,
};

/** Bind fields onto a logger when it supports child loggers. */
export function childLogger(
  logger: LoggerLike,
  bindings: Record<string, unknown>
): LoggerLike {
  return logger.child ? logger.child(bindings) : logger;
}
