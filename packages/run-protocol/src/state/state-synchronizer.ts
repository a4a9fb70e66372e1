// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/state/state-synchronizer`
 * Purpose: Turn successive shared-state values into STATE_SNAPSHOT / STATE_DELTA events.
 * Scope: Producer-side diffing for one run. Does not submit or write events.
 * Invariants:
 *   - SNAPSHOT_FIRST: the first sync (or the first after reset) emits a snapshot
 *   - NO_EMPTY_DELTA: an unchanged state yields null, never an empty delta
 *   - FAIL_CLOSED: a delta touching a reserved identifier throws SecurityViolationError,
 *     emits nothing and leaves lastKnownState unchanged
 *   - lastKnownState is a private copy; callers may keep mutating their own object
 * Side-effects: none
 * Links: @runwire/json-patch (diff, applyPatch, findReservedPath)
 * @public
 */

import {
  applyPatch,
  cloneJson,
  deepEqual,
  diff,
  findReservedKey,
  findReservedPath,
  type JsonValue,
} from "@runwire/json-patch";

import { SecurityViolationError, StateDivergenceError } from "../errors";
import { createStateDeltaEvent, createStateSnapshotEvent } from "../events/factories";
import type { StateDeltaEvent, StateSnapshotEvent } from "../events/schemas";

export type StateSyncEvent = StateSnapshotEvent | StateDeltaEvent;

export class StateSynchronizer {
  private last: JsonValue | undefined;

  /** Last state the consumer is known to hold, or undefined before the first sync. */
  get lastKnownState(): JsonValue | undefined {
    return this.last === undefined ? undefined : cloneJson(this.last);
  }

  get hasBaseline(): boolean {
    return this.last !== undefined;
  }

  /**
   * Produce the event that moves the consumer from the last known state to `next`.
   * @returns null when nothing changed
   * @throws SecurityViolationError when the change touches a reserved identifier
   */
  sync(next: JsonValue): StateSyncEvent | null {
    if (this.last === undefined) {
      const hit = findReservedKey(next);
      if (hit) {
        throw new SecurityViolationError(hit.pointer, hit.segment, 0);
      }
      const event = createStateSnapshotEvent(next);
      this.last = cloneJson(next);
      return event;
    }

    const ops = diff(this.last, next);
    if (ops.length === 0) return null;

    const hit = findReservedPath(ops);
    if (hit) {
      throw new SecurityViolationError(hit.path, hit.segment, hit.opIndex);
    }
    // Keys nested inside an added value never show up in a path.
    for (const [opIndex, op] of ops.entries()) {
      if (op.op !== "add" && op.op !== "replace") continue;
      const nested = findReservedKey(op.value, op.path);
      if (nested) {
        throw new SecurityViolationError(nested.pointer, nested.segment, opIndex);
      }
    }

    const patched = applyPatch(this.last, ops);
    if (!deepEqual(patched, next)) {
      throw new StateDivergenceError();
    }

    const event = createStateDeltaEvent(ops);
    this.last = patched;
    return event;
  }

  /** Record a baseline the consumer already holds (e.g. the request's initial state). */
  seed(state: JsonValue): void {
    this.last = cloneJson(state);
  }

  /** Forget the baseline; the next sync emits a snapshot. */
  reset(): void {
    this.last = undefined;
  }
}
