// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/state/state-replica`
 * Purpose: Consumer-side copy of shared state rebuilt from state events.
 * Scope: Applies STATE_SNAPSHOT / STATE_DELTA events. Ignores every other event kind.
 * Invariants:
 *   - A delta before any snapshot is applied to {} (the request's default state)
 *   - A failing or reserved-path delta leaves the replica unchanged and throws
 * Side-effects: none
 * Links: src/state/state-synchronizer.ts
 * @public
 */

import {
  applyPatch,
  cloneJson,
  findReservedKey,
  findReservedPath,
  type JsonValue,
} from "@runwire/json-patch";

import { SecurityViolationError } from "../errors";
import type { ProtocolEvent } from "../events/schemas";

export class StateReplica {
  private current: JsonValue;
  private _version = 0;

  constructor(initial: JsonValue = {}) {
    this.current = cloneJson(initial);
  }

  get state(): JsonValue {
    return cloneJson(this.current);
  }

  /** Number of state events applied so far. */
  get version(): number {
    return this._version;
  }

  /**
   * Fold one event into the replica.
   * @returns true when the event changed the replica
   * @throws SecurityViolationError, or a PatchError from the patch engine
   */
  apply(event: ProtocolEvent): boolean {
    switch (event.type) {
      case "STATE_SNAPSHOT": {
        const hit = findReservedKey(event.snapshot);
        if (hit) throw new SecurityViolationError(hit.pointer, hit.segment, 0);
        this.current = cloneJson(event.snapshot);
        this._version += 1;
        return true;
      }
      case "STATE_DELTA": {
        const hit = findReservedPath(event.delta);
        if (hit) throw new SecurityViolationError(hit.path, hit.segment, hit.opIndex);
        this.current = applyPatch(this.current, event.delta);
        this._version += 1;
        return true;
      }
      default:
        return false;
    }
  }
}
