// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/diff`
 * Purpose: Compute a patch that turns one tree value into another.
 * Scope: Positional diff. Does not search for moves or use LCS alignment.
 * Invariants:
 *   - ROUND_TRIP: applyPatch(a, diff(a, b)) deep-equals b for every pair of tree values
 *   - Equal inputs produce an empty patch
 *   - Trailing array growth is emitted as `add` at "<array>/-", in order
 *   - Trailing array shrinkage is emitted as `remove` from the highest index down
 *   - Emitted values never alias the `after` input
 * Side-effects: none
 * Links: src/apply.ts, tests/diff.test.ts
 * @public
 */

import {
  cloneJson,
  deepEqual,
  isJsonObject,
  type JsonArray,
  type JsonObject,
  type JsonValue,
} from "./json-value";
import type { PatchOperation } from "./operations";
import { APPEND_SEGMENT, appendSegment } from "./pointer";

export function diff(before: JsonValue, after: JsonValue): PatchOperation[] {
  const ops: PatchOperation[] = [];
  diffValue(before, after, "", ops);
  return ops;
}

function diffValue(
  before: JsonValue,
  after: JsonValue,
  path: string,
  ops: PatchOperation[]
): void {
  if (deepEqual(before, after)) return;

  if (Array.isArray(before) && Array.isArray(after)) {
    diffArray(before, after, path, ops);
    return;
  }
  if (isJsonObject(before) && isJsonObject(after)) {
    diffObject(before, after, path, ops);
    return;
  }
  ops.push({ op: "replace", path, value: cloneJson(after) });
}

function diffObject(
  before: JsonObject,
  after: JsonObject,
  path: string,
  ops: PatchOperation[]
): void {
  for (const key of Object.keys(before)) {
    if (!Object.hasOwn(after, key)) {
      ops.push({ op: "remove", path: appendSegment(path, key) });
    }
  }
  for (const [key, next] of Object.entries(after)) {
    const childPath = appendSegment(path, key);
    const prev = Object.hasOwn(before, key) ? before[key] : undefined;
    if (prev === undefined) {
      ops.push({ op: "add", path: childPath, value: cloneJson(next) });
    } else {
      diffValue(prev, next, childPath, ops);
    }
  }
}

function diffArray(
  before: JsonArray,
  after: JsonArray,
  path: string,
  ops: PatchOperation[]
): void {
  const shared = Math.min(before.length, after.length);
  for (let i = 0; i < shared; i++) {
    const prev = before[i];
    const next = after[i];
    if (prev !== undefined && next !== undefined) {
      diffValue(prev, next, appendSegment(path, i), ops);
    }
  }
  for (let i = shared; i < after.length; i++) {
    const next = after[i];
    if (next !== undefined) {
      ops.push({
        op: "add",
        path: appendSegment(path, APPEND_SEGMENT),
        value: cloneJson(next),
      });
    }
  }
  for (let i = before.length - 1; i >= shared; i--) {
    ops.push({ op: "remove", path: appendSegment(path, i) });
  }
}
