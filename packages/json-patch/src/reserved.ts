// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/reserved`
 * Purpose: Denylist of prototype-pollution identifiers for patch paths.
 * Scope: Detection only. Callers decide whether to throw or fail closed.
 * Invariants:
 *   - RESERVED_SEGMENTS is matched against unescaped segments of both `path` and `from`
 *   - A pointer that does not parse is not reported here (apply rejects it separately)
 * Side-effects: none
 * Links: src/apply.ts, @runwire/run-protocol state synchronizer
 * @public
 */

import type { PatchOperation } from "./operations";
import { appendSegment, unescapeSegment } from "./pointer";

export const RESERVED_SEGMENTS = ["__proto__", "constructor", "prototype"] as const;

export type ReservedSegment = (typeof RESERVED_SEGMENTS)[number];

export interface ReservedPathHit {
  readonly opIndex: number;
  readonly field: "path" | "from";
  readonly path: string;
  readonly segment: ReservedSegment;
}

function isReservedSegment(segment: string): segment is ReservedSegment {
  return (RESERVED_SEGMENTS as readonly string[]).includes(segment);
}

/** First reserved segment in a pointer, or null. */
export function findReservedSegment(pointer: string): ReservedSegment | null {
  if (!pointer.startsWith("/")) return null;
  for (const raw of pointer.slice(1).split("/")) {
    const segment = unescapeSegment(raw);
    if (isReservedSegment(segment)) return segment;
  }
  return null;
}

/** Locate the first operation whose `path` or `from` touches a reserved identifier. */
export function findReservedPath(
  ops: readonly PatchOperation[]
): ReservedPathHit | null {
  for (const [opIndex, op] of ops.entries()) {
    if (op.op === "move" || op.op === "copy") {
      const segment = findReservedSegment(op.from);
      if (segment) return { opIndex, field: "from", path: op.from, segment };
    }
    const segment = findReservedSegment(op.path);
    if (segment) return { opIndex, field: "path", path: op.path, segment };
  }
  return null;
}

export interface ReservedKeyHit {
  /** Pointer to the offending member, relative to the inspected value */
  readonly pointer: string;
  readonly segment: ReservedSegment;
}

/**
 * Locate the first object key inside a value that is a reserved identifier.
 * `segments` narrows the denylist, e.g. to `["__proto__"]`.
 */
export function findReservedKey(
  value: unknown,
  pointer = "",
  segments: readonly ReservedSegment[] = RESERVED_SEGMENTS
): ReservedKeyHit | null {
  if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) {
      const hit = findReservedKey(item, appendSegment(pointer, index), segments);
      if (hit) return hit;
    }
    return null;
  }
  if (typeof value === "object" && value !== null) {
    for (const [key, item] of Object.entries(value)) {
      const here = appendSegment(pointer, key);
      if (isReservedSegment(key) && segments.includes(key)) {
        return { pointer: here, segment: key };
      }
      const hit = findReservedKey(item, here, segments);
      if (hit) return hit;
    }
  }
  return null;
}

/** True when any object key inside the value is a reserved identifier. */
export function containsReservedKey(value: unknown): boolean {
  return findReservedKey(value) !== null;
}
