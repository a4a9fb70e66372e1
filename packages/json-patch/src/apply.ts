// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/apply`
 * Purpose: Apply an ordered patch to a tree value.
 * Scope: add/remove/replace/move/copy/test against a private working copy. Does not compute diffs.
 * Invariants:
 *   - PATCH_ATOMIC: any failing operation aborts the whole patch; the input document is never mutated
 *   - SEQUENTIAL: each operation sees the result of all earlier operations in the same patch
 *   - SOURCE_READ_FIRST: move/copy read `from` before `path` is evaluated
 *   - RESERVED_PATHS_REJECTED: denylisted segments fail before any operation runs
 * Side-effects: none
 * Links: src/errors.ts, src/reserved.ts, tests/apply.test.ts
 * @public
 */

import {
  InvalidPatchError,
  PathNotFoundError,
  type PatchError,
  ReservedPathError,
  TestFailedError,
  TypeMismatchError,
  isPatchError,
} from "./errors";
import {
  cloneJson,
  deepEqual,
  describeJsonType,
  isJsonObject,
  type JsonArray,
  type JsonObject,
  type JsonValue,
} from "./json-value";
import type { PatchOperation } from "./operations";
import { APPEND_SEGMENT, parseArrayIndex, parsePointer } from "./pointer";
import { findReservedPath } from "./reserved";

export type ApplyPatchResult =
  | { readonly ok: true; readonly document: JsonValue }
  | { readonly ok: false; readonly document: JsonValue; readonly error: PatchError };

type Container = JsonObject | JsonArray;

interface Location {
  readonly container: Container;
  readonly key: string;
}

/**
 * Mutable working state for one patch application.
 * The root lives in a holder so whole-document replacement is just another write.
 */
class PatchCursor {
  constructor(public root: JsonValue) {}

  get(path: string, opIndex: number): JsonValue {
    let current = this.root;
    for (const segment of parsePointer(path, opIndex)) {
      const next = childOf(current, segment, opIndex, path);
      if (next === undefined) throw new PathNotFoundError(opIndex, path);
      current = next;
    }
    return current;
  }

  /** Resolve the container that holds the last segment of `path`. */
  locate(path: string, opIndex: number): Location | null {
    const segments = parsePointer(path, opIndex);
    const key = segments.pop();
    if (key === undefined) return null;

    let current = this.root;
    for (const segment of segments) {
      const next = childOf(current, segment, opIndex, path);
      if (next === undefined) throw new PathNotFoundError(opIndex, path);
      current = next;
    }
    if (!isContainer(current)) {
      throw new TypeMismatchError(opIndex, path, describeJsonType(current));
    }
    return { container: current, key };
  }

  add(path: string, value: JsonValue, opIndex: number): void {
    const loc = this.locate(path, opIndex);
    if (!loc) {
      this.root = value;
      return;
    }
    const { container, key } = loc;
    if (Array.isArray(container)) {
      if (key === APPEND_SEGMENT) {
        container.push(value);
        return;
      }
      const index = parseArrayIndex(key);
      if (index === null || index > container.length) {
        throw new PathNotFoundError(opIndex, path);
      }
      container.splice(index, 0, value);
      return;
    }
    container[key] = value;
  }

  remove(path: string, opIndex: number): JsonValue {
    const loc = this.locate(path, opIndex);
    if (!loc) {
      throw new InvalidPatchError(opIndex, path, "cannot remove the document root");
    }
    const { container, key } = loc;
    if (Array.isArray(container)) {
      const index = existingIndex(container, key, opIndex, path);
      const [removed] = container.splice(index, 1);
      if (removed === undefined) throw new PathNotFoundError(opIndex, path);
      return removed;
    }
    const removed = ownValue(container, key);
    if (removed === undefined) throw new PathNotFoundError(opIndex, path);
    delete container[key];
    return removed;
  }

  replace(path: string, value: JsonValue, opIndex: number): void {
    const loc = this.locate(path, opIndex);
    if (!loc) {
      this.root = value;
      return;
    }
    const { container, key } = loc;
    if (Array.isArray(container)) {
      container[existingIndex(container, key, opIndex, path)] = value;
      return;
    }
    if (ownValue(container, key) === undefined) {
      throw new PathNotFoundError(opIndex, path);
    }
    container[key] = value;
  }
}

function isContainer(value: JsonValue): value is Container {
  return typeof value === "object" && value !== null;
}

function ownValue(object: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(object, key) ? object[key] : undefined;
}

function existingIndex(
  array: JsonArray,
  key: string,
  opIndex: number,
  path: string
): number {
  const index = parseArrayIndex(key);
  if (index === null || index >= array.length) {
    throw new PathNotFoundError(opIndex, path);
  }
  return index;
}

function childOf(
  current: JsonValue,
  segment: string,
  opIndex: number,
  path: string
): JsonValue | undefined {
  if (Array.isArray(current)) {
    const index = parseArrayIndex(segment);
    return index === null ? undefined : current[index];
  }
  if (isJsonObject(current)) {
    return ownValue(current, segment);
  }
  throw new TypeMismatchError(opIndex, path, describeJsonType(current));
}

function isProperPrefix(prefix: string, path: string): boolean {
  return path.startsWith(`${prefix}/`);
}

function applyOperation(cursor: PatchCursor, op: PatchOperation, opIndex: number): void {
  switch (op.op) {
    case "add":
      cursor.add(op.path, cloneJson(op.value), opIndex);
      return;
    case "remove":
      cursor.remove(op.path, opIndex);
      return;
    case "replace":
      cursor.replace(op.path, cloneJson(op.value), opIndex);
      return;
    case "move": {
      if (isProperPrefix(op.from, op.path)) {
        throw new InvalidPatchError(
          opIndex,
          op.path,
          `cannot move ${JSON.stringify(op.from)} into its own descendant`
        );
      }
      // Source is read (and validated) before the destination is touched
      const value = cursor.get(op.from, opIndex);
      if (op.from === op.path) return;
      cursor.remove(op.from, opIndex);
      cursor.add(op.path, value, opIndex);
      return;
    }
    case "copy": {
      const value = cloneJson(cursor.get(op.from, opIndex));
      cursor.add(op.path, value, opIndex);
      return;
    }
    case "test": {
      let actual: JsonValue;
      try {
        actual = cursor.get(op.path, opIndex);
      } catch (error) {
        if (error instanceof PathNotFoundError) {
          throw new TestFailedError(opIndex, op.path);
        }
        throw error;
      }
      if (!deepEqual(actual, op.value)) {
        throw new TestFailedError(opIndex, op.path);
      }
      return;
    }
    default: {
      const unknown: never = op;
      throw new InvalidPatchError(
        opIndex,
        "",
        `unknown operation ${JSON.stringify(unknown)}`
      );
    }
  }
}

/**
 * Apply `patch` to `document` and return the patched copy.
 * The input document is left untouched whether or not the patch succeeds.
 *
 * @throws PatchError subclass identifying the failing operation's index and path
 */
export function applyPatch(
  document: JsonValue,
  patch: readonly PatchOperation[]
): JsonValue {
  const reserved = findReservedPath(patch);
  if (reserved) {
    throw new ReservedPathError(reserved.opIndex, reserved.path, reserved.segment);
  }

  const cursor = new PatchCursor(cloneJson(document));
  for (const [opIndex, op] of patch.entries()) {
    applyOperation(cursor, op, opIndex);
  }
  return cursor.root;
}

/**
 * Non-throwing variant. On failure `document` is the original input.
 */
export function tryApplyPatch(
  document: JsonValue,
  patch: readonly PatchOperation[]
): ApplyPatchResult {
  try {
    return { ok: true, document: applyPatch(document, patch) };
  } catch (error) {
    if (isPatchError(error)) {
      return { ok: false, document, error };
    }
    throw error;
  }
}

/** Read the value at `path`. */
export function getValueAtPointer(document: JsonValue, path: string): JsonValue {
  return new PatchCursor(document).get(path, -1);
}
