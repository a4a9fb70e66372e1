// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch`
 * Purpose: Barrel export for tree values, JSON Pointer and JSON Patch.
 * Scope: Re-exports public API from submodules. Does NOT implement logic.
 * Invariants: none
 * Side-effects: none
 * Links: src/apply.ts, src/diff.ts
 * @public
 */

// Patch application
export {
  type ApplyPatchResult,
  applyPatch,
  getValueAtPointer,
  tryApplyPatch,
} from "./apply";
// Patch generation
export { diff } from "./diff";
// Errors
export {
  InvalidPatchError,
  InvalidPointerError,
  isPatchError,
  isPathNotFoundError,
  isReservedPathError,
  isTestFailedError,
  isTypeMismatchError,
  PatchError,
  type PatchErrorCode,
  PathNotFoundError,
  ReservedPathError,
  TestFailedError,
  TypeMismatchError,
} from "./errors";
// Tree values
export {
  cloneJson,
  deepEqual,
  describeJsonType,
  isJsonArray,
  isJsonObject,
  type JsonArray,
  type JsonObject,
  JsonObjectSchema,
  type JsonPrimitive,
  type JsonValue,
  JsonValueSchema,
} from "./json-value";
// Operations
export {
  type AddOperation,
  type CopyOperation,
  type MoveOperation,
  PATCH_OPERATION_KINDS,
  type PatchOperation,
  type PatchOperationKind,
  PatchOperationSchema,
  PatchSchema,
  type RemoveOperation,
  type ReplaceOperation,
  type TestOperation,
  validatePatch,
} from "./operations";
// JSON Pointer
export {
  APPEND_SEGMENT,
  appendSegment,
  escapeSegment,
  formatPointer,
  parseArrayIndex,
  parsePointer,
  unescapeSegment,
} from "./pointer";
// Reserved-path denylist
export {
  containsReservedKey,
  findReservedKey,
  findReservedPath,
  findReservedSegment,
  RESERVED_SEGMENTS,
  type ReservedKeyHit,
  type ReservedPathHit,
  type ReservedSegment,
} from "./reserved";
