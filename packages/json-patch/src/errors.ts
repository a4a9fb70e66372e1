// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/errors`
 * Purpose: Error classes for patch application and pointer parsing.
 * Scope: Error definitions and type guards. Does not contain patch logic.
 * Invariants:
 *   - All errors have a readonly `code` discriminant for type guards
 *   - opIndex is the failing operation's position in the patch (-1 outside a patch)
 *   - path is the pointer that failed to resolve (or `from` for move/copy sources)
 * Side-effects: none
 * Links: src/apply.ts
 * @public
 */

export abstract class PatchError extends Error {
  abstract readonly code: string;

  constructor(
    public readonly opIndex: number,
    public readonly path: string,
    message: string
  ) {
    super(opIndex >= 0 ? `operation ${opIndex} (${path}): ${message}` : message);
  }
}

export class PathNotFoundError extends PatchError {
  public readonly code = "PATH_NOT_FOUND" as const;
  constructor(opIndex: number, path: string) {
    super(opIndex, path, `path ${JSON.stringify(path)} does not exist`);
    this.name = "PathNotFoundError";
  }
}

export class TypeMismatchError extends PatchError {
  public readonly code = "TYPE_MISMATCH" as const;
  constructor(
    opIndex: number,
    path: string,
    public readonly actualType: string
  ) {
    super(
      opIndex,
      path,
      `cannot traverse into ${actualType} at ${JSON.stringify(path)}`
    );
    this.name = "TypeMismatchError";
  }
}

export class TestFailedError extends PatchError {
  public readonly code = "TEST_FAILED" as const;
  constructor(opIndex: number, path: string) {
    super(opIndex, path, `test failed at ${JSON.stringify(path)}`);
    this.name = "TestFailedError";
  }
}

export class InvalidPointerError extends PatchError {
  public readonly code = "INVALID_POINTER" as const;
  constructor(opIndex: number, path: string, reason: string) {
    super(opIndex, path, `invalid pointer ${JSON.stringify(path)}: ${reason}`);
    this.name = "InvalidPointerError";
  }
}

export class InvalidPatchError extends PatchError {
  public readonly code = "INVALID_PATCH" as const;
  constructor(opIndex: number, path: string, reason: string) {
    super(opIndex, path, reason);
    this.name = "InvalidPatchError";
  }
}

export class ReservedPathError extends PatchError {
  public readonly code = "RESERVED_PATH" as const;
  constructor(
    opIndex: number,
    path: string,
    public readonly segment: string
  ) {
    super(
      opIndex,
      path,
      `path ${JSON.stringify(path)} targets reserved identifier "${segment}"`
    );
    this.name = "ReservedPathError";
  }
}

export type PatchErrorCode =
  | PathNotFoundError["code"]
  | TypeMismatchError["code"]
  | TestFailedError["code"]
  | InvalidPointerError["code"]
  | InvalidPatchError["code"]
  | ReservedPathError["code"];

// Type guards

export function isPatchError(error: unknown): error is PatchError {
  return error instanceof PatchError;
}

export function isPathNotFoundError(error: unknown): error is PathNotFoundError {
  return error instanceof Error && error.name === "PathNotFoundError";
}

export function isTypeMismatchError(error: unknown): error is TypeMismatchError {
  return error instanceof Error && error.name === "TypeMismatchError";
}

export function isTestFailedError(error: unknown): error is TestFailedError {
  return error instanceof Error && error.name === "TestFailedError";
}

export function isReservedPathError(error: unknown): error is ReservedPathError {
  return error instanceof Error && error.name === "ReservedPathError";
}
