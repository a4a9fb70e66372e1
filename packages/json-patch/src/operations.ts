// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/operations`
 * Purpose: Patch operation types and the schema for untrusted patch documents.
 * Scope: Types and validation only. Does not apply operations.
 * Invariants: move/copy carry `from`; add/replace/test carry `value`; remove carries neither.
 * Side-effects: none
 * Links: src/apply.ts, src/diff.ts
 * @public
 */

import { z } from "zod";

import { InvalidPatchError } from "./errors";
import { type JsonValue, JsonValueSchema } from "./json-value";

export interface AddOperation {
  readonly op: "add";
  readonly path: string;
  readonly value: JsonValue;
}

export interface RemoveOperation {
  readonly op: "remove";
  readonly path: string;
}

export interface ReplaceOperation {
  readonly op: "replace";
  readonly path: string;
  readonly value: JsonValue;
}

export interface MoveOperation {
  readonly op: "move";
  readonly from: string;
  readonly path: string;
}

export interface CopyOperation {
  readonly op: "copy";
  readonly from: string;
  readonly path: string;
}

export interface TestOperation {
  readonly op: "test";
  readonly path: string;
  readonly value: JsonValue;
}

export type PatchOperation =
  | AddOperation
  | RemoveOperation
  | ReplaceOperation
  | MoveOperation
  | CopyOperation
  | TestOperation;

export type PatchOperationKind = PatchOperation["op"];

export const PATCH_OPERATION_KINDS = [
  "add",
  "remove",
  "replace",
  "move",
  "copy",
  "test",
] as const satisfies readonly PatchOperationKind[];

export const PatchOperationSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("add"), path: z.string(), value: JsonValueSchema }),
  z.object({ op: z.literal("remove"), path: z.string() }),
  z.object({ op: z.literal("replace"), path: z.string(), value: JsonValueSchema }),
  z.object({ op: z.literal("move"), from: z.string(), path: z.string() }),
  z.object({ op: z.literal("copy"), from: z.string(), path: z.string() }),
  z.object({ op: z.literal("test"), path: z.string(), value: JsonValueSchema }),
]);

export const PatchSchema = z.array(PatchOperationSchema);

/**
 * Validate an untrusted patch document.
 * @throws InvalidPatchError naming the first offending operation
 */
export function validatePatch(input: unknown): PatchOperation[] {
  const result = PatchSchema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const [first, ...rest] = issue?.path ?? [];
  const opIndex = typeof first === "number" ? first : -1;
  const field = rest.join(".") || "operation";
  throw new InvalidPatchError(
    opIndex,
    "",
    `invalid patch: ${field}: ${issue?.message ?? "malformed"}`
  );
}
