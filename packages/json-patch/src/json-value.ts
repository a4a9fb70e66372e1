// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/json-value`
 * Purpose: Closed recursive tree-value type shared by state, tool parameters and forwarded props.
 * Scope: Type definitions, zod schema, structural equality and cloning. Does not apply patches.
 * Invariants:
 *   - JSON_ONLY: values are null | boolean | number | string | array | plain object, nothing else
 *   - Object equality ignores key order; array equality is positional
 *   - cloneJson() never shares mutable structure with its input
 * Side-effects: none
 * Links: src/apply.ts, src/diff.ts
 * @public
 */

import { z } from "zod";

export type JsonPrimitive = null | boolean | number | string;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Recursive schema for untrusted tree values.
 * Rejects NaN/Infinity (not representable on the wire).
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

/** Short type label used in error messages. */
export function describeJsonType(value: JsonValue | undefined): string {
  if (value === undefined) return "missing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function deepEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && deepEqual(item, other);
    });
  }

  if (isJsonObject(a)) {
    if (!isJsonObject(b)) return false;
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => {
      if (!Object.hasOwn(b, key)) return false;
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && deepEqual(left, right);
    });
  }

  return false;
}

export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => cloneJson(item));
  }
  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      // defineProperty keeps "__proto__" as an own data key
      Object.defineProperty(out, key, {
        value: cloneJson(item),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }
  return value;
}
