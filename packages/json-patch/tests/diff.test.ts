// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/tests/diff.test`
 * Purpose: Unit and property tests for patch generation.
 * Scope: diff() output shape plus the apply(a, diff(a, b)) == b law.
 * Invariants: ROUND_TRIP holds for arbitrary tree values without reserved keys
 * Side-effects: randomness (fast-check, seeded per run)
 * Links: src/diff.ts, src/apply.ts
 * @internal
 */

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { applyPatch } from "../src/apply";
import { diff } from "../src/diff";
import { deepEqual, type JsonValue, JsonValueSchema } from "../src/json-value";
import { containsReservedKey } from "../src/reserved";

describe("diff", () => {
  it("returns an empty patch for structurally equal values", () => {
    expect(diff({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toEqual([]);
  });

  it("ignores object key order", () => {
    expect(diff({ a: 1, b: 2 }, { b: 2, a: 1 })).toEqual([]);
  });

  it("emits replace and append for a loading/results transition", () => {
    expect(
      diff(
        { loading: true, results: [] },
        { loading: false, results: [{ id: 1 }] }
      )
    ).toEqual([
      { op: "replace", path: "/loading", value: false },
      { op: "add", path: "/results/-", value: { id: 1 } },
    ]);
  });

  it("removes dropped keys and adds new ones", () => {
    expect(diff({ a: 1, b: 2 }, { b: 2, c: 3 })).toEqual([
      { op: "remove", path: "/a" },
      { op: "add", path: "/c", value: 3 },
    ]);
  });

  it("removes trailing array elements from the end backwards", () => {
    expect(diff([1, 2, 3, 4], [1, 2])).toEqual([
      { op: "remove", path: "/3" },
      { op: "remove", path: "/2" },
    ]);
  });

  it("recurses into elements at shared indexes", () => {
    expect(diff([{ n: 1 }, { n: 2 }], [{ n: 1 }, { n: 3 }])).toEqual([
      { op: "replace", path: "/1/n", value: 3 },
    ]);
  });

  it("replaces values whose type changes", () => {
    expect(diff({ a: [1] }, { a: { 0: 1 } })).toEqual([
      { op: "replace", path: "/a", value: { 0: 1 } },
    ]);
  });

  it("replaces the root when the top-level value differs", () => {
    expect(diff(1, "one")).toEqual([{ op: "replace", path: "", value: "one" }]);
  });

  it("escapes member names in generated paths", () => {
    expect(diff({}, { "a/b~c": true })).toEqual([
      { op: "add", path: "/a~1b~0c", value: true },
    ]);
  });

  it("does not alias values from the target document", () => {
    const nested: JsonValue = { list: [1] };
    const [op] = diff({}, { nested });
    if (op?.op !== "add") throw new Error("expected an add operation");
    expect(op.value).toEqual({ list: [1] });
    expect(op.value).not.toBe(nested);
  });

  it("round-trips arbitrary tree values", () => {
    const tree = fc
      .jsonValue({ maxDepth: 4 })
      .filter((value) => !containsReservedKey(value))
      .map((value) => JsonValueSchema.parse(value));

    fc.assert(
      fc.property(tree, tree, (before, after) => {
        const patched = applyPatch(before, diff(before, after));
        return deepEqual(patched, after);
      }),
      { numRuns: 300 }
    );
  });
});
