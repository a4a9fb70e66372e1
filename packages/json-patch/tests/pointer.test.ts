// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/tests/pointer.test`
 * Purpose: Unit tests for JSON Pointer parsing, formatting and escaping.
 * Scope: Pure string handling. Does not resolve pointers against documents.
 * Invariants: ~1 decodes to "/", ~0 decodes to "~", in that order
 * Side-effects: none
 * Links: src/pointer.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { InvalidPointerError } from "../src/errors";
import {
  appendSegment,
  escapeSegment,
  formatPointer,
  parseArrayIndex,
  parsePointer,
  unescapeSegment,
} from "../src/pointer";

describe("parsePointer", () => {
  it("treats the empty string as the whole document", () => {
    expect(parsePointer("")).toEqual([]);
  });

  it("splits and unescapes segments", () => {
    expect(parsePointer("/a~1b/m~0n/0")).toEqual(["a/b", "m~n", "0"]);
  });

  it("keeps empty segments", () => {
    expect(parsePointer("/")).toEqual([""]);
    expect(parsePointer("/a//b")).toEqual(["a", "", "b"]);
  });

  it("decodes ~01 as the literal ~1", () => {
    expect(parsePointer("/~01")).toEqual(["~1"]);
  });

  it("rejects pointers without a leading slash", () => {
    expect(() => parsePointer("a/b", 3)).toThrow(InvalidPointerError);
  });

  it("rejects dangling or unknown escapes", () => {
    expect(() => parsePointer("/a~")).toThrow(InvalidPointerError);
    expect(() => parsePointer("/a~2")).toThrow(InvalidPointerError);
  });
});

describe("formatPointer", () => {
  it("escapes ~ before /", () => {
    expect(escapeSegment("~/")).toBe("~0~1");
    expect(unescapeSegment("~0~1")).toBe("~/");
  });

  it("formats segments back into the original pointer", () => {
    expect(formatPointer(["a/b", "m~n", "0"])).toBe("/a~1b/m~0n/0");
    expect(formatPointer([])).toBe("");
  });

  it("appends escaped segments", () => {
    expect(appendSegment("/items", 2)).toBe("/items/2");
    expect(appendSegment("", "a/b")).toBe("/a~1b");
  });
});

describe("parseArrayIndex", () => {
  it("accepts canonical non-negative integers", () => {
    expect(parseArrayIndex("0")).toBe(0);
    expect(parseArrayIndex("12")).toBe(12);
  });

  it("rejects leading zeros, signs and non-digits", () => {
    expect(parseArrayIndex("01")).toBeNull();
    expect(parseArrayIndex("-1")).toBeNull();
    expect(parseArrayIndex("-")).toBeNull();
    expect(parseArrayIndex("1.5")).toBeNull();
    expect(parseArrayIndex("")).toBeNull();
  });
});
