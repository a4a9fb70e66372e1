// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/pointer`
 * Purpose: JSON Pointer parsing and formatting with ~0 / ~1 escaping.
 * Scope: String <-> segment conversion and array index parsing. Does not resolve pointers against documents.
 * Invariants:
 *   - "" is the whole document; every other pointer starts with "/"
 *   - formatPointer(parsePointer(p)) === p for every valid pointer
 * Side-effects: none
 * Links: src/apply.ts
 * @public
 */

import { InvalidPointerError } from "./errors";

/** Array append marker. */
export const APPEND_SEGMENT = "-";

export function escapeSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function unescapeSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Split a pointer into unescaped reference tokens.
 * @throws InvalidPointerError when the pointer is malformed
 */
export function parsePointer(pointer: string, opIndex = -1): string[] {
  if (pointer === "") return [];
  if (!pointer.startsWith("/")) {
    throw new InvalidPointerError(opIndex, pointer, "must start with '/'");
  }
  // "~" may only be followed by 0 or 1
  if (/~[^01]|~$/.test(pointer)) {
    throw new InvalidPointerError(opIndex, pointer, "invalid '~' escape");
  }
  return pointer.slice(1).split("/").map(unescapeSegment);
}

export function formatPointer(segments: readonly string[]): string {
  return segments.map((s) => `/${escapeSegment(s)}`).join("");
}

export function appendSegment(pointer: string, segment: string | number): string {
  return `${pointer}/${escapeSegment(String(segment))}`;
}

/**
 * Parse an array index token. Leading zeros and signs are not allowed.
 * Returns null for anything that is not a canonical non-negative integer.
 */
export function parseArrayIndex(segment: string): number | null {
  if (!/^(0|[1-9][0-9]*)$/.test(segment)) return null;
  const index = Number(segment);
  return Number.isSafeInteger(index) ? index : null;
}
