// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/tests/env.test`
 * Purpose: Tests for environment parsing: defaults, coercion and per-field errors.
 * Scope: parseEnv only; the env() singleton reads process.env and is not exercised here.
 * Invariants: Empty optional vars behave as unset
 * Side-effects: none
 * Links: src/bootstrap/env.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { parseEnv } from "../src/bootstrap/env.js";

describe("parseEnv", () => {
  it("applies defaults to an empty environment", () => {
    expect(parseEnv({})).toEqual({
      PORT: 8080,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      SERVICE_NAME: "run-gateway",
      SHUTDOWN_TIMEOUT_MS: 10_000,
      MAX_BODY_BYTES: 1_048_576,
      RATE_LIMIT_PER_MINUTE: 60,
    });
  });

  it("coerces numeric strings", () => {
    const config = parseEnv({ PORT: "3000", RATE_LIMIT_PER_MINUTE: "0", SHUTDOWN_TIMEOUT_MS: "250" });

    expect(config.PORT).toBe(3000);
    expect(config.RATE_LIMIT_PER_MINUTE).toBe(0);
    expect(config.SHUTDOWN_TIMEOUT_MS).toBe(250);
  });

  it("splits ALLOWED_TOOLS and drops blank entries", () => {
    expect(parseEnv({ ALLOWED_TOOLS: " search, calculator ,," }).ALLOWED_TOOLS).toEqual([
      "search",
      "calculator",
    ]);
  });

  it("treats empty optional vars as unset", () => {
    const config = parseEnv({ GATEWAY_AUTH_TOKEN: "", ALLOWED_TOOLS: "" });

    expect(config.GATEWAY_AUTH_TOKEN).toBeUndefined();
    expect(config.ALLOWED_TOOLS).toBeUndefined();
  });

  it("lists each invalid variable", () => {
    expect(() => parseEnv({ PORT: "abc", GATEWAY_AUTH_TOKEN: "short" })).toThrow(
      /Invalid environment configuration:\n {2}PORT: Expected number, received nan\n {2}GATEWAY_AUTH_TOKEN: GATEWAY_AUTH_TOKEN must be at least 16 characters/
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow(/ {2}LOG_LEVEL: /);
  });
});
