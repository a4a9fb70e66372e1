// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No server or middleware construction.
 * Invariants:
 * - GATEWAY_AUTH_TOKEN is a secret; never log it
 * - Empty strings count as unset for optional vars
 * - Fails fast with per-field errors on invalid config
 * Side-effects: Reads process.env
 * Links: src/main.ts, src/bootstrap/container.ts
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** HTTP port for runs and health probes (default: 8080) */
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  /** Bind address (default: 0.0.0.0) */
  HOST: z.string().min(1).default("0.0.0.0"),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: run-gateway) */
  SERVICE_NAME: z.string().default("run-gateway"),

  /** Drain window for active runs on SIGTERM before they are aborted */
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),

  /** Upper bound for a POST /runs body */
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(1_048_576),

  /** Runs admitted per thread per minute; 0 disables the limiter */
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(0).default(60),

  /** Bearer token clients pass in forwardedProps.authorization (optional, treat as secret) */
  GATEWAY_AUTH_TOKEN: z
    .string()
    .min(16, "GATEWAY_AUTH_TOKEN must be at least 16 characters")
    .optional()
    .or(z.literal("").transform(() => undefined)),

  /** Comma-separated tool allowlist, e.g. "search,calculator" (optional) */
  ALLOWED_TOOLS: z
    .string()
    .min(1)
    .transform((raw) =>
      raw
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .optional()
    .or(z.literal("").transform(() => undefined)),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate an environment record.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
