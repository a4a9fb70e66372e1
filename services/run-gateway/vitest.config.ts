// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/vitest.config`
 * Purpose: Vitest configuration for run-gateway service tests.
 * Scope: Service-local tests only; servers bind to an ephemeral loopback port.
 * Invariants: No external network
 * Side-effects: none
 * Notes: Uses vite-tsconfig-paths so @runwire/* resolve to workspace sources.
 * Links: vitest.workspace.ts, tests/
 * @internal
 */

import { fileURLToPath } from "node:url";

import tsconfigPaths from "vite-tsconfig-paths";
import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "run-gateway",
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
  },
  plugins: [
    tsconfigPaths({
      projects: [fileURLToPath(new URL("../../tsconfig.json", import.meta.url))],
    }),
  ],
});
