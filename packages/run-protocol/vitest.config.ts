// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/vitest.config`
 * Purpose: Vitest configuration for run-protocol package tests.
 * Scope: Package-local tests only.
 * Invariants: Tests only import from this package
 * Side-effects: none
 * Links: vitest.workspace.ts, tests/
 * @internal
 */

import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "run-protocol",
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
  },
});
