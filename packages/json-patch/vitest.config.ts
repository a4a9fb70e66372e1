// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/vitest.config`
 * Purpose: Vitest configuration for json-patch package tests.
 * Scope: Package-local tests only.
 * Invariants: Tests only import from this package
 * Side-effects: none
 * Links: vitest.workspace.ts, tests/
 * @internal
 */

import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "json-patch",
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
  },
});
