// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.workspace`
 * Purpose: Vitest workspace configuration for monorepo test discovery.
 * Scope: Discovers package-local and service-local vitest configs.
 * Invariants:
 *   - Package tests in packages/<pkg>/tests/** only import that package and its declared deps
 *   - Service tests may import any workspace package through its public barrel
 * Side-effects: none
 * Links: packages/&lt;pkg&gt;/vitest.config.ts, services/&lt;svc&gt;/vitest.config.ts
 * @public
 */

import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  // Package-local tests
  "./packages/*/vitest.config.ts",
  // Service-local tests
  "./services/*/vitest.config.ts",
]);
