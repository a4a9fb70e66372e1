// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-gateway-service/tsup.config`
 * Purpose: Build configuration for the run gateway service.
 * Scope: Defines tsup bundler settings for the deployable service. Does not contain runtime code.
 * Invariants: ESM format only; workspace packages are bundled because they ship TypeScript sources.
 * Side-effects: none
 * Links: src/main.ts
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: [/^@runwire\//],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});
