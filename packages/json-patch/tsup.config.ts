// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/json-patch/tsup.config`
 * Purpose: Build configuration for json-patch package.
 * Scope: Build tooling only. Does not contain runtime code.
 * Invariants: Output must be ESM.
 * Side-effects: IO
 * Links: src/index.ts
 * @internal
 */

import { defineConfig } from "tsup";

export const tsupConfig = defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "neutral",
  external: ["zod"],
});

export default tsupConfig;
