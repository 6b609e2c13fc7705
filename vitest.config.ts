/**
 * @file Vitest testing framework configuration
 *
 * Globals are enabled so specs can use describe/it/expect without imports,
 * and the Node environment is used because the storage adapters touch the
 * real file system under a temp directory.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts", "tests/**/*.test.ts"],
    setupFiles: [],
  },
});
