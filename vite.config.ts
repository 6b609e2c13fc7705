/**
 * @file Vite build configuration
 */

import { defineConfig } from "vite";
import dts from "vite-plugin-dts";
import { getViteEntries, getAllExternals } from "./build.entries";
export default defineConfig({
  plugins: [
    dts({
      entryRoot: "src",
      outDir: "dist",
      include: ["src"],
      exclude: ["**/*.spec.*", "spec", "tests", "node_modules", "dist"],
      tsconfigPath: "tsconfig.json",
      // Generate d.ts alongside built entries
      rollupTypes: false,
    }),
  ],
  build: {
    outDir: "dist",
    lib: {
      entry: getViteEntries(),
      formats: ["cjs", "es"],
      fileName: (format, entryName) => `${entryName}.${format === "es" ? "js" : "cjs"}`,
    },
    rollupOptions: {
      external: getAllExternals(),
    },
  },
});
