/**
 * @file Build entry catalog - Defines all entry points and their target environments
 *
 * This file is the single source of truth for the Vite build configuration
 * (entry points and externals).
 *
 * Target types:
 * - "node": Can only run in Node.js environment
 * - "browser": Can only run in browser environment
 * - "universal": Can run in both environments
 *
 * Adding a new entry:
 * ```typescript
 * "storage/my-backend": {
 *   path: "src/storage/my-backend.ts",
 *   targets: ["node"],
 *   description: "My backend description",
 *   external: ["some-dep"], // optional external dependencies
 * }
 * ```
 */

export type BuildTarget = "node" | "browser" | "universal";

export type EntryConfig = {
  /**
   * Entry file path relative to project root
   */
  path: string;
  /**
   * Target environments where this entry can run
   */
  targets: BuildTarget[];
  /**
   * Optional description of the entry
   */
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

/**
 * Catalog of all build entries with their target environments
 */
export const entries: EntryCatalog = {
  // Main entry; pulls the node FileIO in as the default loader/saver
  index: {
    path: "src/index.ts",
    targets: ["node"],
    description: "Transfer file and storage adapters",
  },

  // Storage implementations
  "storage/node": {
    path: "src/storage/node.ts",
    targets: ["node"],
    description: "Node.js file system FileIO and open handles",
  },

  "storage/memory": {
    path: "src/storage/memory.ts",
    targets: ["universal"],
    description: "In-memory FileIO and handles (works everywhere)",
  },
};

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();

  // Add Node.js built-ins
  externals.add(/node:.+/);

  // Add entry-specific externals
  for (const config of Object.values(entries)) {
    if (config.external) {
      config.external.forEach((ext) => externals.add(ext));
    }
  }

  return Array.from(externals);
}

/**
 * Convert entries to Vite lib entry format
 */
export function getViteEntries(): Record<string, string> {
  const viteEntries: Record<string, string> = {};

  for (const [name, config] of Object.entries(entries)) {
    viteEntries[name] = config.path;
  }

  return viteEntries;
}
