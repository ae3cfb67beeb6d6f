/**
 * @file Build entry catalog - Defines all entry points and their target environments
 *
 * This file is the single source of truth for the Vite library build
 * (entry points and externals). Every entry runs in both Node.js and
 * browsers; the package has no runtime dependencies.
 *
 * Adding a new entry:
 * ```typescript
 * "my-module/index": {
 *   path: "src/my-module/index.ts",
 *   targets: ["universal"],
 *   description: "My module description",
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
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

export const entries: EntryCatalog = {
  index: {
    path: "src/index.ts",
    targets: ["universal"],
    description: "Main library entry point",
  },
  "heap/untyped": {
    path: "src/heap/untyped.ts",
    targets: ["universal"],
    description: "Untyped indexed heap core",
  },
  "arena/allocator": {
    path: "src/arena/allocator.ts",
    targets: ["universal"],
    description: "Generational id arena",
  },
};

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();
  externals.add(/node:.+/);
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
