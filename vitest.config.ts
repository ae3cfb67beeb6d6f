/**
 * @file Vitest testing framework configuration
 *
 * - Global test utilities (describe/it/expect/vi) without imports
 * - Node.js test environment
 * - Unit specs beside sources, scenarios under spec/, randomized suites under tests/
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
