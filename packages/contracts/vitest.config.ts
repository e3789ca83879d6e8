/**
 * Vitest Configuration — @agentflow/contracts
 *
 * Pure TypeScript tests. No DOM, no network.
 * These tests validate wire schemas, codecs and the error taxonomy.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
