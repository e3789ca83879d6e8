/**
 * Vitest Configuration — @agentflow/sdk
 *
 * Unit tests for the client runtime. fetch is stubbed and the event stream
 * runs against scripted in-process connections; no test opens a socket.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
