/**
 * Vitest Configuration — @agentflow/dev-proxy
 *
 * Proxy tests using Fastify's inject() method with the upstream fetch stubbed.
 * Tests the full request/response cycle without a real HTTP server.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
