/**
 * Dev Proxy — Test Suite
 *
 * Drives the proxy through Fastify's inject() with the upstream fetch stubbed.
 * Validates:
 *   - Path, query, method, body and auth reach the orchestrator unchanged
 *   - Upstream status, content type and body come back unchanged
 *   - An unreachable orchestrator yields 502 with an error body
 *   - CORS headers for open and allowlisted origins, and preflight replies
 *   - The health route reports the upstream
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { createLogger } from "@agentflow/sdk";
import { buildProxyApp } from "./app.js";
import type { ProxyConfig } from "./config.js";

const mockFetch = vi.fn<(input: string, init: RequestInit) => Promise<Response>>();

function config(overrides: Partial<ProxyConfig> = {}): ProxyConfig {
  return {
    port: 3000,
    host: "127.0.0.1",
    orchestratorUrl: "http://orchestrator.test",
    corsOrigins: undefined,
    logLevel: "silent",
    ...overrides,
  };
}

let app: FastifyInstance;

async function start(overrides: Partial<ProxyConfig> = {}): Promise<FastifyInstance> {
  app = await buildProxyApp(config(overrides), {
    logger: createLogger("test", { level: "silent" }),
  });
  return app;
}

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await app.close();
});

// ---------------------------------------------------------------------------
// Forwarding
// ---------------------------------------------------------------------------

describe("forwarding", () => {
  it("passes method, path, query, body and auth to the orchestrator", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('{"id":"wf-1"}', {
        status: 201,
        headers: { "content-type": "application/json" },
      })
    );
    await start();

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/workflows?dryRun=true",
      headers: {
        "content-type": "application/json",
        authorization: "Bearer test-secret",
      },
      payload: '{"name":"demo"}',
    });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://orchestrator.test/api/v1/workflows?dryRun=true");
    expect(init.method).toBe("POST");
    expect(init.body).toBe('{"name":"demo"}');
    expect(init.headers).toEqual({
      "content-type": "application/json",
      authorization: "Bearer test-secret",
    });

    expect(response.statusCode).toBe(201);
    expect(response.headers["content-type"]).toMatch(/^application\/json/);
    expect(response.body).toBe('{"id":"wf-1"}');
  });

  it("sends no body for a GET and relays upstream errors as-is", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('{"error":"workflow not found"}', {
        status: 404,
        headers: { "content-type": "application/json" },
      })
    );
    await start();

    const response = await app.inject({ method: "GET", url: "/api/v1/workflows/missing" });

    const [, init] = mockFetch.mock.calls[0];
    expect(init.method).toBe("GET");
    expect(init.body).toBeUndefined();
    expect(init.headers).toEqual({});
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "workflow not found" });
  });

  it("answers 502 when the orchestrator is unreachable", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    await start();

    const response = await app.inject({ method: "DELETE", url: "/api/v1/workflows/wf-1" });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({ error: "Orchestrator unreachable: fetch failed" });
  });

  it("does not forward paths outside /api/", async () => {
    await start();

    const response = await app.inject({ method: "GET", url: "/elsewhere" });

    expect(response.statusCode).toBe(404);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// CORS
// ---------------------------------------------------------------------------

describe("CORS", () => {
  it("reflects any origin when no allowlist is configured", async () => {
    mockFetch.mockResolvedValueOnce(new Response("[]", { status: 200 }));
    await start();

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/workflows",
      headers: { origin: "http://tool.test" },
    });

    expect(response.headers["access-control-allow-origin"]).toBe("http://tool.test");
  });

  it("only allows listed origins", async () => {
    mockFetch.mockImplementation(() => Promise.resolve(new Response("[]", { status: 200 })));
    await start({ corsOrigins: ["http://allowed.test"] });

    const allowed = await app.inject({
      method: "GET",
      url: "/api/v1/workflows",
      headers: { origin: "http://allowed.test" },
    });
    expect(allowed.headers["access-control-allow-origin"]).toBe("http://allowed.test");

    const denied = await app.inject({
      method: "GET",
      url: "/api/v1/workflows",
      headers: { origin: "http://other.test" },
    });
    expect(denied.headers["access-control-allow-origin"]).toBeUndefined();
  });

  it("answers preflight requests without reaching the orchestrator", async () => {
    await start();

    const response = await app.inject({
      method: "OPTIONS",
      url: "/api/v1/workflows",
      headers: {
        origin: "http://tool.test",
        "access-control-request-method": "POST",
      },
    });

    expect(response.statusCode).toBe(204);
    expect(response.headers["access-control-allow-origin"]).toBe("http://tool.test");
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe("method coverage", () => {
  it("allows every forwarded method in preflight replies", async () => {
    await start();

    const response = await app.inject({
      method: "OPTIONS",
      url: "/api/v1/workflows/wf-1",
      headers: {
        origin: "http://tool.test",
        "access-control-request-method": "PATCH",
      },
    });

    expect(response.statusCode).toBe(204);
    const allowed = String(response.headers["access-control-allow-methods"]);
    for (const method of ["GET", "POST", "PUT", "PATCH", "DELETE"]) {
      expect(allowed).toContain(method);
    }
  });

  it("forwards a PATCH", async () => {
    mockFetch.mockResolvedValueOnce(new Response("{}", { status: 200 }));
    await start();

    const response = await app.inject({
      method: "PATCH",
      url: "/api/v1/workflows/wf-1",
      headers: { "content-type": "application/json" },
      payload: '{"labels":{"team":"growth"}}',
    });

    expect(response.statusCode).toBe(200);
    const [, init] = mockFetch.mock.calls[0];
    expect(init.method).toBe("PATCH");
    expect(init.body).toBe('{"labels":{"team":"growth"}}');
  });
});

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("GET /proxy/health", () => {
  it("reports the upstream", async () => {
    await start();

    const response = await app.inject({ method: "GET", url: "/proxy/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok", upstream: "http://orchestrator.test" });
  });
});
