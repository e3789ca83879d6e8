/**
 * Dev Proxy Configuration — Test Suite
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@agentflow/sdk";
import { loadProxyConfig } from "./config.js";

describe("loadProxyConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadProxyConfig({})).toEqual({
      port: 3000,
      host: "127.0.0.1",
      orchestratorUrl: "http://localhost:8080",
      corsOrigins: undefined,
      logLevel: "info",
    });
  });

  it("reads every variable", () => {
    const config = loadProxyConfig({
      PROXY_PORT: "4100",
      PROXY_HOST: "0.0.0.0",
      ORCHESTRATOR_URL: "http://orchestrator.test:8080/",
      CORS_ORIGIN: "http://a.test, http://b.test",
      LOG_LEVEL: "debug",
    });

    expect(config.port).toBe(4100);
    expect(config.host).toBe("0.0.0.0");
    expect(config.orchestratorUrl).toBe("http://orchestrator.test:8080");
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.logLevel).toBe("debug");
  });

  it("treats blank variables as unset", () => {
    const config = loadProxyConfig({ PROXY_PORT: "  ", CORS_ORIGIN: "" });
    expect(config.port).toBe(3000);
    expect(config.corsOrigins).toBeUndefined();
  });

  it("rejects an invalid port with the variable name", () => {
    try {
      loadProxyConfig({ PROXY_PORT: "not-a-port" });
      expect.unreachable("loadProxyConfig should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fieldErrors.map((e) => e.field)).toEqual(["PROXY_PORT"]);
      }
    }
  });

  it("rejects a malformed orchestrator URL", () => {
    expect(() => loadProxyConfig({ ORCHESTRATOR_URL: "not a url" })).toThrow(ValidationError);
  });
});
