/**
 * Workflow Manifest — Test Suite
 */

import { describe, it, expect } from "vitest";
import { parseManifest, llmConfigCodec, MANIFEST_API_VERSION } from "./manifest.js";
import { SchemaError } from "./errors.js";

function manifest(): Record<string, unknown> {
  return {
    apiVersion: MANIFEST_API_VERSION,
    kind: "Workflow",
    metadata: { name: "research-pipeline", labels: { team: "growth" } },
    spec: {
      agents: [
        {
          name: "researcher",
          llm: { provider: "openai", model: "gpt-4o-mini", temperature: 0.2 },
        },
        {
          name: "writer",
          dependsOn: ["researcher"],
          llm: { provider: "anthropic", model: "claude-3-haiku", maxTokens: 1024 },
          retries: 2,
        },
      ],
      triggers: [{ webhook: "research" }],
    },
  };
}

describe("parseManifest", () => {
  it("returns a typed manifest for a valid document", () => {
    const parsed = parseManifest(manifest());

    expect(parsed.metadata.name).toBe("research-pipeline");
    expect(parsed.spec.agents).toHaveLength(2);
    expect(parsed.spec.agents[1].dependsOn).toEqual(["researcher"]);
    expect(parsed.spec.agents[1].llm.maxTokens).toBe(1024);
    expect(parsed.spec.triggers).toEqual([{ webhook: "research" }]);
  });

  it("rejects a document with no agents", () => {
    const doc = manifest();
    doc.spec = { agents: [] };
    expect(() => parseManifest(doc)).toThrow(SchemaError);
  });

  it("rejects a kind other than Workflow", () => {
    expect(() => parseManifest({ ...manifest(), kind: "Job" })).toThrow(SchemaError);
  });

  it("rejects an out-of-range temperature", () => {
    const doc = manifest();
    doc.spec = {
      agents: [{ name: "a", llm: { provider: "openai", model: "m", temperature: 5 } }],
    };
    expect(() => parseManifest(doc)).toThrow(SchemaError);
  });
});

describe("llmConfigCodec", () => {
  it("round-trips provider settings", () => {
    const json = {
      provider: "ollama",
      model: "llama3",
      temperature: 0,
      config: { host: "http://localhost:11434" },
    };
    const llm = llmConfigCodec.fromWire(json);

    expect(llm.temperature).toBe(0);
    expect(llmConfigCodec.toWire(llm)).toEqual(json);
    expect(Object.isFrozen(llm)).toBe(true);
  });

  it("requires a model", () => {
    expect(() => llmConfigCodec.fromWire({ provider: "openai" })).toThrow(SchemaError);
  });
});
