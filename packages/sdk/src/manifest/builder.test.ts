/**
 * Workflow Builder — Test Suite
 *
 * Validates manifest construction and the DAG checks run by build():
 *   - A valid graph produces a frozen manifest
 *   - Missing name, no agents, duplicates, unknown dependencies and cycles
 *     are reported as ValidationError field errors
 *   - Schema violations (e.g. temperature out of range) are reported the same way
 */

import { describe, it, expect } from "vitest";
import { ValidationError, type LLMConfig } from "@agentflow/contracts";
import { WorkflowBuilder, findCycle } from "./builder.js";

const LLM: LLMConfig = { provider: "openai", model: "gpt-4o-mini" };

function buildErrors(builder: WorkflowBuilder): ValidationError {
  try {
    builder.build();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("expected build() to fail");
}

describe("WorkflowBuilder", () => {
  it("builds a manifest for a valid graph", () => {
    const manifest = new WorkflowBuilder("research-pipeline")
      .agent("researcher", { llm: { ...LLM, temperature: 0.2 } })
      .agent("writer", { llm: LLM, retries: 2 })
      .dependsOn("writer", "researcher")
      .trigger({ webhook: "research" })
      .config({ parallelism: 2 })
      .label("team", "growth")
      .build();

    expect(manifest).toEqual({
      apiVersion: "agentflow.dev/v1",
      kind: "Workflow",
      metadata: { name: "research-pipeline", labels: { team: "growth" } },
      spec: {
        agents: [
          { name: "researcher", llm: { provider: "openai", model: "gpt-4o-mini", temperature: 0.2 } },
          {
            name: "writer",
            llm: { provider: "openai", model: "gpt-4o-mini" },
            retries: 2,
            dependsOn: ["researcher"],
          },
        ],
        triggers: [{ webhook: "research" }],
        config: { parallelism: 2 },
      },
    });
    expect(Object.isFrozen(manifest.spec.agents[1])).toBe(true);
  });

  it("sets the namespace when given", () => {
    const manifest = new WorkflowBuilder("nightly")
      .inNamespace("batch")
      .agent("runner", { llm: LLM })
      .build();
    expect(manifest.metadata.namespace).toBe("batch");
  });

  it("requires a name and at least one agent", () => {
    const error = buildErrors(new WorkflowBuilder(" "));
    expect(error.fieldErrors.map((e) => e.field)).toEqual(["metadata.name", "spec.agents"]);
  });

  it("reports duplicate agent names", () => {
    const error = buildErrors(
      new WorkflowBuilder("dup").agent("a", { llm: LLM }).agent("a", { llm: LLM })
    );
    expect(error.fieldErrors).toEqual([
      { field: "spec.agents.1.name", message: 'duplicate agent name "a"' },
    ]);
  });

  it("reports dependencies on unknown agents", () => {
    const error = buildErrors(
      new WorkflowBuilder("orphans").agent("a", { llm: LLM, dependsOn: ["ghost"] })
    );
    expect(error.fieldErrors).toEqual([
      { field: "spec.agents.0.dependsOn", message: 'agent "a" depends on unknown agent "ghost"' },
    ]);
  });

  it("reports dependsOn() calls for undeclared agents", () => {
    const error = buildErrors(
      new WorkflowBuilder("late").agent("a", { llm: LLM }).dependsOn("b", "a")
    );
    expect(error.message).toBe(
      'Invalid workflow "late": dependsOn() names undeclared agent "b"'
    );
  });

  it("reports a dependency cycle with its path", () => {
    const error = buildErrors(
      new WorkflowBuilder("loop")
        .agent("a", { llm: LLM, dependsOn: ["c"] })
        .agent("b", { llm: LLM, dependsOn: ["a"] })
        .agent("c", { llm: LLM, dependsOn: ["b"] })
    );
    expect(error.fieldErrors).toEqual([
      { field: "spec.agents", message: "dependency cycle: a -> c -> b -> a" },
    ]);
  });

  it("turns schema violations into ValidationError", () => {
    const error = buildErrors(
      new WorkflowBuilder("hot").agent("a", { llm: { ...LLM, temperature: 9 } })
    );
    expect(error.fieldErrors.map((e) => e.field)).toEqual(["spec.agents.0.llm.temperature"]);
  });
});

describe("findCycle", () => {
  it("returns null for a DAG", () => {
    expect(
      findCycle([
        { name: "a", llm: LLM },
        { name: "b", llm: LLM, dependsOn: ["a"] },
        { name: "c", llm: LLM, dependsOn: ["a", "b"] },
      ])
    ).toBeNull();
  });

  it("finds a self-dependency", () => {
    expect(findCycle([{ name: "a", llm: LLM, dependsOn: ["a"] }])).toEqual(["a", "a"]);
  });
});
