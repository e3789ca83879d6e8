/**
 * Workflow Builder
 *
 * Fluent construction of a WorkflowManifest in code, checked as a DAG
 * before it is handed out.
 *
 * Usage:
 *   const manifest = new WorkflowBuilder("research-pipeline")
 *     .agent("researcher", { llm: { provider: "openai", model: "gpt-4o-mini" } })
 *     .agent("writer", { llm: { provider: "anthropic", model: "claude-3-haiku" } })
 *     .dependsOn("writer", "researcher")
 *     .trigger({ webhook: "research" })
 *     .build();
 *
 *   await client.deploy(manifest);
 */

import {
  MANIFEST_API_VERSION,
  SchemaError,
  ValidationError,
  parseManifest,
  type AgentSpec,
  type LLMConfig,
  type TriggerSpec,
  type WorkflowManifest,
  type WorkflowSettings,
} from "@agentflow/contracts";

export interface AgentOptions {
  llm: LLMConfig;
  image?: string;
  dependsOn?: string[];
  resources?: { memory?: string; cpu?: string };
  env?: Record<string, string>;
  timeout?: string;
  retries?: number;
}

type FieldError = { field: string; message: string };

export class WorkflowBuilder {
  private readonly agents: AgentSpec[] = [];
  private readonly triggers: TriggerSpec[] = [];
  private readonly labels: Record<string, string> = {};
  /** Problems noticed while building, reported together by build() */
  private readonly pendingErrors: FieldError[] = [];
  private settings: WorkflowSettings | undefined;
  private namespace: string | undefined;

  constructor(private readonly name: string) {}

  agent(name: string, options: AgentOptions): this {
    const { llm, dependsOn, ...rest } = options;
    this.agents.push({
      name,
      llm: {
        provider: llm.provider,
        model: llm.model,
        ...(llm.temperature !== undefined ? { temperature: llm.temperature } : {}),
        ...(llm.maxTokens !== undefined ? { maxTokens: llm.maxTokens } : {}),
        ...(llm.config !== undefined ? { config: { ...llm.config } } : {}),
      },
      ...(dependsOn !== undefined ? { dependsOn: [...dependsOn] } : {}),
      ...rest,
    });
    return this;
  }

  /**
   * Adds dependencies to an agent already declared with `agent()`.
   * Unknown agent names are reported by `build()`.
   */
  dependsOn(agentName: string, ...dependencies: string[]): this {
    const agent = this.agents.find((a) => a.name === agentName);
    if (!agent) {
      this.pendingErrors.push({
        field: "spec.agents",
        message: `dependsOn() names undeclared agent "${agentName}"`,
      });
      return this;
    }
    agent.dependsOn = [...(agent.dependsOn ?? []), ...dependencies];
    return this;
  }

  trigger(trigger: TriggerSpec): this {
    this.triggers.push({ ...trigger });
    return this;
  }

  config(settings: WorkflowSettings): this {
    this.settings = { ...settings };
    return this;
  }

  label(key: string, value: string): this {
    this.labels[key] = value;
    return this;
  }

  inNamespace(namespace: string): this {
    this.namespace = namespace;
    return this;
  }

  /**
   * Validates the graph and returns a frozen manifest.
   * Throws ValidationError listing every problem found.
   */
  build(): WorkflowManifest {
    const errors = [...this.pendingErrors, ...this.validate()];
    if (errors.length > 0) {
      throw new ValidationError(
        `Invalid workflow "${this.name}": ${errors.map((e) => e.message).join("; ")}`,
        errors
      );
    }

    const document = {
      apiVersion: MANIFEST_API_VERSION,
      kind: "Workflow",
      metadata: {
        name: this.name,
        ...(this.namespace !== undefined ? { namespace: this.namespace } : {}),
        ...(Object.keys(this.labels).length > 0 ? { labels: { ...this.labels } } : {}),
      },
      spec: {
        agents: this.agents.map((agent) => ({ ...agent })),
        ...(this.triggers.length > 0 ? { triggers: [...this.triggers] } : {}),
        ...(this.settings !== undefined ? { config: { ...this.settings } } : {}),
      },
    };

    try {
      return parseManifest(document);
    } catch (error) {
      if (!(error instanceof SchemaError)) throw error;
      throw new ValidationError(
        `Invalid workflow "${this.name}": ${error.message}`,
        error.issues.map((issue) => ({ field: issue.path, message: issue.message }))
      );
    }
  }

  // -------------------------------------------------------------------------
  // Graph checks
  // -------------------------------------------------------------------------

  private validate(): FieldError[] {
    const errors: FieldError[] = [];

    if (this.name.trim() === "") {
      errors.push({ field: "metadata.name", message: "workflow name is required" });
    }
    if (this.agents.length === 0) {
      errors.push({ field: "spec.agents", message: "at least one agent is required" });
      return errors;
    }

    const seen = new Set<string>();
    this.agents.forEach((agent, index) => {
      if (seen.has(agent.name)) {
        errors.push({
          field: `spec.agents.${index}.name`,
          message: `duplicate agent name "${agent.name}"`,
        });
      }
      seen.add(agent.name);
    });

    this.agents.forEach((agent, index) => {
      for (const dependency of agent.dependsOn ?? []) {
        if (!seen.has(dependency)) {
          errors.push({
            field: `spec.agents.${index}.dependsOn`,
            message: `agent "${agent.name}" depends on unknown agent "${dependency}"`,
          });
        }
      }
    });

    const cycle = findCycle(this.agents);
    if (cycle) {
      errors.push({
        field: "spec.agents",
        message: `dependency cycle: ${cycle.join(" -> ")}`,
      });
    }

    return errors;
  }
}

/**
 * Depth-first search over dependsOn edges. Returns the first cycle found as
 * a closed path (first name repeated at the end), or null.
 */
export function findCycle(agents: readonly AgentSpec[]): string[] | null {
  const edges = new Map<string, readonly string[]>();
  for (const agent of agents) edges.set(agent.name, agent.dependsOn ?? []);

  const visiting = new Set<string>();
  const done = new Set<string>();
  const path: string[] = [];

  function visit(name: string): string[] | null {
    if (done.has(name)) return null;
    if (visiting.has(name)) return [...path.slice(path.indexOf(name)), name];

    visiting.add(name);
    path.push(name);
    for (const next of edges.get(name) ?? []) {
      if (!edges.has(next)) continue;
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    path.pop();
    visiting.delete(name);
    done.add(name);
    return null;
  }

  for (const name of edges.keys()) {
    const cycle = visit(name);
    if (cycle) return cycle;
  }
  return null;
}
