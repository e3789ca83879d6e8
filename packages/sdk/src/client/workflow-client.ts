/**
 * Workflow Client
 *
 * Typed client for the orchestrator's control-plane API. This is the awaited face.
 * Every method returns a Promise and accepts an optional AbortSignal.
 *
 * The same operations are available without awaiting through `session()`
 * and `withSession()`; both faces run the shared operation table against
 * one Transport, so results and error kinds are identical.
 *
 * Usage:
 *   const client = new WorkflowClient({ baseUrl: "http://localhost:8080", apiKey });
 *   const workflow = await client.deployFile("./workflows/research.yaml");
 *   for await (const event of client.subscribe(workflow.id)) { ... }
 */

import type {
  LogEntry,
  TriggerResult,
  Workflow,
  WorkflowDefinition,
  WorkflowStatus,
} from "@agentflow/contracts";
import { loadConfig, type ClientConfig, type ClientConfigInput } from "../core/config.js";
import { execute, operations, type LogQuery } from "../core/operations.js";
import {
  openSubscription,
  resolveRuntime,
  type ClientRuntime,
  type RuntimeOverrides,
} from "../core/runtime.js";
import { loadWorkflowFile, parseWorkflowYaml } from "../manifest/yaml.js";
import type { EventSubscription, SubscribeOptions } from "../stream/subscription.js";
import { WorkflowSession } from "./session.js";

export type WorkflowClientOptions = ClientConfigInput & RuntimeOverrides;

export interface CallOptions {
  signal?: AbortSignal;
}

export class WorkflowClient {
  private readonly runtime: ClientRuntime;

  constructor(options: WorkflowClientOptions = {}) {
    this.runtime = resolveRuntime(options);
  }

  /**
   * Builds a client from AGENTFLOW_* environment variables.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: RuntimeOverrides = {}
  ): WorkflowClient {
    return new WorkflowClient({ ...loadConfig(env), ...overrides });
  }

  /** Resolved, frozen settings */
  get config(): ClientConfig {
    return this.runtime.config;
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /** Deploys a workflow definition. The orchestrator must answer 201. */
  async deploy(definition: WorkflowDefinition, options: CallOptions = {}): Promise<Workflow> {
    return execute(this.runtime, operations.deploy(definition), options.signal);
  }

  async deployYaml(text: string, options: CallOptions = {}): Promise<Workflow> {
    return this.deploy(parseWorkflowYaml(text), options);
  }

  async deployFile(path: string, options: CallOptions = {}): Promise<Workflow> {
    return this.deploy(await loadWorkflowFile(path), options);
  }

  async get(id: string, options: CallOptions = {}): Promise<Workflow> {
    return execute(this.runtime, operations.get(id), options.signal);
  }

  async getStatus(id: string, options: CallOptions = {}): Promise<WorkflowStatus> {
    return execute(this.runtime, operations.getStatus(id), options.signal);
  }

  async list(options: CallOptions = {}): Promise<readonly Workflow[]> {
    return execute(this.runtime, operations.list(), options.signal);
  }

  async delete(id: string, options: CallOptions = {}): Promise<void> {
    return execute(this.runtime, operations.delete(id), options.signal);
  }

  async getLogs(
    id: string,
    options: LogQuery & CallOptions = {}
  ): Promise<readonly LogEntry[]> {
    const { signal, ...query } = options;
    return execute(this.runtime, operations.getLogs(id, query), signal);
  }

  /** Fires a workflow's webhook trigger. */
  async trigger(
    webhookPath: string,
    payload?: Readonly<Record<string, unknown>>,
    options: CallOptions = {}
  ): Promise<TriggerResult> {
    return execute(this.runtime, operations.trigger(webhookPath, payload), options.signal);
  }

  /** Live events for one workflow. Nothing connects until the first pull. */
  subscribe(id: string, options: SubscribeOptions = {}): EventSubscription {
    return openSubscription(this.runtime, id, options);
  }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  /** A non-blocking session sharing this client's transport. */
  session(): WorkflowSession {
    return new WorkflowSession(this.runtime);
  }

  /**
   * Runs `fn` with a session and closes it afterwards, whether `fn`
   * resolves or throws.
   */
  async withSession<R>(fn: (session: WorkflowSession) => Promise<R> | R): Promise<R> {
    const session = this.session();
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }
}
