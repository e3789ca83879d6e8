/**
 * Workflow Manifest
 *
 * The typed form of a workflow definition document, i.e. what gets authored in
 * YAML and sent to `POST /api/v1/workflows`. The orchestrator stores it
 * verbatim and returns it as `Workflow.spec`.
 *
 * Keys keep the authoring format (camelCase) on both sides.
 *
 * @example
 * apiVersion: agentflow.dev/v1
 * kind: Workflow
 * metadata:
 *   name: research-pipeline
 * spec:
 *   agents:
 *     - name: researcher
 *       llm: { provider: openai, model: gpt-4o-mini, temperature: 0.2 }
 *     - name: writer
 *       dependsOn: [researcher]
 *       llm: { provider: anthropic, model: claude-3-haiku }
 */

import { z } from "zod";
import { defineCodec, parseWire, deepFreeze, type WireCodec } from "./codec.js";

export const MANIFEST_API_VERSION = "agentflow.dev/v1";

// ---------------------------------------------------------------------------
// LLM configuration
// ---------------------------------------------------------------------------

export interface LLMConfig {
  /** Model vendor (e.g., "openai", "anthropic", "ollama") */
  readonly provider: string;
  readonly model: string;
  /** Sampling temperature, 0 = deterministic */
  readonly temperature?: number;
  readonly maxTokens?: number;
  /** Provider-specific settings passed through untouched */
  readonly config?: Readonly<Record<string, string>>;
}

export const LLMConfigSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  config: z.record(z.string()).optional(),
});

export type LLMConfigWire = z.output<typeof LLMConfigSchema>;

export const llmConfigCodec: WireCodec<LLMConfig, LLMConfigWire> = defineCodec({
  entity: "LLMConfig",
  schema: LLMConfigSchema,
  toDomain: (wire): LLMConfig => ({ ...wire }),
  toWire: (llm): LLMConfigWire => ({
    provider: llm.provider,
    model: llm.model,
    ...(llm.temperature !== undefined ? { temperature: llm.temperature } : {}),
    ...(llm.maxTokens !== undefined ? { maxTokens: llm.maxTokens } : {}),
    ...(llm.config !== undefined ? { config: { ...llm.config } } : {}),
  }),
});

// ---------------------------------------------------------------------------
// Agents, triggers, settings
// ---------------------------------------------------------------------------

export const AgentSpecSchema = z.object({
  name: z.string().min(1),
  image: z.string().optional(),
  llm: LLMConfigSchema,
  dependsOn: z.array(z.string()).optional(),
  resources: z
    .object({
      memory: z.string().optional(),
      cpu: z.string().optional(),
    })
    .optional(),
  env: z.record(z.string()).optional(),
  /** Duration string, e.g. "5m" */
  timeout: z.string().optional(),
  retries: z.number().int().min(0).optional(),
});

export type AgentSpec = z.output<typeof AgentSpecSchema>;

/** Exactly one of schedule / webhook / event is expected per trigger. */
export const TriggerSchema = z.object({
  schedule: z.string().optional(),
  webhook: z.string().optional(),
  event: z.string().optional(),
});

export type TriggerSpec = z.output<typeof TriggerSchema>;

export const WorkflowSettingsSchema = z.object({
  parallelism: z.number().int().positive().optional(),
  timeout: z.string().optional(),
  retryPolicy: z.string().optional(),
});

export type WorkflowSettings = z.output<typeof WorkflowSettingsSchema>;

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

export const WorkflowManifestSchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.literal("Workflow"),
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
  }),
  spec: z.object({
    agents: z.array(AgentSpecSchema).min(1),
    triggers: z.array(TriggerSchema).optional(),
    config: WorkflowSettingsSchema.optional(),
  }),
});

export type WorkflowManifest = z.output<typeof WorkflowManifestSchema>;

/**
 * Reads a definition document (e.g. `Workflow.spec`) as a typed manifest.
 * Throws SchemaError when the document is not a manifest.
 */
export function parseManifest(document: unknown): WorkflowManifest {
  return deepFreeze(parseWire("WorkflowManifest", WorkflowManifestSchema, document));
}
