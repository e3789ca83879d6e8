/**
 * Workflow Entities
 *
 * Workflow, WorkflowStatus and AgentExecution as the client sees them.
 * All three are server-owned: the client never creates identifiers and
 * never patches a value in place; it re-fetches or re-streams.
 */

import { z } from "zod";
import { defineCodec, type WireCodec } from "./codec.js";

// ---------------------------------------------------------------------------
// Phase
// ---------------------------------------------------------------------------

/**
 * Coarse lifecycle stage, shared by workflows and individual agents.
 */
export const WORKFLOW_PHASES = [
  "pending",
  "running",
  "succeeded",
  "failed",
  "unknown",
] as const;

export type WorkflowPhase = (typeof WORKFLOW_PHASES)[number];

export function isWorkflowPhase(value: string): value is WorkflowPhase {
  const phases: readonly string[] = WORKFLOW_PHASES;
  return phases.includes(value);
}

/** Phases after which nothing more will happen. */
export function isTerminalPhase(phase: WorkflowPhase): boolean {
  return phase === "succeeded" || phase === "failed";
}

/** Other spellings the orchestrator uses for the same stages */
const PHASE_ALIASES: ReadonlyMap<string, WorkflowPhase> = new Map<string, WorkflowPhase>([
  ["completed", "succeeded"],
  ["success", "succeeded"],
  ["queued", "pending"],
  ["cancelled", "failed"],
  ["canceled", "failed"],
]);

/**
 * Maps a phase string from the server onto the known set. Matching is
 * case-insensitive; anything unrecognised becomes "unknown".
 */
export function toWorkflowPhase(value: string): WorkflowPhase {
  const normalized = value.toLowerCase();
  if (isWorkflowPhase(normalized)) return normalized;
  return PHASE_ALIASES.get(normalized) ?? "unknown";
}

/** Optional timestamp; the server sometimes sends null for "not yet". */
const OptionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

// ---------------------------------------------------------------------------
// Workflow
// ---------------------------------------------------------------------------

/** An opaque workflow definition document (the parsed YAML/JSON manifest). */
export type WorkflowDefinition = Readonly<Record<string, unknown>>;

export interface Workflow {
  readonly id: string;
  readonly name: string;
  /** The definition the workflow was deployed from, when the server returns it */
  readonly spec?: WorkflowDefinition;
  readonly createdAt: string;
}

export const WorkflowWireSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  spec: z.record(z.unknown()).nullish(),
  created_at: z.string(),
});

export interface WorkflowWire {
  id: string;
  name: string;
  spec?: Record<string, unknown>;
  created_at: string;
}

export const workflowCodec: WireCodec<Workflow, WorkflowWire> = defineCodec({
  entity: "Workflow",
  schema: WorkflowWireSchema,
  toDomain: (wire): Workflow => ({
    id: wire.id,
    name: wire.name,
    ...(wire.spec ? { spec: wire.spec } : {}),
    createdAt: wire.created_at,
  }),
  toWire: (workflow): WorkflowWire => ({
    id: workflow.id,
    name: workflow.name,
    ...(workflow.spec ? { spec: { ...workflow.spec } } : {}),
    created_at: workflow.createdAt,
  }),
});

// ---------------------------------------------------------------------------
// Agent execution
// ---------------------------------------------------------------------------

export interface AgentExecution {
  readonly agentName: string;
  readonly state: WorkflowPhase;
  /** The server's own spelling of `state`, kept when it differs */
  readonly wireState?: string;
  readonly startedAt: string;
  readonly finishedAt?: string;
  readonly error?: string;
}

export const AgentExecutionWireSchema = z.object({
  agent_name: z.string().min(1),
  state: z.string(),
  started_at: z.string(),
  finished_at: OptionalString,
  error: OptionalString,
});

export interface AgentExecutionWire {
  agent_name: string;
  state: string;
  started_at: string;
  finished_at?: string;
  error?: string;
}

function agentExecutionToDomain(
  wire: z.output<typeof AgentExecutionWireSchema>
): AgentExecution {
  const state = toWorkflowPhase(wire.state);
  return {
    agentName: wire.agent_name,
    state,
    ...(state !== wire.state ? { wireState: wire.state } : {}),
    startedAt: wire.started_at,
    ...(wire.finished_at !== undefined ? { finishedAt: wire.finished_at } : {}),
    ...(wire.error !== undefined ? { error: wire.error } : {}),
  };
}

function agentExecutionToWire(execution: AgentExecution): AgentExecutionWire {
  return {
    agent_name: execution.agentName,
    state: execution.wireState ?? execution.state,
    started_at: execution.startedAt,
    ...(execution.finishedAt !== undefined ? { finished_at: execution.finishedAt } : {}),
    ...(execution.error !== undefined ? { error: execution.error } : {}),
  };
}

export const agentExecutionCodec: WireCodec<AgentExecution, AgentExecutionWire> =
  defineCodec({
    entity: "AgentExecution",
    schema: AgentExecutionWireSchema,
    toDomain: agentExecutionToDomain,
    toWire: agentExecutionToWire,
  });

// ---------------------------------------------------------------------------
// Workflow status
// ---------------------------------------------------------------------------

export interface WorkflowStatus {
  readonly workflowId: string;
  readonly phase: WorkflowPhase;
  /** The server's own spelling of `phase`, kept when it differs */
  readonly wirePhase?: string;
  /** In execution order, as reported by the server */
  readonly agentExecutions: readonly AgentExecution[];
  readonly updatedAt: string;
}

export const WorkflowStatusWireSchema = z.object({
  workflow_id: z.string().min(1),
  phase: z.string(),
  agent_executions: z.array(AgentExecutionWireSchema),
  updated_at: z.string(),
});

export interface WorkflowStatusWire {
  workflow_id: string;
  phase: string;
  agent_executions: AgentExecutionWire[];
  updated_at: string;
}

export const workflowStatusCodec: WireCodec<WorkflowStatus, WorkflowStatusWire> =
  defineCodec({
    entity: "WorkflowStatus",
    schema: WorkflowStatusWireSchema,
    toDomain: (wire): WorkflowStatus => {
      const phase = toWorkflowPhase(wire.phase);
      return {
        workflowId: wire.workflow_id,
        phase,
        ...(phase !== wire.phase ? { wirePhase: wire.phase } : {}),
        agentExecutions: wire.agent_executions.map(agentExecutionToDomain),
        updatedAt: wire.updated_at,
      };
    },
    toWire: (status): WorkflowStatusWire => ({
      workflow_id: status.workflowId,
      phase: status.wirePhase ?? status.phase,
      agent_executions: status.agentExecutions.map(agentExecutionToWire),
      updated_at: status.updatedAt,
    }),
  });
