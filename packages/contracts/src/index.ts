/**
 * @agentflow/contracts
 *
 * Public API: the shared boundary between the client runtime and the
 * orchestrator's wire format. No I/O lives here.
 */

// Errors
export {
  OrchestratorError,
  NetworkError,
  TransportError,
  NotFoundError,
  DecodeError,
  SchemaError,
  ValidationError,
  CancelledError,
  isOrchestratorError,
  type OrchestratorErrorKind,
  type SchemaIssue,
} from "./errors.js";

// Codecs
export {
  defineCodec,
  parseWire,
  toSchemaIssues,
  deepFreeze,
  type WireCodec,
} from "./codec.js";

// Workflows
export {
  WORKFLOW_PHASES,
  isWorkflowPhase,
  toWorkflowPhase,
  isTerminalPhase,
  WorkflowWireSchema,
  AgentExecutionWireSchema,
  WorkflowStatusWireSchema,
  workflowCodec,
  agentExecutionCodec,
  workflowStatusCodec,
  type WorkflowPhase,
  type WorkflowDefinition,
  type Workflow,
  type WorkflowWire,
  type AgentExecution,
  type AgentExecutionWire,
  type WorkflowStatus,
  type WorkflowStatusWire,
} from "./workflow.js";

// Logs
export {
  LogEntryWireSchema,
  logEntryCodec,
  type LogEntry,
  type LogEntryWire,
} from "./log-entry.js";

// Manifests
export {
  MANIFEST_API_VERSION,
  LLMConfigSchema,
  AgentSpecSchema,
  TriggerSchema,
  WorkflowSettingsSchema,
  WorkflowManifestSchema,
  llmConfigCodec,
  parseManifest,
  type LLMConfig,
  type LLMConfigWire,
  type AgentSpec,
  type TriggerSpec,
  type WorkflowSettings,
  type WorkflowManifest,
} from "./manifest.js";

// Triggers
export {
  TriggerResultWireSchema,
  triggerResultCodec,
  type TriggerResult,
  type TriggerResultWire,
} from "./trigger.js";

// Events
export {
  EVENT_FRAME_TYPES,
  isTerminalEvent,
  decodeEventFrame,
  encodeEventFrame,
  toEventFrame,
  type WorkflowEvent,
  type StatusChangedEvent,
  type LogEmittedEvent,
  type CompletedEvent,
  type FailedEvent,
  type UnknownEvent,
  type EventFrame,
} from "./event.js";

// Logging
export { LOG_LEVELS, type Logger, type LogLevel } from "./logger.js";
