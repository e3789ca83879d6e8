/**
 * @agentflow/sdk
 *
 * Public API for the orchestrator client runtime.
 */

// Clients
export { WorkflowClient, type WorkflowClientOptions, type CallOptions } from "./client/workflow-client.js";
export { WorkflowSession } from "./client/session.js";
export { PendingCall, type CallStatus } from "./client/pending-call.js";

// Configuration & logging
export {
  DEFAULT_BASE_URL,
  ClientConfigSchema,
  ReconnectPolicySchema,
  resolveConfig,
  loadConfig,
  type ClientConfig,
  type ClientConfigInput,
  type ReconnectPolicy,
} from "./core/config.js";
export { createLogger, type LoggerOptions } from "./core/logging.js";

// Transport & operations
export {
  FetchTransport,
  type Transport,
  type TransportRequest,
  type TransportResponse,
  type FetchTransportOptions,
  type HttpMethod,
} from "./core/transport.js";
export { operations, execute, API_PREFIX, type Operation, type LogQuery } from "./core/operations.js";
export type { ClientRuntime, RuntimeOverrides } from "./core/runtime.js";

// Event stream
export {
  EventSubscription,
  type SubscriptionState,
  type StreamItem,
  type DecodeFailure,
  type SubscribeOptions,
  type StateChangeListener,
} from "./stream/subscription.js";
export {
  CLOSE_CODES,
  buildStreamUrl,
  type StreamConnector,
  type StreamConnection,
  type StreamConnectRequest,
  type StreamMessage,
} from "./stream/connection.js";
export { WebSocketConnector } from "./stream/websocket-connector.js";
export { ExponentialBackoff } from "./stream/backoff.js";

// Manifests
export { WorkflowBuilder, findCycle, type AgentOptions } from "./manifest/builder.js";
export { parseWorkflowYaml, loadWorkflowFile, toWorkflowYaml } from "./manifest/yaml.js";

// Re-exported contracts
export * from "@agentflow/contracts";
