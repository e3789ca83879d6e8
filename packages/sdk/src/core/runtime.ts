/**
 * Client Runtime
 *
 * The resolved settings and collaborators one client shares between its
 * awaited calls, its sessions and its event subscriptions.
 */

import type { Logger } from "@agentflow/contracts";
import { resolveConfig, type ClientConfig, type ClientConfigInput } from "./config.js";
import { createLogger } from "./logging.js";
import { FetchTransport, type Transport } from "./transport.js";
import { requireId } from "./guards.js";
import { buildStreamUrl, type StreamConnector } from "../stream/connection.js";
import { WebSocketConnector } from "../stream/websocket-connector.js";
import { EventSubscription, type SubscribeOptions } from "../stream/subscription.js";

export interface ClientRuntime {
  readonly config: ClientConfig;
  readonly transport: Transport;
  readonly connector: StreamConnector;
  readonly logger: Logger;
}

export interface RuntimeOverrides {
  /** Replaces the fetch-based transport */
  transport?: Transport;
  /** Replaces the WebSocket connector used by subscriptions */
  connector?: StreamConnector;
  logger?: Logger;
}

export function createRuntime(config: ClientConfig, overrides: RuntimeOverrides = {}): ClientRuntime {
  return {
    config,
    transport:
      overrides.transport ??
      new FetchTransport({
        baseUrl: config.baseUrl,
        ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      }),
    connector: overrides.connector ?? new WebSocketConnector(),
    logger: overrides.logger ?? createLogger("agentflow", { level: config.logLevel }),
  };
}

/** Splits client options into config input and collaborator overrides. */
export function resolveRuntime(
  options: ClientConfigInput & RuntimeOverrides
): ClientRuntime {
  const { transport, connector, logger, ...input } = options;
  return createRuntime(resolveConfig(input), {
    ...(transport !== undefined ? { transport } : {}),
    ...(connector !== undefined ? { connector } : {}),
    ...(logger !== undefined ? { logger } : {}),
  });
}

/**
 * Creates a subscription that shares the client's base URL and credentials.
 * `signal` cancels it in addition to any signal in `options`.
 */
export function openSubscription(
  runtime: ClientRuntime,
  workflowId: string,
  options: SubscribeOptions = {},
  signal?: AbortSignal
): EventSubscription {
  requireId(workflowId);
  const headers: Record<string, string> = {};
  if (runtime.config.apiKey) {
    headers["Authorization"] = `Bearer ${runtime.config.apiKey}`;
  }

  const subscription = new EventSubscription({
    workflowId,
    url: buildStreamUrl(runtime.config.baseUrl, workflowId),
    headers,
    connector: runtime.connector,
    logger: runtime.logger,
    policy: { ...runtime.config.reconnect, ...options.reconnect },
    ...(options.onStateChange !== undefined ? { onStateChange: options.onStateChange } : {}),
    ...(options.signal !== undefined ? { signal: options.signal } : {}),
  });

  if (signal) {
    if (signal.aborted) subscription.cancel();
    else signal.addEventListener("abort", () => subscription.cancel(), { once: true });
  }
  return subscription;
}
