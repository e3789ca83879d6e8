/**
 * Operation Table
 *
 * Every orchestrator call is described once, as data: the HTTP request, the
 * status it must answer with, which id a 404 refers to, and how to decode
 * the body. Both the awaited client and the session client run these same
 * descriptions through `execute`.
 */

import { z } from "zod";
import {
  CancelledError,
  NotFoundError,
  TransportError,
  ValidationError,
  deepFreeze,
  isOrchestratorError,
  logEntryCodec,
  parseWire,
  triggerResultCodec,
  workflowCodec,
  workflowStatusCodec,
  type LogEntry,
  type Logger,
  type TriggerResult,
  type Workflow,
  type WorkflowDefinition,
  type WorkflowStatus,
} from "@agentflow/contracts";
import { isRecord, requireId } from "./guards.js";
import type { Transport, TransportRequest } from "./transport.js";

export const API_PREFIX = "/api/v1";

export interface Operation<T> {
  /** Short name used in log lines, e.g. "workflow.get" */
  readonly name: string;
  readonly request: TransportRequest;
  /** Exact status required; any other 2xx becomes a TransportError */
  readonly expectStatus?: number;
  /** When set, a 404 becomes NotFoundError for this workflow id */
  readonly notFoundId?: string;
  decode(body: unknown): T;
}

export interface LogQuery {
  /** Only entries written by this agent */
  agent?: string;
}

// ---------------------------------------------------------------------------
// Response envelopes
// ---------------------------------------------------------------------------

const WorkflowListSchema = z
  .object({ workflows: z.array(z.unknown()).nullish() })
  .nullable();

const LogListSchema = z.object({ logs: z.array(z.unknown()).nullish() }).nullable();

function workflowPath(id: string, suffix = ""): string {
  return `${API_PREFIX}/workflows/${encodeURIComponent(id)}${suffix}`;
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export const operations = {
  deploy(definition: WorkflowDefinition): Operation<Workflow> {
    if (!isRecord(definition)) {
      throw new ValidationError("Workflow definition must be an object", [
        { field: "definition", message: "expected an object" },
      ]);
    }
    return {
      name: "workflow.deploy",
      request: { method: "POST", path: `${API_PREFIX}/workflows`, body: definition },
      expectStatus: 201,
      decode: (body) => workflowCodec.fromWire(body),
    };
  },

  get(id: string): Operation<Workflow> {
    requireId(id);
    return {
      name: "workflow.get",
      request: { method: "GET", path: workflowPath(id) },
      notFoundId: id,
      decode: (body) => workflowCodec.fromWire(body),
    };
  },

  getStatus(id: string): Operation<WorkflowStatus> {
    requireId(id);
    return {
      name: "workflow.status",
      request: { method: "GET", path: workflowPath(id, "/status") },
      notFoundId: id,
      decode: (body) => workflowStatusCodec.fromWire(body),
    };
  },

  list(): Operation<readonly Workflow[]> {
    return {
      name: "workflow.list",
      request: { method: "GET", path: `${API_PREFIX}/workflows` },
      decode: (body) => {
        const envelope = parseWire("WorkflowList", WorkflowListSchema, body);
        return deepFreeze((envelope?.workflows ?? []).map((w) => workflowCodec.fromWire(w)));
      },
    };
  },

  delete(id: string): Operation<void> {
    requireId(id);
    return {
      name: "workflow.delete",
      request: { method: "DELETE", path: workflowPath(id) },
      notFoundId: id,
      decode: () => undefined,
    };
  },

  getLogs(id: string, query: LogQuery = {}): Operation<readonly LogEntry[]> {
    requireId(id);
    return {
      name: "workflow.logs",
      request: {
        method: "GET",
        path: workflowPath(id, "/logs"),
        query: { agent: query.agent },
      },
      notFoundId: id,
      decode: (body) => {
        const envelope = parseWire("LogList", LogListSchema, body);
        return deepFreeze((envelope?.logs ?? []).map((l) => logEntryCodec.fromWire(l)));
      },
    };
  },

  trigger(webhookPath: string, payload?: Readonly<Record<string, unknown>>): Operation<TriggerResult> {
    requireId(webhookPath, "webhookPath");
    const segments = webhookPath
      .split("/")
      .filter((segment) => segment !== "")
      .map(encodeURIComponent);
    if (segments.length === 0) {
      throw new ValidationError("webhookPath must name a webhook", [
        { field: "webhookPath", message: "must contain a path segment" },
      ]);
    }
    return {
      name: "workflow.trigger",
      request: {
        method: "POST",
        path: `${API_PREFIX}/trigger/${segments.join("/")}`,
        ...(payload !== undefined ? { body: payload } : {}),
      },
      decode: (body) => triggerResultCodec.fromWire(body),
    };
  },
};

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export interface ExecutionContext {
  readonly transport: Transport;
  readonly logger: Logger;
}

/**
 * Runs one operation: sends the request, checks the status, decodes the
 * body and translates 404s. Logs the outcome with its duration.
 */
export async function execute<T>(
  context: ExecutionContext,
  operation: Operation<T>,
  signal?: AbortSignal
): Promise<T> {
  const { method, path } = operation.request;
  const started = Date.now();

  try {
    if (signal?.aborted) throw new CancelledError();
    const response = await raceAbort(context.transport.request(operation.request, signal), signal);

    if (operation.expectStatus !== undefined && response.status !== operation.expectStatus) {
      throw new TransportError({ status: response.status, rawBody: response.rawBody, method, path });
    }

    const value = operation.decode(response.body);
    context.logger.debug(`${operation.name} succeeded`, {
      method,
      path,
      status: response.status,
      durationMs: Date.now() - started,
    });
    return value;
  } catch (error) {
    const translated = translateError(error, operation);
    const data = {
      method,
      path,
      kind: isOrchestratorError(translated) ? translated.kind : "unexpected",
      error: translated instanceof Error ? translated.message : String(translated),
      durationMs: Date.now() - started,
    };
    if (translated instanceof CancelledError) {
      context.logger.debug(`${operation.name} cancelled`, data);
    } else {
      context.logger.warn(`${operation.name} failed`, data);
    }
    throw translated;
  }
}

function translateError(error: unknown, operation: Operation<unknown>): unknown {
  if (
    error instanceof TransportError &&
    error.status === 404 &&
    operation.notFoundId !== undefined
  ) {
    return new NotFoundError(operation.notFoundId, error.rawBody);
  }
  return error;
}

/**
 * Settles with CancelledError as soon as `signal` aborts, even when the
 * underlying transport ignores the signal.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
