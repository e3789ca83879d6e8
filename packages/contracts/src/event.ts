/**
 * Workflow Events
 *
 * Frames pushed by the orchestrator on `GET /api/v1/workflows/{id}/live`.
 * One JSON document per message:
 *
 *   { "type": "workflow.status", "workflow_id": "wf-1", "timestamp": "...", "data": {...} }
 *
 * Known frame types:
 *   workflow.status    → status_changed   (data = WorkflowStatus)
 *   workflow.log       → log_emitted      (data = LogEntry)
 *   workflow.completed → completed        (data = { outputs? })
 *   workflow.failed    → failed           (data = { error })
 *
 * Any other type (agent.started, agent.llm_call, ...) decodes to `unknown`
 * with its payload untouched, so new server events never break the stream.
 */

import { z } from "zod";
import { parseWire, deepFreeze } from "./codec.js";
import { SchemaError } from "./errors.js";
import { logEntryCodec, type LogEntry, type LogEntryWire } from "./log-entry.js";
import {
  workflowStatusCodec,
  type WorkflowStatus,
  type WorkflowStatusWire,
} from "./workflow.js";

export const EVENT_FRAME_TYPES = {
  status: "workflow.status",
  log: "workflow.log",
  completed: "workflow.completed",
  failed: "workflow.failed",
} as const;

// ---------------------------------------------------------------------------
// Domain events
// ---------------------------------------------------------------------------

export interface StatusChangedEvent {
  readonly type: "status_changed";
  readonly status: WorkflowStatus;
  readonly timestamp?: string;
}

export interface LogEmittedEvent {
  readonly type: "log_emitted";
  readonly workflowId: string;
  readonly entry: LogEntry;
  readonly timestamp?: string;
}

export interface CompletedEvent {
  readonly type: "completed";
  readonly workflowId: string;
  readonly outputs?: Readonly<Record<string, unknown>>;
  readonly timestamp?: string;
}

export interface FailedEvent {
  readonly type: "failed";
  readonly workflowId: string;
  readonly error: string;
  readonly timestamp?: string;
}

export interface UnknownEvent {
  readonly type: "unknown";
  /** The frame type as sent by the server */
  readonly eventType: string;
  readonly workflowId?: string;
  readonly data?: unknown;
  readonly timestamp?: string;
}

export type WorkflowEvent =
  | StatusChangedEvent
  | LogEmittedEvent
  | CompletedEvent
  | FailedEvent
  | UnknownEvent;

/** Events after which the orchestrator has nothing more to say about the workflow. */
export function isTerminalEvent(
  event: WorkflowEvent
): event is CompletedEvent | FailedEvent {
  return event.type === "completed" || event.type === "failed";
}

// ---------------------------------------------------------------------------
// Frame schemas
// ---------------------------------------------------------------------------

const OptionalTimestamp = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const EnvelopeSchema = z.object({
  type: z.string().min(1),
  workflow_id: z.string().min(1).optional(),
  timestamp: OptionalTimestamp,
  data: z.unknown(),
});

const CompletedFrameSchema = EnvelopeSchema.extend({
  workflow_id: z.string().min(1),
  data: z
    .object({ outputs: z.record(z.unknown()).optional() })
    .nullish(),
});

const FailedFrameSchema = EnvelopeSchema.extend({
  workflow_id: z.string().min(1),
  data: z.object({ error: z.string() }),
});

const LogFrameSchema = EnvelopeSchema.extend({
  workflow_id: z.string().min(1),
});

export interface EventFrame {
  type: string;
  workflow_id?: string;
  timestamp?: string;
  data?: unknown;
}

const ENTITY = "WorkflowEvent";

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decodes one text frame into a WorkflowEvent.
 * Throws SchemaError when the frame is not JSON or a known frame type
 * carries a malformed payload.
 */
export function decodeEventFrame(text: string): WorkflowEvent {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SchemaError(ENTITY, [
      {
        path: "",
        message: `frame is not JSON (${error instanceof Error ? error.message : String(error)})`,
      },
    ]);
  }

  const envelope = parseWire(ENTITY, EnvelopeSchema, json);
  const timestamp = envelope.timestamp;
  const stamped = timestamp !== undefined ? { timestamp } : {};

  switch (envelope.type) {
    case EVENT_FRAME_TYPES.status:
      return deepFreeze<StatusChangedEvent>({
        type: "status_changed",
        status: workflowStatusCodec.fromWire(envelope.data),
        ...stamped,
      });

    case EVENT_FRAME_TYPES.log: {
      const frame = parseWire(ENTITY, LogFrameSchema, json);
      return deepFreeze<LogEmittedEvent>({
        type: "log_emitted",
        workflowId: frame.workflow_id,
        entry: logEntryCodec.fromWire(frame.data),
        ...stamped,
      });
    }

    case EVENT_FRAME_TYPES.completed: {
      const frame = parseWire(ENTITY, CompletedFrameSchema, json);
      const outputs = frame.data?.outputs;
      return deepFreeze<CompletedEvent>({
        type: "completed",
        workflowId: frame.workflow_id,
        ...(outputs !== undefined ? { outputs } : {}),
        ...stamped,
      });
    }

    case EVENT_FRAME_TYPES.failed: {
      const frame = parseWire(ENTITY, FailedFrameSchema, json);
      return deepFreeze<FailedEvent>({
        type: "failed",
        workflowId: frame.workflow_id,
        error: frame.data.error,
        ...stamped,
      });
    }

    default:
      return deepFreeze<UnknownEvent>({
        type: "unknown",
        eventType: envelope.type,
        ...(envelope.workflow_id !== undefined ? { workflowId: envelope.workflow_id } : {}),
        ...(envelope.data !== undefined ? { data: envelope.data } : {}),
        ...stamped,
      });
  }
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/**
 * Converts an event back to its frame document. The inverse of
 * decodeEventFrame for every event it produces.
 */
export function toEventFrame(event: WorkflowEvent): EventFrame {
  const stamped = event.timestamp !== undefined ? { timestamp: event.timestamp } : {};

  switch (event.type) {
    case "status_changed": {
      const data: WorkflowStatusWire = workflowStatusCodec.toWire(event.status);
      return {
        type: EVENT_FRAME_TYPES.status,
        workflow_id: event.status.workflowId,
        ...stamped,
        data,
      };
    }
    case "log_emitted": {
      const data: LogEntryWire = logEntryCodec.toWire(event.entry);
      return { type: EVENT_FRAME_TYPES.log, workflow_id: event.workflowId, ...stamped, data };
    }
    case "completed":
      return {
        type: EVENT_FRAME_TYPES.completed,
        workflow_id: event.workflowId,
        ...stamped,
        data: event.outputs !== undefined ? { outputs: { ...event.outputs } } : {},
      };
    case "failed":
      return {
        type: EVENT_FRAME_TYPES.failed,
        workflow_id: event.workflowId,
        ...stamped,
        data: { error: event.error },
      };
    case "unknown":
      return {
        type: event.eventType,
        ...(event.workflowId !== undefined ? { workflow_id: event.workflowId } : {}),
        ...stamped,
        ...(event.data !== undefined ? { data: event.data } : {}),
      };
  }
}

/** Serializes an event as the text of one frame. */
export function encodeEventFrame(event: WorkflowEvent): string {
  return JSON.stringify(toEventFrame(event));
}
