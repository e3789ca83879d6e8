/**
 * Workflow Events — Test Suite
 *
 * Validates frame decoding for every known frame type, the fallback to
 * "unknown" for types the client does not model, and SchemaError for
 * frames that cannot be decoded.
 */

import { describe, it, expect } from "vitest";
import {
  decodeEventFrame,
  encodeEventFrame,
  isTerminalEvent,
  type WorkflowEvent,
} from "./event.js";
import { SchemaError } from "./errors.js";

const STATUS_DATA = {
  workflow_id: "wf-1",
  phase: "running",
  agent_executions: [
    { agent_name: "researcher", state: "running", started_at: "2026-03-01T10:00:01Z" },
  ],
  updated_at: "2026-03-01T10:00:02Z",
};

describe("decodeEventFrame", () => {
  it("decodes workflow.status into status_changed", () => {
    const event = decodeEventFrame(
      JSON.stringify({
        type: "workflow.status",
        workflow_id: "wf-1",
        timestamp: "2026-03-01T10:00:02Z",
        data: STATUS_DATA,
      })
    );

    expect(event.type).toBe("status_changed");
    if (event.type !== "status_changed") return;
    expect(event.status.phase).toBe("running");
    expect(event.status.agentExecutions[0].agentName).toBe("researcher");
    expect(event.timestamp).toBe("2026-03-01T10:00:02Z");
  });

  it("decodes workflow.log into log_emitted", () => {
    const event = decodeEventFrame(
      JSON.stringify({
        type: "workflow.log",
        workflow_id: "wf-1",
        data: {
          timestamp: "2026-03-01T10:00:03Z",
          agent_name: "researcher",
          level: "info",
          message: "searching",
        },
      })
    );

    expect(event).toEqual({
      type: "log_emitted",
      workflowId: "wf-1",
      entry: {
        timestamp: "2026-03-01T10:00:03Z",
        agentName: "researcher",
        level: "info",
        message: "searching",
      },
    });
  });

  it("decodes workflow.completed with outputs", () => {
    const event = decodeEventFrame(
      JSON.stringify({
        type: "workflow.completed",
        workflow_id: "wf-1",
        data: { outputs: { summary: "done" } },
      })
    );

    expect(event).toEqual({
      type: "completed",
      workflowId: "wf-1",
      outputs: { summary: "done" },
    });
    expect(isTerminalEvent(event)).toBe(true);
  });

  it("decodes workflow.completed without data", () => {
    const event = decodeEventFrame(
      JSON.stringify({ type: "workflow.completed", workflow_id: "wf-1" })
    );
    expect(event).toEqual({ type: "completed", workflowId: "wf-1" });
  });

  it("decodes workflow.failed", () => {
    const event = decodeEventFrame(
      JSON.stringify({
        type: "workflow.failed",
        workflow_id: "wf-1",
        data: { error: "agent writer exhausted retries" },
      })
    );

    expect(event).toEqual({
      type: "failed",
      workflowId: "wf-1",
      error: "agent writer exhausted retries",
    });
    expect(isTerminalEvent(event)).toBe(true);
  });

  it("keeps unmodelled frame types as unknown", () => {
    const event = decodeEventFrame(
      JSON.stringify({
        type: "agent.llm_call",
        workflow_id: "wf-1",
        data: { model: "gpt-4o-mini", tokens: 512 },
      })
    );

    expect(event).toEqual({
      type: "unknown",
      eventType: "agent.llm_call",
      workflowId: "wf-1",
      data: { model: "gpt-4o-mini", tokens: 512 },
    });
    expect(isTerminalEvent(event)).toBe(false);
  });

  it("raises SchemaError for text that is not JSON", () => {
    expect(() => decodeEventFrame("not json")).toThrow(SchemaError);
  });

  it("raises SchemaError when type is missing", () => {
    expect(() => decodeEventFrame(JSON.stringify({ data: {} }))).toThrow(SchemaError);
  });

  it("raises SchemaError when a status frame carries a malformed status", () => {
    const frame = JSON.stringify({
      type: "workflow.status",
      workflow_id: "wf-1",
      data: { phase: "running" },
    });
    expect(() => decodeEventFrame(frame)).toThrow(SchemaError);
  });

  it("raises SchemaError when a failed frame has no error message", () => {
    const frame = JSON.stringify({
      type: "workflow.failed",
      workflow_id: "wf-1",
      data: {},
    });
    expect(() => decodeEventFrame(frame)).toThrow(SchemaError);
  });
});

describe("encodeEventFrame", () => {
  it("is the inverse of decodeEventFrame", () => {
    const events: WorkflowEvent[] = [
      {
        type: "status_changed",
        status: {
          workflowId: "wf-1",
          phase: "succeeded",
          agentExecutions: [],
          updatedAt: "2026-03-01T10:05:00Z",
        },
        timestamp: "2026-03-01T10:05:00Z",
      },
      {
        type: "log_emitted",
        workflowId: "wf-1",
        entry: { timestamp: "2026-03-01T10:00:03Z", level: "debug", message: "tick" },
      },
      { type: "completed", workflowId: "wf-1" },
      { type: "failed", workflowId: "wf-1", error: "boom" },
      { type: "unknown", eventType: "agent.retry", data: { attempt: 2 } },
    ];

    for (const event of events) {
      expect(decodeEventFrame(encodeEventFrame(event))).toEqual(event);
    }
  });
});
