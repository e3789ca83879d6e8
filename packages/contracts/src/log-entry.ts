/**
 * Log Entry
 *
 * A single line of workflow output as recorded by the orchestrator.
 * Ordering is only meaningful within one agent's entries; entries from
 * different agents may interleave in any order.
 */

import { z } from "zod";
import { defineCodec, type WireCodec } from "./codec.js";

export interface LogEntry {
  readonly timestamp: string;
  /** The agent that produced the line; absent for workflow-level output */
  readonly agentName?: string;
  readonly level: string;
  readonly message: string;
}

export const LogEntryWireSchema = z.object({
  timestamp: z.string(),
  agent_name: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  level: z.string(),
  message: z.string(),
});

export interface LogEntryWire {
  timestamp: string;
  agent_name?: string;
  level: string;
  message: string;
}

export const logEntryCodec: WireCodec<LogEntry, LogEntryWire> = defineCodec({
  entity: "LogEntry",
  schema: LogEntryWireSchema,
  toDomain: (wire): LogEntry => ({
    timestamp: wire.timestamp,
    ...(wire.agent_name !== undefined ? { agentName: wire.agent_name } : {}),
    level: wire.level,
    message: wire.message,
  }),
  toWire: (entry): LogEntryWire => ({
    timestamp: entry.timestamp,
    ...(entry.agentName !== undefined ? { agent_name: entry.agentName } : {}),
    level: entry.level,
    message: entry.message,
  }),
});
