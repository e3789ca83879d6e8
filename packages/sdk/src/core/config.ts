/**
 * Client Configuration
 *
 * Loads and validates the settings shared by the Transport and the event
 * stream subscriber. All config is validated at construction time and frozen
 * afterwards; a client never changes its base URL or credentials mid-flight.
 *
 * Environment variables (read by `loadConfig`):
 *   AGENTFLOW_URL         Orchestrator base URL (default http://localhost:8080)
 *   AGENTFLOW_API_KEY     Bearer token, omitted from requests when unset
 *   AGENTFLOW_TIMEOUT_MS  Per-request timeout; no timeout when unset
 *   AGENTFLOW_LOG_LEVEL   debug | info | warn | error | silent (default info)
 */

import { z } from "zod";
import {
  LOG_LEVELS,
  ValidationError,
  deepFreeze,
  toSchemaIssues,
} from "@agentflow/contracts";

export const DEFAULT_BASE_URL = "http://localhost:8080";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ReconnectPolicySchema = z.object({
  initialDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(30_000),
  multiplier: z.number().min(1).default(2),
  /** Fraction of each delay randomised in both directions (0.2 = ±20%) */
  jitter: z.number().min(0).max(1).default(0.2),
  /** Consecutive failed connection attempts before giving up; unbounded when absent */
  maxAttempts: z.number().int().positive().optional(),
});

export const ClientConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  reconnect: ReconnectPolicySchema.default({}),
});

export type ReconnectPolicy = Readonly<z.output<typeof ReconnectPolicySchema>>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = Readonly<z.output<typeof ClientConfigSchema>>;

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Validates caller-supplied settings and fills in defaults.
 * Throws ValidationError with one entry per invalid field.
 */
export function resolveConfig(input: ClientConfigInput = {}): ClientConfig {
  return parseConfig(input);
}

/**
 * Builds a config from environment variables. Explicit `overrides` win over
 * the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ClientConfigInput = {}
): ClientConfig {
  const timeout = nonEmpty(env.AGENTFLOW_TIMEOUT_MS);

  return parseConfig({
    ...(nonEmpty(env.AGENTFLOW_URL) !== undefined ? { baseUrl: env.AGENTFLOW_URL } : {}),
    ...(nonEmpty(env.AGENTFLOW_API_KEY) !== undefined ? { apiKey: env.AGENTFLOW_API_KEY } : {}),
    ...(timeout !== undefined ? { timeoutMs: Number(timeout) } : {}),
    ...(nonEmpty(env.AGENTFLOW_LOG_LEVEL) !== undefined
      ? { logLevel: env.AGENTFLOW_LOG_LEVEL }
      : {}),
    ...overrides,
  });
}

function parseConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    const fieldErrors = toSchemaIssues(result.error).map((issue) => ({
      field: issue.path,
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid client configuration: ${fieldErrors
        .map((e) => `${e.field}: ${e.message}`)
        .join("; ")}`,
      fieldErrors
    );
  }
  return deepFreeze(result.data);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}
