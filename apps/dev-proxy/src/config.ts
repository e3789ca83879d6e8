/**
 * Dev Proxy Configuration
 *
 * Environment variables:
 *   PROXY_PORT        Port to listen on (default 3000)
 *   PROXY_HOST        Interface to bind (default 127.0.0.1)
 *   ORCHESTRATOR_URL  Upstream orchestrator (default http://localhost:8080)
 *   CORS_ORIGIN       Comma-separated allowed origins; any origin when unset
 *   LOG_LEVEL         debug | info | warn | error | silent (default info)
 */

import { z } from "zod";
import {
  LOG_LEVELS,
  ValidationError,
  deepFreeze,
  toSchemaIssues,
  type LogLevel,
} from "@agentflow/sdk";

const ProxyEnvSchema = z.object({
  PROXY_PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  PROXY_HOST: z.string().min(1).default("127.0.0.1"),
  ORCHESTRATOR_URL: z
    .string()
    .url()
    .default("http://localhost:8080")
    .transform((url) => url.replace(/\/+$/, "")),
  CORS_ORIGIN: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface ProxyConfig {
  port: number;
  host: string;
  orchestratorUrl: string;
  /** Allowed origins; undefined reflects whatever origin asks */
  corsOrigins: string[] | undefined;
  logLevel: LogLevel;
}

/**
 * Reads the proxy settings from the environment. Blank variables count as
 * unset. Throws ValidationError naming each bad variable.
 */
export function loadProxyConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ProxyConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ""
    )
  );

  const result = ProxyEnvSchema.safeParse(present);
  if (!result.success) {
    const fieldErrors = toSchemaIssues(result.error).map((issue) => ({
      field: issue.path,
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid proxy configuration: ${fieldErrors
        .map((e) => `${e.field}: ${e.message}`)
        .join("; ")}`,
      fieldErrors
    );
  }

  const origins = result.data.CORS_ORIGIN?.split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin !== "");

  return deepFreeze({
    port: result.data.PROXY_PORT,
    host: result.data.PROXY_HOST,
    orchestratorUrl: result.data.ORCHESTRATOR_URL,
    corsOrigins: origins !== undefined && origins.length > 0 ? origins : undefined,
    logLevel: result.data.LOG_LEVEL,
  });
}
