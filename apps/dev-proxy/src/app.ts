/**
 * Dev Proxy App
 *
 * A small Fastify server that sits between a browser-based tool and the
 * orchestrator during local development. The orchestrator sends no CORS
 * headers, so the proxy adds them and forwards everything under /api/
 * unchanged.
 *
 *   GET  /proxy/health   Liveness plus the configured upstream
 *   ANY  /api/*          Forwarded to ORCHESTRATOR_URL with path and query
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import { createLogger, type Logger } from "@agentflow/sdk";
import type { ProxyConfig } from "./config.js";

export interface ProxyAppOptions {
  logger?: Logger;
}

/** Request headers passed through to the orchestrator */
const FORWARDED_HEADERS = ["content-type", "authorization"] as const;

/**
 * Builds the proxy without listening, so tests can drive it with inject().
 */
export async function buildProxyApp(
  config: ProxyConfig,
  options: ProxyAppOptions = {}
): Promise<FastifyInstance> {
  const logger = options.logger ?? createLogger("dev-proxy", { level: config.logLevel });

  const app = Fastify({
    logger: false, // We use our own structured logging
  });

  await app.register(cors, {
    origin: config.corsOrigins ?? true,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  // Bodies are forwarded verbatim, whatever their type.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  app.get("/proxy/health", async () => ({
    status: "ok",
    upstream: config.orchestratorUrl,
  }));

  // OPTIONS stays with @fastify/cors, which answers preflight requests.
  app.route({
    method: ["GET", "POST", "PUT", "DELETE", "PATCH"],
    url: "/api/*",
    handler: (request, reply) => forward(config, logger, request, reply),
  });

  return app;
}

// ---------------------------------------------------------------------------
// Forwarding
// ---------------------------------------------------------------------------

async function forward(
  config: ProxyConfig,
  logger: Logger,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply> {
  const target = `${config.orchestratorUrl}${request.url}`;
  const startedAt = Date.now();

  const headers: Record<string, string> = {};
  for (const name of FORWARDED_HEADERS) {
    const value = request.headers[name];
    if (typeof value === "string") headers[name] = value;
  }
  const body =
    typeof request.body === "string" && request.body !== "" ? request.body : undefined;

  let upstream: Response;
  try {
    upstream = await fetch(target, {
      method: request.method,
      headers,
      ...(body !== undefined ? { body } : {}),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn("Orchestrator unreachable", {
      method: request.method,
      url: request.url,
      error: message,
    });
    return reply.status(502).send({ error: `Orchestrator unreachable: ${message}` });
  }

  const text = await upstream.text();
  logger.debug("Forwarded request", {
    method: request.method,
    url: request.url,
    status: upstream.status,
    durationMs: Date.now() - startedAt,
  });

  const contentType = upstream.headers.get("content-type");
  if (contentType !== null) reply.header("content-type", contentType);
  return reply.status(upstream.status).send(text);
}
