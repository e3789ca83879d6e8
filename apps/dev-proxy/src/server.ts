/**
 * Dev Proxy Server
 *
 * Binds the proxy to its port. A port already taken is reported as
 * PortInUseError; the proxy never stops whatever holds it.
 */

import type { FastifyInstance } from "fastify";
import { buildProxyApp, type ProxyAppOptions } from "./app.js";
import type { ProxyConfig } from "./config.js";

export class PortInUseError extends Error {
  constructor(
    public readonly port: number,
    public readonly host: string
  ) {
    super(
      `Port ${port} on ${host} is already in use. Stop the process holding it or set PROXY_PORT.`
    );
    this.name = "PortInUseError";
  }
}

/**
 * Maps a listen() failure to the error reported to the user. Anything other
 * than an address-in-use failure is returned unchanged.
 */
export function toStartupError(error: unknown, config: Pick<ProxyConfig, "port" | "host">): unknown {
  if (error instanceof Error && "code" in error && error.code === "EADDRINUSE") {
    return new PortInUseError(config.port, config.host);
  }
  return error;
}

export async function startProxy(
  config: ProxyConfig,
  options: ProxyAppOptions = {}
): Promise<FastifyInstance> {
  const app = await buildProxyApp(config, options);
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (error) {
    await app.close();
    throw toStartupError(error, config);
  }
  return app;
}
