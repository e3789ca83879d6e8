/**
 * Dev Proxy Entry Point
 *
 * Loads .env from the repository root, starts the proxy and shuts it down on
 * SIGINT/SIGTERM.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { createLogger } from "@agentflow/sdk";
import { loadProxyConfig } from "./config.js";
import { startProxy } from "./server.js";

const logger = createLogger("dev-proxy");

async function main() {
  const config = loadProxyConfig(process.env);
  const app = await startProxy(config, {
    logger: createLogger("dev-proxy", { level: config.logLevel }),
  });

  logger.info("Dev proxy listening", {
    url: `http://${config.host}:${config.port}`,
    upstream: config.orchestratorUrl,
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
