/**
 * Structured Logging
 *
 * One JSON object per line: { level, context, message, ...data }.
 * Lines below the configured threshold are dropped.
 */

import type { Logger, LogLevel } from "@agentflow/contracts";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerOptions {
  /** Lowest level written (default "info") */
  level?: LogLevel;
}

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];

  function write(
    level: Exclude<LogLevel, "silent">,
    sink: (line: string) => void,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LEVEL_RANK[level] < threshold) return;
    sink(JSON.stringify({ level, context, message, ...data }));
  }

  return {
    info(message, data) {
      write("info", (line) => console.log(line), message, data);
    },
    warn(message, data) {
      write("warn", (line) => console.warn(line), message, data);
    },
    error(message, data) {
      write("error", (line) => console.error(line), message, data);
    },
    debug(message, data) {
      write("debug", (line) => console.debug(line), message, data);
    },
  };
}
