/**
 * Logger Contract
 *
 * Structured logger used throughout the client runtime.
 * Callers may pass their own implementation; the SDK ships a JSON console
 * logger (`createLogger`) that satisfies it.
 */

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Threshold levels, lowest first. "silent" drops everything. */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
