/**
 * Value guards shared by request validation and YAML loading.
 */

import { ValidationError } from "@agentflow/contracts";

/** True for `{...}` values: not null and not an array. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Rejects empty or whitespace-only identifiers before any request is built.
 */
export function requireId(value: string, field = "workflowId"): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${field} must be a non-empty string`, [
      { field, message: "must not be empty" },
    ]);
  }
  return value;
}
