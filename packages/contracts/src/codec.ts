/**
 * Wire Codecs
 *
 * A codec converts between the orchestrator's JSON shape (snake_case,
 * loosely typed) and the immutable domain values the client hands out.
 *
 *   fromWire(json) → value   throws SchemaError when the shape is wrong
 *   toWire(value)  → json    total for any value fromWire produced
 *
 * Unknown fields are dropped on the way in; that is the forward-compatibility
 * policy, not an error.
 */

import type { z } from "zod";
import { SchemaError, type SchemaIssue } from "./errors.js";

export interface WireCodec<T, W> {
  /** Entity name used in SchemaError messages */
  readonly entity: string;
  fromWire(json: unknown): T;
  toWire(value: T): W;
}

/**
 * Builds a codec from a zod schema for the wire shape and a pair of
 * mapping functions. The domain value is deep-frozen before it is returned.
 */
export function defineCodec<S extends z.ZodTypeAny, T, W>(definition: {
  entity: string;
  schema: S;
  toDomain: (wire: z.output<S>) => T;
  toWire: (value: T) => W;
}): WireCodec<T, W> {
  return {
    entity: definition.entity,
    fromWire(json: unknown): T {
      const wire = parseWire(definition.entity, definition.schema, json);
      return deepFreeze(definition.toDomain(wire));
    },
    toWire(value: T): W {
      return definition.toWire(value);
    },
  };
}

/**
 * Parses `json` against `schema`, converting zod issues into a SchemaError.
 */
export function parseWire<S extends z.ZodTypeAny>(
  entity: string,
  schema: S,
  json: unknown
): z.output<S> {
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new SchemaError(entity, toSchemaIssues(result.error));
  }
  return result.data;
}

export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Recursively freezes plain objects and arrays.
 * Values from the server are never mutated in place.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
