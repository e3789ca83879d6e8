/**
 * Error Taxonomy
 *
 * The closed set of errors raised by the client runtime.
 * Every error carries a `kind` discriminant so callers can branch with a
 * switch instead of an instanceof chain:
 *
 *   network    → orchestrator unreachable or timed out (retry with backoff)
 *   transport  → orchestrator rejected the request (non-2xx)
 *   not_found  → lookup by workflow id returned 404
 *   schema     → response did not match the expected shape
 *   validation → request was malformed before it was sent
 *   decode     → response body was not JSON
 *   cancelled  → the caller cancelled the call or subscription
 */

export type OrchestratorErrorKind =
  | "network"
  | "transport"
  | "not_found"
  | "schema"
  | "validation"
  | "decode"
  | "cancelled";

/** Base class for every error the client runtime raises. */
export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;

  /** Whether repeating the same request later can succeed. */
  get retryable(): boolean {
    return false;
  }
}

/** Type guard for any taxonomy error. */
export function isOrchestratorError(value: unknown): value is OrchestratorError {
  return value instanceof OrchestratorError;
}

// ---------------------------------------------------------------------------
// Network / Transport
// ---------------------------------------------------------------------------

export class NetworkError extends OrchestratorError {
  readonly kind = "network" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
  }

  override get retryable(): boolean {
    return true;
  }
}

/** Longest slice of a raw body quoted in an error message. */
const MAX_QUOTED_BODY = 300;

export class TransportError extends OrchestratorError {
  readonly kind = "transport" as const;
  public readonly status: number;
  public readonly rawBody: string;
  /** The `error` field of a `{"error": "..."}` body, when the server sent one */
  public readonly serverMessage: string | undefined;
  public readonly method: string;
  public readonly path: string;

  constructor(params: {
    status: number;
    rawBody: string;
    method: string;
    path: string;
    serverMessage?: string;
  }) {
    const detail = params.serverMessage ?? quoteBody(params.rawBody);
    super(
      `${params.method} ${params.path} failed with HTTP ${params.status}` +
        (detail ? `: ${detail}` : "")
    );
    this.name = "TransportError";
    this.status = params.status;
    this.rawBody = params.rawBody;
    this.serverMessage = params.serverMessage;
    this.method = params.method;
    this.path = params.path;
  }
}

export class NotFoundError extends OrchestratorError {
  readonly kind = "not_found" as const;
  public readonly workflowId: string;
  public readonly status = 404;
  public readonly rawBody: string;

  constructor(workflowId: string, rawBody = "") {
    super(`Workflow ${workflowId} not found`);
    this.name = "NotFoundError";
    this.workflowId = workflowId;
    this.rawBody = rawBody;
  }
}

export class DecodeError extends OrchestratorError {
  readonly kind = "decode" as const;
  public readonly rawBody: string;

  constructor(rawBody: string, options?: { cause?: unknown }) {
    super(`Response body is not valid JSON: ${quoteBody(rawBody)}`, options);
    this.name = "DecodeError";
    this.rawBody = rawBody;
  }
}

// ---------------------------------------------------------------------------
// Shape errors
// ---------------------------------------------------------------------------

/** One problem found while checking a value against a schema. */
export interface SchemaIssue {
  path: string;
  message: string;
}

/** A server payload did not have the shape this client understands. */
export class SchemaError extends OrchestratorError {
  readonly kind = "schema" as const;
  /** Name of the entity being decoded (e.g. "Workflow") */
  public readonly entity: string;
  public readonly issues: SchemaIssue[];

  constructor(entity: string, issues: SchemaIssue[]) {
    super(`Malformed ${entity}: ${formatIssues(issues)}`);
    this.name = "SchemaError";
    this.entity = entity;
    this.issues = issues;
  }
}

/**
 * Structured validation error.
 * Raised before any request is sent; contains per-field details.
 */
export class ValidationError extends OrchestratorError {
  readonly kind = "validation" as const;
  public readonly fieldErrors: Array<{
    field: string;
    message: string;
  }>;

  constructor(
    message: string,
    fieldErrors: Array<{ field: string; message: string }> = []
  ) {
    super(message);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }
}

export class CancelledError extends OrchestratorError {
  readonly kind = "cancelled" as const;

  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function quoteBody(raw: string): string {
  const trimmed = raw.trim();
  return trimmed.length > MAX_QUOTED_BODY
    ? `${trimmed.slice(0, MAX_QUOTED_BODY)}…`
    : trimmed;
}

function formatIssues(issues: SchemaIssue[]): string {
  if (issues.length === 0) return "unexpected shape";
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
}
