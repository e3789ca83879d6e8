/**
 * Transport
 *
 * Executes one HTTP request against the orchestrator and hands back the
 * parsed JSON body. Everything above this layer works with typed values and
 * taxonomy errors; everything HTTP-specific stays here.
 *
 *   non-2xx            → TransportError (raw body + server message)
 *   connection failure → NetworkError
 *   timeout            → NetworkError
 *   caller abort       → CancelledError
 *   non-JSON body      → DecodeError
 *
 * Authentication:
 *   When an API key is configured it is attached as a Bearer header on every
 *   request. Without one, requests are sent without a token.
 */

import { z } from "zod";
import {
  CancelledError,
  DecodeError,
  NetworkError,
  TransportError,
  ValidationError,
} from "@agentflow/contracts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface TransportRequest {
  method: HttpMethod;
  /** Path below the base URL, starting with "/" */
  path: string;
  /** Entries with an undefined value are left out of the query string */
  query?: Record<string, string | undefined>;
  /** Serialized as JSON */
  body?: unknown;
}

export interface TransportResponse {
  status: number;
  /** Parsed JSON body; null when the body was empty */
  body: unknown;
  rawBody: string;
}

/** The request-execution seam. Tests inject in-process fakes. */
export interface Transport {
  request(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Fetch implementation
// ---------------------------------------------------------------------------

const ServerErrorSchema = z.object({ error: z.string() });

export class FetchTransport implements Transport {
  constructor(private readonly options: FetchTransportOptions) {}

  async request(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (signal?.aborted) throw new CancelledError();

    const headers: Record<string, string> = { Accept: "application/json" };
    let body: string | undefined;
    if (request.body !== undefined) {
      body = serializeBody(request.body);
      headers["Content-Type"] = "application/json";
    }
    if (this.options.apiKey) {
      headers["Authorization"] = `Bearer ${this.options.apiKey}`;
    }

    const { status, ok, rawBody } = await this.send(
      this.buildUrl(request),
      { method: request.method, headers, body },
      request,
      signal
    );

    if (!ok) {
      throw new TransportError({
        status,
        rawBody,
        method: request.method,
        path: request.path,
        serverMessage: extractServerMessage(rawBody),
      });
    }

    return { status, body: parseBody(rawBody), rawBody };
  }

  private buildUrl(request: TransportRequest): string {
    const url = `${this.options.baseUrl}${request.path}`;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) params.set(key, value);
    }
    const qs = params.toString();
    return qs ? `${url}?${qs}` : url;
  }

  /** Performs the fetch and reads the whole body under one abort scope. */
  private async send(
    url: string,
    init: { method: HttpMethod; headers: Record<string, string>; body: string | undefined },
    request: TransportRequest,
    signal: AbortSignal | undefined
  ): Promise<{ status: number; ok: boolean; rawBody: string }> {
    const scope = linkAbort(signal, this.options.timeoutMs);
    try {
      const response = await fetch(url, { ...init, signal: scope.signal });
      const rawBody = await response.text();
      return { status: response.status, ok: response.ok, rawBody };
    } catch (error) {
      const label = `${request.method} ${request.path}`;
      if (signal?.aborted) throw new CancelledError(`${label} cancelled`);
      if (scope.timedOut) {
        throw new NetworkError(`${label} timed out after ${this.options.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new NetworkError(
        `${label} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      scope.dispose();
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function serializeBody(value: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    throw new ValidationError(
      `Request body is not JSON-serializable: ${error instanceof Error ? error.message : String(error)}`,
      [{ field: "body", message: "not JSON-serializable" }]
    );
  }
  if (text === undefined) {
    throw new ValidationError("Request body is not JSON-serializable", [
      { field: "body", message: "not JSON-serializable" },
    ]);
  }
  return text;
}

export function parseBody(rawBody: string): unknown {
  if (rawBody.trim() === "") return null;
  try {
    return JSON.parse(rawBody);
  } catch (error) {
    throw new DecodeError(rawBody, { cause: error });
  }
}

/** Pulls `error` out of a `{"error": "..."}` body. */
export function extractServerMessage(rawBody: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch {
    return undefined;
  }
  const result = ServerErrorSchema.safeParse(json);
  return result.success ? result.data.error : undefined;
}

/**
 * One AbortSignal that fires when the caller aborts or the timeout elapses.
 */
function linkAbort(outer: AbortSignal | undefined, timeoutMs: number | undefined) {
  const controller = new AbortController();
  let timedOut = false;

  const onAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", onAbort, { once: true });

  const timer =
    timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}
