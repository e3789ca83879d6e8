/**
 * Stream Connection Seam
 *
 * The subscriber talks to a `StreamConnector`, never to a socket library.
 * The default connector is WebSocket-backed; tests script connections in
 * process.
 */

/** WebSocket close codes the subscriber sends or interprets. */
export const CLOSE_CODES = {
  normal: 1000,
  abnormal: 1006,
  invalidPayload: 1007,
} as const;

export type StreamMessage =
  | { readonly kind: "message"; readonly data: string }
  | { readonly kind: "close"; readonly code: number; readonly reason: string };

export interface StreamConnection {
  /**
   * Resolves with the next message in arrival order. Once the connection is
   * closed (by either side) it resolves with the close message, every time.
   */
  next(): Promise<StreamMessage>;
  /** Closes the connection and settles any pending `next()` with a close message. */
  close(code?: number, reason?: string): void;
}

export interface StreamConnectRequest {
  url: string;
  headers: Record<string, string>;
  /** Aborting rejects a pending connect with CancelledError */
  signal: AbortSignal;
}

export interface StreamConnector {
  connect(request: StreamConnectRequest): Promise<StreamConnection>;
}

/**
 * Live-stream URL for a workflow: the base URL with http→ws / https→wss.
 */
export function buildStreamUrl(baseUrl: string, workflowId: string): string {
  const wsBase = baseUrl.replace(/^http/i, "ws");
  return `${wsBase}/api/v1/workflows/${encodeURIComponent(workflowId)}/live`;
}
