/**
 * WebSocket Connector
 *
 * Default StreamConnector, backed by `ws`. Messages are buffered from the
 * moment the socket is created, so nothing sent right after the handshake
 * is lost before the subscriber starts pulling.
 */

import WebSocket from "ws";
import type { ClientRequest, IncomingMessage } from "node:http";
import { CancelledError, NetworkError, TransportError } from "@agentflow/contracts";
import {
  CLOSE_CODES,
  type StreamConnectRequest,
  type StreamConnection,
  type StreamConnector,
  type StreamMessage,
} from "./connection.js";

export class WebSocketConnector implements StreamConnector {
  connect(request: StreamConnectRequest): Promise<StreamConnection> {
    return new Promise<StreamConnection>((resolve, reject) => {
      if (request.signal.aborted) {
        reject(new CancelledError("Stream connection cancelled"));
        return;
      }

      const socket = new WebSocket(request.url, { headers: request.headers });
      const connection = new WebSocketConnection(socket);

      const cleanup = () => {
        request.signal.removeEventListener("abort", onAbort);
        socket.off("open", onOpen);
        socket.off("error", onError);
        socket.off("unexpected-response", onUnexpectedResponse);
      };

      const onAbort = () => {
        cleanup();
        socket.terminate();
        reject(new CancelledError("Stream connection cancelled"));
      };

      const onOpen = () => {
        cleanup();
        resolve(connection);
      };

      const onError = (error: Error) => {
        cleanup();
        reject(new NetworkError(`Stream connection failed: ${error.message}`, { cause: error }));
      };

      const onUnexpectedResponse = (req: ClientRequest, res: IncomingMessage) => {
        cleanup();
        req.destroy();
        reject(
          new TransportError({
            status: res.statusCode ?? 0,
            rawBody: "",
            method: "GET",
            path: new URL(request.url).pathname,
          })
        );
      };

      request.signal.addEventListener("abort", onAbort, { once: true });
      socket.on("open", onOpen);
      socket.on("error", onError);
      socket.on("unexpected-response", onUnexpectedResponse);
    });
  }
}

class WebSocketConnection implements StreamConnection {
  private readonly queue: StreamMessage[] = [];
  private readonly waiters: Array<(message: StreamMessage) => void> = [];
  private closed: StreamMessage | null = null;

  constructor(private readonly socket: WebSocket) {
    socket.on("message", (data: WebSocket.RawData) => {
      this.push({ kind: "message", data: rawDataToString(data) });
    });
    socket.on("close", (code: number, reason: Buffer) => {
      this.finish(code, reason.toString("utf8"));
    });
    // Errors are always followed by "close"; the listener keeps ws from throwing.
    socket.on("error", () => undefined);
  }

  next(): Promise<StreamMessage> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(this.closed);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(code: number = CLOSE_CODES.normal, reason = ""): void {
    if (this.closed) return;
    this.queue.length = 0;
    this.finish(code, reason);
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(code, reason);
    } else {
      this.socket.terminate();
    }
  }

  private push(message: StreamMessage): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter(message);
    else this.queue.push(message);
  }

  private finish(code: number, reason: string): void {
    if (this.closed) return;
    const message: StreamMessage = { kind: "close", code, reason };
    this.closed = message;
    for (const waiter of this.waiters.splice(0)) waiter(message);
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
