/**
 * Event Subscription
 *
 * A long-lived, lazily started stream of WorkflowEvents for one workflow.
 * Consumed with `for await`; reconnects on its own when the connection drops.
 *
 * State machine:
 *
 *   idle → connecting → open → closed
 *                ↑        ↓
 *                └─ reconnecting
 *
 *   cancelled is reachable from every state except closed.
 *
 * Rules:
 *   - Nothing connects until the first pull.
 *   - Frames are delivered in arrival order, at most once. Nothing is
 *     replayed after a reconnect.
 *   - A normal close (1000) after a completed/failed event ends the stream.
 *     Any other close is unexpected and triggers a reconnect.
 *   - A frame that cannot be decoded closes that connection (1007), is
 *     delivered as one `decode_failed` item and is followed by a reconnect.
 *   - Cancellation closes the connection at once, unblocks a pending pull
 *     with `done` and delivers nothing further.
 */

import {
  CancelledError,
  NetworkError,
  NotFoundError,
  SchemaError,
  TransportError,
  decodeEventFrame,
  isTerminalEvent,
  type Logger,
  type WorkflowEvent,
} from "@agentflow/contracts";
import type { ReconnectPolicy } from "../core/config.js";
import { ExponentialBackoff } from "./backoff.js";
import {
  CLOSE_CODES,
  type StreamConnection,
  type StreamConnector,
} from "./connection.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SubscriptionState =
  | "idle"
  | "connecting"
  | "open"
  | "reconnecting"
  | "closed"
  | "cancelled";

/** Delivered in place of a frame that could not be decoded. */
export interface DecodeFailure {
  readonly type: "decode_failed";
  readonly error: SchemaError;
  /** Connection attempt (1-based) on which the frame arrived */
  readonly attempt: number;
}

export type StreamItem = WorkflowEvent | DecodeFailure;

export type StateChangeListener = (
  state: SubscriptionState,
  previous: SubscriptionState
) => void;

/** Per-subscription options accepted by `subscribe()` on both clients. */
export interface SubscribeOptions {
  /** Overrides for the client's reconnect policy */
  reconnect?: Partial<ReconnectPolicy>;
  onStateChange?: StateChangeListener;
  /** Aborting cancels the subscription */
  signal?: AbortSignal;
}

export interface EventSubscriptionParams {
  workflowId: string;
  url: string;
  headers: Record<string, string>;
  connector: StreamConnector;
  logger: Logger;
  policy: ReconnectPolicy;
  onStateChange?: StateChangeListener;
  signal?: AbortSignal;
  /** Source of jitter; Math.random unless a test pins it */
  random?: () => number;
}

// ---------------------------------------------------------------------------
// Subscription
// ---------------------------------------------------------------------------

export class EventSubscription implements AsyncIterable<StreamItem> {
  readonly workflowId: string;

  private current: SubscriptionState = "idle";
  private connection: StreamConnection | null = null;
  private connectAttempts = 0;
  private readonly controller = new AbortController();
  private readonly backoff: ExponentialBackoff;
  private readonly iterator: AsyncGenerator<StreamItem, void, undefined>;
  private readonly onExternalAbort = () => this.cancel();

  constructor(private readonly params: EventSubscriptionParams) {
    this.workflowId = params.workflowId;
    this.backoff = new ExponentialBackoff(params.policy, params.random);
    this.iterator = this.run();

    if (params.signal?.aborted) {
      this.cancel();
    } else {
      params.signal?.addEventListener("abort", this.onExternalAbort, { once: true });
    }
  }

  get state(): SubscriptionState {
    return this.current;
  }

  /** The same iterator on every call; a subscription cannot be restarted. */
  [Symbol.asyncIterator](): AsyncGenerator<StreamItem, void, undefined> {
    return this.iterator;
  }

  /**
   * Stops the stream. Idempotent; a no-op once the stream has closed.
   */
  cancel(): void {
    if (this.current === "closed" || this.current === "cancelled") return;
    this.transition("cancelled");
    this.controller.abort();
    this.connection?.close(CLOSE_CODES.normal, "cancelled");
    this.connection = null;
    this.detach();
  }

  // -------------------------------------------------------------------------
  // Loop
  // -------------------------------------------------------------------------

  private async *run(): AsyncGenerator<StreamItem, void, undefined> {
    try {
      while (this.isActive()) {
        const connection = await this.connect();
        if (connection) {
          yield* this.drain(connection);
          if (!this.isActive()) return;
        }
        if (!(await this.waitToReconnect())) return;
      }
    } finally {
      // Reached on early `break` by the consumer as well as on errors.
      if (this.current !== "closed") this.cancel();
    }
  }

  /** Yields decoded frames from one connection until it closes. */
  private async *drain(
    connection: StreamConnection
  ): AsyncGenerator<StreamItem, void, undefined> {
    let sawTerminal = false;

    for (;;) {
      const message = await connection.next();
      if (!this.isActive()) return;

      if (message.kind === "close") {
        this.connection = null;
        if (message.code === CLOSE_CODES.normal && sawTerminal) {
          this.transition("closed");
          this.detach();
          return;
        }
        this.params.logger.warn("Event stream disconnected", {
          workflowId: this.workflowId,
          code: message.code,
          reason: message.reason,
        });
        return;
      }

      let event: WorkflowEvent;
      try {
        event = decodeEventFrame(message.data);
      } catch (error) {
        if (!(error instanceof SchemaError)) throw error;
        this.params.logger.warn("Dropping undecodable event frame", {
          workflowId: this.workflowId,
          error: error.message,
        });
        connection.close(CLOSE_CODES.invalidPayload, "undecodable frame");
        this.connection = null;
        yield { type: "decode_failed", error, attempt: this.connectAttempts };
        return;
      }

      if (isTerminalEvent(event)) sawTerminal = true;
      yield event;
      if (!this.isActive()) return;
    }
  }

  /**
   * Opens one connection. Returns null when the attempt failed in a way
   * worth retrying, or when the subscription was cancelled meanwhile.
   */
  private async connect(): Promise<StreamConnection | null> {
    this.transition("connecting");
    this.connectAttempts += 1;

    try {
      const connection = await this.params.connector.connect({
        url: this.params.url,
        headers: this.params.headers,
        signal: this.controller.signal,
      });
      if (!this.isActive()) {
        connection.close(CLOSE_CODES.normal, "cancelled");
        return null;
      }
      this.connection = connection;
      this.backoff.reset();
      this.transition("open");
      return connection;
    } catch (error) {
      if (!this.isActive() || error instanceof CancelledError) return null;
      if (error instanceof NetworkError) {
        this.params.logger.warn("Event stream connection failed", {
          workflowId: this.workflowId,
          attempt: this.connectAttempts,
          error: error.message,
        });
        return null;
      }
      this.transition("closed");
      this.detach();
      if (error instanceof TransportError && error.status === 404) {
        throw new NotFoundError(this.workflowId, error.rawBody);
      }
      throw error;
    }
  }

  /** Waits out the next backoff delay. False when the stream should stop. */
  private async waitToReconnect(): Promise<boolean> {
    if (!this.isActive()) return false;

    const delayMs = this.backoff.next();
    if (delayMs === null) {
      const attempts = this.backoff.attempts;
      this.transition("closed");
      this.detach();
      throw new NetworkError(
        `Event stream for workflow ${this.workflowId} gave up after ${attempts} reconnect attempts`
      );
    }

    this.transition("reconnecting");
    this.params.logger.warn("Reconnecting event stream", {
      workflowId: this.workflowId,
      attempt: this.backoff.attempts,
      delayMs,
    });
    await sleep(delayMs, this.controller.signal);
    return this.isActive();
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private isActive(): boolean {
    return this.current !== "closed" && this.current !== "cancelled";
  }

  private transition(next: SubscriptionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.params.logger.debug("Event stream state changed", {
      workflowId: this.workflowId,
      from: previous,
      to: next,
    });
    this.params.onStateChange?.(next, previous);
  }

  private detach(): void {
    this.params.signal?.removeEventListener("abort", this.onExternalAbort);
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}
