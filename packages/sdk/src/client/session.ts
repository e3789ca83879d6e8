/**
 * Workflow Session
 *
 * The non-blocking face of the client. Every method returns a PendingCall
 * immediately; the caller decides when (or whether) to await it.
 *
 * A session owns one scope: an AbortController covering every call in
 * flight and every subscription it opened. The scope is acquired on first
 * use and released by `close()`, which cancels whatever is still running.
 * A closed session acquires a fresh scope on its next call.
 *
 * Usage:
 *   await client.withSession(async (session) => {
 *     const deploy = session.deploy(definition);
 *     const list = session.list();
 *     const [workflow, all] = await Promise.all([deploy, list]);
 *   });
 */

import type {
  LogEntry,
  TriggerResult,
  Workflow,
  WorkflowDefinition,
  WorkflowStatus,
} from "@agentflow/contracts";
import { execute, operations, type LogQuery } from "../core/operations.js";
import { openSubscription, type ClientRuntime } from "../core/runtime.js";
import { loadWorkflowFile, parseWorkflowYaml } from "../manifest/yaml.js";
import type {
  EventSubscription,
  StateChangeListener,
  SubscribeOptions,
} from "../stream/subscription.js";
import { PendingCall } from "./pending-call.js";

export class WorkflowSession {
  private scope: AbortController | null = null;
  private readonly inFlight = new Set<PendingCall<unknown>>();
  private readonly subscriptions = new Set<EventSubscription>();

  constructor(private readonly runtime: ClientRuntime) {}

  /** True between the first call and `close()` */
  get isOpen(): boolean {
    return this.scope !== null;
  }

  /** Calls that have not settled yet */
  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** Subscriptions that have neither closed nor been cancelled */
  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  deploy(definition: WorkflowDefinition): PendingCall<Workflow> {
    return this.call((signal) => execute(this.runtime, operations.deploy(definition), signal));
  }

  deployYaml(text: string): PendingCall<Workflow> {
    return this.call((signal) =>
      execute(this.runtime, operations.deploy(parseWorkflowYaml(text)), signal)
    );
  }

  deployFile(path: string): PendingCall<Workflow> {
    return this.call(async (signal) =>
      execute(this.runtime, operations.deploy(await loadWorkflowFile(path)), signal)
    );
  }

  get(id: string): PendingCall<Workflow> {
    return this.call((signal) => execute(this.runtime, operations.get(id), signal));
  }

  getStatus(id: string): PendingCall<WorkflowStatus> {
    return this.call((signal) => execute(this.runtime, operations.getStatus(id), signal));
  }

  list(): PendingCall<readonly Workflow[]> {
    return this.call((signal) => execute(this.runtime, operations.list(), signal));
  }

  delete(id: string): PendingCall<void> {
    return this.call((signal) => execute(this.runtime, operations.delete(id), signal));
  }

  getLogs(id: string, query: LogQuery = {}): PendingCall<readonly LogEntry[]> {
    return this.call((signal) => execute(this.runtime, operations.getLogs(id, query), signal));
  }

  trigger(
    webhookPath: string,
    payload?: Readonly<Record<string, unknown>>
  ): PendingCall<TriggerResult> {
    return this.call((signal) =>
      execute(this.runtime, operations.trigger(webhookPath, payload), signal)
    );
  }

  /**
   * Opens a subscription that is cancelled when the session closes. The
   * session forgets it as soon as it closes or is cancelled.
   */
  subscribe(id: string, options: SubscribeOptions = {}): EventSubscription {
    const scope = this.acquire();
    let subscription: EventSubscription | undefined;
    const onStateChange: StateChangeListener = (state, previous) => {
      if (subscription && (state === "closed" || state === "cancelled")) {
        this.subscriptions.delete(subscription);
      }
      options.onStateChange?.(state, previous);
    };

    subscription = openSubscription(this.runtime, id, { ...options, onStateChange }, scope.signal);
    if (subscription.state !== "closed" && subscription.state !== "cancelled") {
      this.subscriptions.add(subscription);
    }
    return subscription;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Releases the scope: cancels calls still in flight and every
   * subscription, then waits for the cancelled calls to settle.
   */
  async close(): Promise<void> {
    const scope = this.scope;
    if (!scope) return;
    this.scope = null;

    const calls = [...this.inFlight];
    scope.abort();
    for (const subscription of [...this.subscriptions]) subscription.cancel();
    this.subscriptions.clear();

    await Promise.all(calls.map((call) => call.settle()));
    this.runtime.logger.debug("Session closed", { cancelledCalls: calls.length });
  }

  private acquire(): AbortController {
    if (!this.scope) {
      this.scope = new AbortController();
      this.runtime.logger.debug("Session opened");
    }
    return this.scope;
  }

  private call<T>(run: (signal: AbortSignal) => Promise<T>): PendingCall<T> {
    const scope = this.acquire();
    const call = new PendingCall(run, scope.signal);
    this.inFlight.add(call);
    void call.settle().then(() => this.inFlight.delete(call));
    return call;
  }
}
