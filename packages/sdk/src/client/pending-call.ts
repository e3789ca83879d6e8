/**
 * Pending Call
 *
 * The handle a session returns for every operation: started immediately,
 * awaitable like a promise, cancellable on its own or together with the
 * session that issued it.
 */

import { CancelledError } from "@agentflow/contracts";

export type CallStatus = "pending" | "fulfilled" | "rejected" | "cancelled";

export class PendingCall<T> implements PromiseLike<T> {
  private readonly controller = new AbortController();
  private readonly promise: Promise<T>;
  private settled: CallStatus = "pending";

  /**
   * @param run - starts the work; must honour the signal it is given
   * @param scope - aborting it cancels this call too (the session scope)
   */
  constructor(run: (signal: AbortSignal) => Promise<T>, scope?: AbortSignal) {
    const onScopeAbort = () => this.cancel();
    if (scope?.aborted) this.controller.abort();
    else scope?.addEventListener("abort", onScopeAbort, { once: true });

    this.promise = start(run, this.controller.signal).then(
      (value) => {
        this.settled = "fulfilled";
        scope?.removeEventListener("abort", onScopeAbort);
        return value;
      },
      (error: unknown) => {
        this.settled = error instanceof CancelledError ? "cancelled" : "rejected";
        scope?.removeEventListener("abort", onScopeAbort);
        throw error;
      }
    );
    // Callers see the rejection through then(); an unobserved call must not
    // surface as an unhandled rejection.
    this.promise.catch(() => undefined);
  }

  /** Settlement state; "pending" until the underlying work finishes. */
  get status(): CallStatus {
    return this.settled;
  }

  /** Aborts the call. The call then rejects with CancelledError. */
  cancel(): void {
    if (this.settled === "pending") this.controller.abort();
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  /** Settles once the call does, without rethrowing. */
  settle(): Promise<void> {
    return this.promise.then(
      () => undefined,
      () => undefined
    );
  }
}

/** Runs `run` so that a synchronous throw becomes a rejection. */
async function start<T>(run: (signal: AbortSignal) => Promise<T>, signal: AbortSignal): Promise<T> {
  return run(signal);
}
