/**
 * Exponential reconnect backoff with symmetric jitter.
 *
 *   delay(n) = min(maxDelayMs, initialDelayMs × multiplier^n) × (1 ± jitter)
 *
 * `next()` returns null once `maxAttempts` consecutive delays have been
 * handed out; `reset()` is called after every successful open.
 */

import type { ReconnectPolicy } from "../core/config.js";

export class ExponentialBackoff {
  private attempt = 0;

  constructor(
    private readonly policy: ReconnectPolicy,
    private readonly random: () => number = Math.random
  ) {}

  /** Delays handed out since the last reset */
  get attempts(): number {
    return this.attempt;
  }

  next(): number | null {
    const { initialDelayMs, maxDelayMs, multiplier, jitter, maxAttempts } = this.policy;
    if (maxAttempts !== undefined && this.attempt >= maxAttempts) return null;

    const base = Math.min(maxDelayMs, initialDelayMs * multiplier ** this.attempt);
    this.attempt += 1;

    const spread = (this.random() * 2 - 1) * jitter;
    return Math.max(0, Math.round(base * (1 + spread)));
  }

  reset(): void {
    this.attempt = 0;
  }
}
