export const DEFAULT_SCROLL_COOLDOWN_MS = 2000;

/**
 * Pipeline-wide suspend latch driven by user scroll activity.
 *
 * A single deadline shared by every consumer: a scroll on any surface
 * pauses dispatch for all of them. `signal()` only ever pushes the
 * deadline later, so overlapping signals extend the pause and never
 * shorten it.
 *
 * The clock is injectable; defaults to Date.now().
 */
export class FlowControlGate {
  private deadlineMs: number;
  private readonly cooldownMs: number;
  private readonly nowFn: () => number;

  constructor(
    cooldownMs: number = DEFAULT_SCROLL_COOLDOWN_MS,
    nowFn: () => number = Date.now,
  ) {
    if (!Number.isFinite(cooldownMs) || cooldownMs < 0) {
      throw new Error(`Scroll cooldown must be a non-negative number, got ${cooldownMs}`);
    }
    this.cooldownMs = cooldownMs;
    this.nowFn = nowFn;
    this.deadlineMs = nowFn();
  }

  /** Record scroll activity: suspend until now + cooldown (or later, if already further out). */
  signal(): void {
    this.deadlineMs = Math.max(this.deadlineMs, this.nowFn() + this.cooldownMs);
  }

  isSuspended(): boolean {
    return this.nowFn() < this.deadlineMs;
  }

  /** Epoch ms at which dispatch resumes. In the past when not suspended. */
  get suspendedUntil(): number {
    return this.deadlineMs;
  }

  get cooldown(): number {
    return this.cooldownMs;
  }
}
