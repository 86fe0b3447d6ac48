import { realTimeSource, type TimeSource } from "../time/timeSource";

export type RateState = {
  remaining: number;
  limit: number;
  resetAtMs: number;
};

export type RateLimitMeta = {
  remaining?: number;
  limit?: number;
  resetEpochSeconds?: number;
};

export type RateWaitListener = (event: { untilMs: number; waitMs: number }) => void;

export type RateGovernorOptions = {
  timeSource?: TimeSource;
  // Waits longer than this are logged as rate_limit.long_wait.
  longWaitThresholdMs?: number;
  initialState?: Partial<RateState>;
};

// GitHub's authenticated core quota; corrected by the first observed response.
const DEFAULT_LIMIT = 5000;

const toNonNegativeInteger = (value: number | undefined): number | undefined =>
  typeof value === "number" && Number.isFinite(value) && value >= 0 ? Math.floor(value) : undefined;

/**
 * Single owner of the shared quota state. Every mutation happens
 * synchronously between awaits, so concurrent workers never interleave
 * inside an observe/acquire step.
 */
export class RateGovernor {
  private readonly state: RateState;
  private readonly timeSource: TimeSource;
  private readonly longWaitThresholdMs: number;
  private readonly listeners = new Set<RateWaitListener>();
  private resetWait?: { untilMs: number; done: Promise<void> };

  constructor(options: RateGovernorOptions = {}) {
    this.timeSource = options.timeSource ?? realTimeSource;
    this.longWaitThresholdMs = options.longWaitThresholdMs ?? 60_000;
    const limit = options.initialState?.limit ?? DEFAULT_LIMIT;
    this.state = {
      limit,
      remaining: Math.max(0, options.initialState?.remaining ?? limit),
      resetAtMs: options.initialState?.resetAtMs ?? 0
    };
  }

  nowMs(): number {
    return this.timeSource.nowMs();
  }

  snapshot(): RateState {
    return { ...this.state };
  }

  onWait(listener: RateWaitListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  observe(meta: RateLimitMeta): void {
    const remaining = toNonNegativeInteger(meta.remaining);
    const limit = toNonNegativeInteger(meta.limit);
    const resetEpochSeconds = toNonNegativeInteger(meta.resetEpochSeconds);

    if (limit != null && limit > 0) this.state.limit = limit;
    if (remaining == null) return;

    const resetAtMs = resetEpochSeconds != null ? resetEpochSeconds * 1000 : this.state.resetAtMs;
    if (resetAtMs === this.state.resetAtMs) {
      // Same window: responses can arrive out of order, the lowest count is the freshest.
      this.state.remaining = Math.min(this.state.remaining, remaining);
    } else if (resetAtMs > this.state.resetAtMs) {
      this.state.remaining = remaining;
      this.state.resetAtMs = resetAtMs;
    }
  }

  async acquire(): Promise<void> {
    while (this.state.remaining <= 0) {
      const now = this.timeSource.nowMs();
      if (now >= this.state.resetAtMs) {
        this.state.remaining = this.state.limit;
        break;
      }
      await this.waitForReset(this.state.resetAtMs, now);
    }

    this.state.remaining = Math.max(0, this.state.remaining - 1);
  }

  // Workers blocked on the same window share one timer.
  private waitForReset(untilMs: number, now: number): Promise<void> {
    if (this.resetWait?.untilMs === untilMs) return this.resetWait.done;

    const waitMs = untilMs - now;
    if (waitMs > this.longWaitThresholdMs) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "rate_limit.long_wait",
        waitMs,
        resetAt: new Date(untilMs).toISOString()
      }));
    }
    for (const listener of this.listeners) listener({ untilMs, waitMs });

    const done = this.timeSource.sleepMs(waitMs).then(() => {
      if (this.resetWait?.untilMs === untilMs) this.resetWait = undefined;
    });
    this.resetWait = { untilMs, done };
    return done;
  }
}
