import type { TimeSource } from "../../src/shared/time/timeSource";

/**
 * Clock for governor and retry tests. With `autoAdvance` every sleep moves
 * the clock forward at once; otherwise sleeps stay pending until `advanceTo`.
 */
export class FakeTimeSource implements TimeSource {
  readonly sleeps: number[] = [];
  private pending: Array<() => void> = [];

  constructor(private now: number, private readonly autoAdvance = true) {}

  nowMs(): number {
    return this.now;
  }

  sleepMs(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (this.autoAdvance) {
      this.now += ms;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.pending.push(resolve);
    });
  }

  pendingSleeps(): number {
    return this.pending.length;
  }

  advanceTo(ms: number): void {
    this.now = ms;
    const release = this.pending;
    this.pending = [];
    for (const resolve of release) resolve();
  }
}

export const flushAsync = () => new Promise<void>((resolve) => setImmediate(resolve));
