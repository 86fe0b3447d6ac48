export interface TimeSource {
  nowMs(): number;
  sleepMs(ms: number): Promise<void>;
}

export const realTimeSource: TimeSource = {
  nowMs: () => Date.now(),
  sleepMs: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)))
};
