export type WorkQueueOptions = {
  concurrency: number;
  // Stops scheduling queued items; in-flight handlers are left to finish.
  signal?: AbortSignal;
};

export type WorkQueueOutcome = {
  processed: number;
  cancelled: boolean;
};

export type WorkHandler<T> = (item: T, enqueue: (next: T) => void) => Promise<void>;

/**
 * Drains a queue with a fixed pool of workers. Handlers may enqueue follow-up
 * work; the drain settles once the queue is empty and every worker is idle.
 * The first handler error clears the queue, waits for in-flight handlers and
 * rejects with that error.
 */
export const drainWorkQueue = <T extends object>(
  seed: readonly T[],
  handle: WorkHandler<T>,
  options: WorkQueueOptions
): Promise<WorkQueueOutcome> => {
  const { concurrency, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  const queue: T[] = [...seed];
  let active = 0;
  let processed = 0;
  let failed: { error: unknown } | undefined;

  return new Promise<WorkQueueOutcome>((resolve, reject) => {
    let settled = false;

    const settle = () => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", pump);
      if (failed) {
        reject(failed.error);
        return;
      }
      resolve({ processed, cancelled: signal?.aborted === true });
    };

    const enqueue = (next: T) => {
      if (failed || signal?.aborted) return;
      queue.push(next);
      pump();
    };

    const run = async (item: T) => {
      try {
        await handle(item, enqueue);
        processed += 1;
      } catch (err) {
        if (!failed) {
          failed = { error: err };
          queue.length = 0;
        }
      } finally {
        active -= 1;
        pump();
      }
    };

    function pump() {
      if (signal?.aborted) queue.length = 0;

      while (active < concurrency) {
        const item = queue.shift();
        if (item === undefined) break;
        active += 1;
        void run(item);
      }

      if (active === 0 && queue.length === 0) settle();
    }

    signal?.addEventListener("abort", pump);
    pump();
  });
};
