export type ProgressListener<T extends object> = (update: T) => void | Promise<void>;

export type ProgressChannel<T extends object> = {
  publish(update: T): void;
  dropped(): number;
  close(): void;
};

export const defaultProgressCapacity = 32;

/**
 * Fire-and-forget delivery: `publish` never waits on the listener. While the
 * listener is busy, updates buffer up to `capacity`, then the oldest are
 * dropped.
 */
export const createProgressChannel = <T extends object>(
  listener: ProgressListener<T>,
  capacity: number = defaultProgressCapacity
): ProgressChannel<T> => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error("capacity must be an integer >= 1");
  }

  const buffer: T[] = [];
  let droppedCount = 0;
  let delivering = false;
  let closed = false;

  const deliver = async () => {
    for (let update = buffer.shift(); update !== undefined; update = buffer.shift()) {
      try {
        await listener(update);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "progress.listener_failed",
          message: err instanceof Error ? err.message : String(err)
        }));
      }
    }
    delivering = false;
  };

  return {
    publish(update) {
      if (closed) return;
      buffer.push(update);
      if (buffer.length > capacity) {
        buffer.shift();
        droppedCount += 1;
      }
      if (!delivering) {
        delivering = true;
        setImmediate(() => {
          void deliver();
        });
      }
    },
    dropped: () => droppedCount,
    close() {
      closed = true;
    }
  };
};
