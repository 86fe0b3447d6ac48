export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      // Suggested wait before the next attempt; seeds the backoff sequence.
      delayMs?: number;
    };

export type RetryPolicy = {
  retries: number;          // retries after the initial try (5 means up to 6 requests)
  minDelayMs: number;       // base delay when no suggestion is given
  maxDelayMs: number;       // cap for any single wait
  jitterRatio?: number;
};

export type RetryOptions = RetryPolicy & {
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown; exhausted: boolean }) => void;
  randomFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export const defaultRetryPolicy: RetryPolicy = {
  retries: 5,
  minDelayMs: 1000,
  maxDelayMs: 60_000,
  jitterRatio: 0.2
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const isUsableDelay = (value: number | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0;

/**
 * Computes the wait before retry number `attempt + 1`. A suggested delay
 * longer than the base delay replaces it and still doubles on later
 * attempts; shorter or zero suggestions fall back to the base delay.
 */
export const backoffDelayMs = (
  attempt: number,
  policy: Pick<RetryPolicy, "minDelayMs" | "maxDelayMs">,
  suggestedDelayMs?: number
): number => {
  const seed = isUsableDelay(suggestedDelayMs) ? Math.max(policy.minDelayMs, suggestedDelayMs) : policy.minDelayMs;
  return Math.min(policy.maxDelayMs, seed * Math.pow(2, attempt));
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleep = defaultSleep
  } = opts;

  let attempt = 0;
  let suggestedDelayMs: number | undefined;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, exhausted: normalized.retry });
        throw err;
      }

      // The most recent suggestion seeds the doubling sequence.
      if (isUsableDelay(normalized.delayMs)) suggestedDelayMs = normalized.delayMs;
      const backoff = backoffDelayMs(attempt, opts, suggestedDelayMs);
      // jitter adds at most jitterRatio of the backoff
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
};
