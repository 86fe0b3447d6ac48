import {
  AuthorizationError,
  isHarvestError,
  NotFoundError,
  RateLimitExceededError,
  RequestRejectedError,
  RetriesExhaustedError,
  retryDelayOf,
  TransientNetworkError
} from "../../core/errors/harvest.errors";
import type {
  ApiRequest,
  ClassifiedResponse,
  GitHubTransport,
  ResponseMeta,
  SuccessResponse
} from "../../ports/GitHubTransport";
import type { RateGovernor } from "../../shared/rate-limit/RateGovernor";
import { defaultRetryPolicy, retry, type RetryPolicy } from "../../shared/retry/retry";
import { realTimeSource, type TimeSource } from "../../shared/time/timeSource";

export type GitHubHttpClientOptions = {
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  timeSource?: TimeSource;
  userAgent?: string;
};

type HeaderSource = { get(name: string): string | null };

const parseHeaderInt = (headers: HeaderSource, name: string): number | undefined => {
  const raw = headers.get(name);
  if (raw == null || !/^\d+$/.test(raw.trim())) return undefined;
  const value = Number(raw.trim());
  return Number.isSafeInteger(value) ? value : undefined;
};

export const readResponseMeta = (status: number, headers: HeaderSource): ResponseMeta => ({
  status,
  rateLimit: {
    remaining: parseHeaderInt(headers, "x-ratelimit-remaining"),
    limit: parseHeaderInt(headers, "x-ratelimit-limit"),
    resetEpochSeconds: parseHeaderInt(headers, "x-ratelimit-reset")
  },
  link: headers.get("link") ?? undefined,
  retryAfterSeconds: parseHeaderInt(headers, "retry-after")
});

const suggestRateLimitDelayMs = (meta: ResponseMeta, nowMs: number): number | undefined => {
  if (meta.retryAfterSeconds != null) return meta.retryAfterSeconds * 1000;
  const reset = meta.rateLimit.resetEpochSeconds;
  if (meta.rateLimit.remaining === 0 && reset != null) return Math.max(0, reset * 1000 - nowMs);
  return undefined;
};

/**
 * Maps a non-2xx status to the harvest error taxonomy. GitHub signals quota
 * exhaustion with 429, or with 403 plus an empty quota or a Retry-After.
 */
export const classifyFailureStatus = (
  meta: ResponseMeta,
  url: string,
  nowMs: number
): Exclude<ClassifiedResponse, SuccessResponse> => {
  const { status } = meta;
  const context = { status, url };
  const rateLimited =
    status === 429 || (status === 403 && (meta.rateLimit.remaining === 0 || meta.retryAfterSeconds != null));

  if (rateLimited) {
    const suggestedDelayMs = suggestRateLimitDelayMs(meta, nowMs);
    return {
      outcome: "retryable",
      error: new RateLimitExceededError({ message: `GitHub rate limit exceeded: ${status}`, context, retryDelayMs: suggestedDelayMs }),
      suggestedDelayMs
    };
  }
  if (status >= 500) {
    return {
      outcome: "retryable",
      error: new TransientNetworkError({ message: `GitHub request failed: ${status}`, context })
    };
  }
  if (status === 401 || status === 403) {
    return {
      outcome: "fatal",
      error: new AuthorizationError({ message: `GitHub rejected the credential: ${status}`, context })
    };
  }
  if (status === 404 || status === 410) {
    return { outcome: "fatal", error: new NotFoundError({ message: `GitHub resource not found: ${status}`, context }) };
  }
  return { outcome: "fatal", error: new RequestRejectedError({ message: `GitHub request failed: ${status}`, context }) };
};

// Query strings may carry cursors; only origin and path reach the logs.
const safeUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return "<invalid-url>";
  }
};

/**
 * GitHub REST transport on Node's built-in fetch, whose dispatcher keeps
 * connections alive across requests.
 */
export class GitHubHttpClient implements GitHubTransport {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeSource: TimeSource;
  private readonly userAgent: string;

  constructor(
    private readonly token: string,
    private readonly governor: RateGovernor,
    options: GitHubHttpClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.retryPolicy = { ...defaultRetryPolicy, ...options.retry };
    this.timeSource = options.timeSource ?? realTimeSource;
    this.userAgent = options.userAgent ?? "github-harvester";
  }

  async send(request: ApiRequest): Promise<ClassifiedResponse> {
    const requestUrl = safeUrl(request.url);
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": this.userAgent
    };
    if (this.token !== "") headers.Authorization = `Bearer ${this.token}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await fetch(request.url, { headers, signal: controller.signal });
    } catch (err) {
      clearTimeout(timeout);
      const message = controller.signal.aborted
        ? `GitHub request timeout after ${this.timeoutMs}ms`
        : `GitHub request failed: ${err instanceof Error ? err.message : String(err)}`;
      return { outcome: "retryable", error: new TransientNetworkError({ message, context: { url: requestUrl }, cause: err }) };
    }

    try {
      const meta = readResponseMeta(res.status, res.headers);
      this.governor.observe(meta.rateLimit);

      if (!res.ok) {
        await res.text().catch(() => "");
        return classifyFailureStatus(meta, requestUrl, this.timeSource.nowMs());
      }

      const text = await res.text();
      if (res.status === 204 || text.trim() === "") {
        return { outcome: "success", body: null, meta };
      }

      try {
        return { outcome: "success", body: JSON.parse(text), meta };
      } catch (err) {
        return {
          outcome: "retryable",
          error: new TransientNetworkError({
            message: "GitHub response body is not valid JSON",
            context: { status: res.status, url: requestUrl },
            cause: err
          })
        };
      }
    } catch (err) {
      // Body stream broke or timed out mid-read.
      return {
        outcome: "retryable",
        error: new TransientNetworkError({
          message: controller.signal.aborted ? `GitHub request timeout after ${this.timeoutMs}ms` : "GitHub response body could not be read",
          context: { status: res.status, url: requestUrl },
          cause: err
        })
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  async request(request: ApiRequest): Promise<SuccessResponse> {
    const requestUrl = safeUrl(request.url);
    const attemptOnce = async (): Promise<SuccessResponse> => {
      await this.governor.acquire();
      const response = await this.send(request);
      if (response.outcome === "success") return response;
      throw response.error;
    };

    try {
      return await retry(attemptOnce, {
        ...this.retryPolicy,
        sleep: (ms) => this.timeSource.sleepMs(ms),
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.retry",
            code: isHarvestError(error) ? error.code : null,
            status: isHarvestError(error) ? error.context.status ?? null : null,
            url: requestUrl,
            attempt,
            maxAttempts,
            delayMs
          }));
        },
        onGiveUp: ({ attempt, maxAttempts, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.give_up",
            code: isHarvestError(error) ? error.code : null,
            status: isHarvestError(error) ? error.context.status ?? null : null,
            url: requestUrl,
            attempt,
            maxAttempts
          }));
        },
        shouldRetry: (err) => {
          if (!isHarvestError(err) || !err.retryable) return false;
          return { retry: true, delayMs: retryDelayOf(err) };
        }
      });
    } catch (err) {
      if (isHarvestError(err) && err.retryable) {
        throw new RetriesExhaustedError({
          message: `GitHub request still failing after ${this.retryPolicy.retries + 1} attempts: ${err.message}`,
          attempts: this.retryPolicy.retries + 1,
          context: { url: requestUrl, status: err.context.status },
          cause: err
        });
      }
      throw err;
    }
  }
}
