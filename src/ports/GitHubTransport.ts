import type { HarvestError } from "../core/errors/harvest.errors";
import type { RateLimitMeta } from "../shared/rate-limit/RateGovernor";

export type ApiRequest = {
  // Absolute URL; only GET requests are issued.
  url: string;
};

export type ResponseMeta = {
  status: number;
  rateLimit: RateLimitMeta;
  link?: string;
  retryAfterSeconds?: number;
};

export type SuccessResponse = {
  outcome: "success";
  body: unknown;
  meta: ResponseMeta;
};

export type ClassifiedResponse =
  | SuccessResponse
  | { outcome: "retryable"; error: HarvestError; suggestedDelayMs?: number }
  | { outcome: "fatal"; error: HarvestError };

export interface GitHubTransport {
  /** One attempt, classified; never throws for HTTP or network failures. */
  send(request: ApiRequest): Promise<ClassifiedResponse>;
  /** Governed, retried request; throws the fatal HarvestError on failure. */
  request(request: ApiRequest): Promise<SuccessResponse>;
}
