export type HarvestErrorCode =
  | "transient_network"
  | "rate_limited"
  | "unauthorized"
  | "not_found"
  | "request_rejected"
  | "retries_exhausted"
  | "malformed_page"
  | "invalid_continuation"
  | "invalid_record"
  | "export_write_failed"
  | "page_limit_exceeded"
  | "abandoned"
  | "unexpected";

export type HarvestErrorContext = {
  url?: string;
  status?: number;
  page?: number;
  login?: string;
  path?: string;
};

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;
  readonly retryable: boolean;
  readonly context: HarvestErrorContext;
  readonly cause?: unknown;

  constructor(args: {
    code: HarvestErrorCode;
    message: string;
    retryable?: boolean;
    context?: HarvestErrorContext;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "HarvestError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type ErrorArgs = { message: string; context?: HarvestErrorContext; cause?: unknown };

export class TransientNetworkError extends HarvestError {
  readonly retryDelayMs?: number;

  constructor(args: ErrorArgs & { retryDelayMs?: number }) {
    super({ ...args, code: "transient_network", retryable: true });
    this.name = "TransientNetworkError";
    this.retryDelayMs = args.retryDelayMs;
  }
}

export class RateLimitExceededError extends HarvestError {
  readonly retryDelayMs?: number;

  constructor(args: ErrorArgs & { retryDelayMs?: number }) {
    super({ ...args, code: "rate_limited", retryable: true });
    this.name = "RateLimitExceededError";
    this.retryDelayMs = args.retryDelayMs;
  }
}

export class AuthorizationError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "unauthorized" });
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "not_found" });
    this.name = "NotFoundError";
  }
}

export class RequestRejectedError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "request_rejected" });
    this.name = "RequestRejectedError";
  }
}

export class RetriesExhaustedError extends HarvestError {
  readonly attempts: number;

  constructor(args: ErrorArgs & { attempts: number }) {
    super({ ...args, code: "retries_exhausted" });
    this.name = "RetriesExhaustedError";
    this.attempts = args.attempts;
  }
}

export class MalformedPageError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "malformed_page" });
    this.name = "MalformedPageError";
  }
}

export class InvalidContinuationError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "invalid_continuation" });
    this.name = "InvalidContinuationError";
  }
}

/** Per-record failure; the crawler drops the record instead of failing the job. */
export class MalformedRecordError extends HarvestError {
  constructor(message: string) {
    super({ message, code: "invalid_record" });
    this.name = "MalformedRecordError";
  }
}

export class ExportWriteError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "export_write_failed" });
    this.name = "ExportWriteError";
  }
}

export class PageLimitExceededError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "page_limit_exceeded" });
    this.name = "PageLimitExceededError";
  }
}

export class HarvestAbandonedError extends HarvestError {
  constructor() {
    super({ message: "Harvest abandoned by caller", code: "abandoned" });
    this.name = "HarvestAbandonedError";
  }
}

/** Wraps a failure from outside the taxonomy (a bug or a library throw). */
export class UnexpectedHarvestError extends HarvestError {
  constructor(args: ErrorArgs) {
    super({ ...args, code: "unexpected" });
    this.name = "UnexpectedHarvestError";
  }
}

export const isHarvestError = (value: unknown): value is HarvestError => value instanceof HarvestError;

export const retryDelayOf = (error: HarvestError): number | undefined =>
  error instanceof RateLimitExceededError || error instanceof TransientNetworkError ? error.retryDelayMs : undefined;

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
