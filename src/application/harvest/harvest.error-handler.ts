import {
  type HarvestError,
  isHarvestError,
  MalformedRecordError,
  NotFoundError,
  toErrorMessage,
  UnexpectedHarvestError
} from "../../core/errors/harvest.errors";
import type { HarvestSkipCode } from "../../core/jobs/HarvestJob";

export type RecordErrorContext = {
  target: string;
  page?: number;
  index?: number;
  login?: string;
};

type HarvestRecordSkippedLog = {
  event: "harvest.record_skipped";
  code: HarvestSkipCode;
  reason: string;
  target: string;
  page?: number;
  index?: number;
  login?: string;
};

export type RecordFailureDecision =
  | {
      action: "skip";
      code: HarvestSkipCode;
      log: HarvestRecordSkippedLog;
    }
  | {
      action: "fail";
      error: HarvestError;
    };

const skip = (code: HarvestSkipCode, reason: unknown, context: RecordErrorContext): RecordFailureDecision => {
  const log: HarvestRecordSkippedLog = {
    event: "harvest.record_skipped",
    code,
    reason: toErrorMessage(reason),
    target: context.target
  };
  if (context.page != null) log.page = context.page;
  if (context.index != null) log.index = context.index;
  if (context.login != null) log.login = context.login;
  return { action: "skip", code, log };
};

/** Normalization failures drop the one record; anything else fails the job. */
export const classifyRecordFailure = (reason: unknown, context: RecordErrorContext): RecordFailureDecision => {
  if (reason instanceof MalformedRecordError) return skip("invalid_record", reason, context);
  return { action: "fail", error: toJobFailure(reason, context) };
};

/**
 * A follower can disappear between the listing and the profile lookup; that
 * 404 drops the follower. Other detail failures fail the job.
 */
export const classifyDetailFailure = (reason: unknown, context: RecordErrorContext): RecordFailureDecision => {
  if (reason instanceof NotFoundError) return skip("detail_not_found", reason, context);
  return classifyRecordFailure(reason, context);
};

export const toJobFailure = (reason: unknown, context: Partial<RecordErrorContext> = {}): HarvestError => {
  if (isHarvestError(reason)) return reason;
  const where = context.page != null ? ` at page=${context.page}` : "";
  return new UnexpectedHarvestError({
    message: `Unexpected harvest failure${where}: ${toErrorMessage(reason)}`,
    context: { page: context.page, login: context.login },
    cause: reason
  });
};
