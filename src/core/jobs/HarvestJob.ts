import { randomUUID } from "crypto";
import type { HarvestError, HarvestErrorCode } from "../errors/harvest.errors";
import type { FetchTarget } from "../target/fetchTarget";

export type HarvestJobStatus = "running" | "completed" | "failed";

export type HarvestPhase = "preflight" | "listing" | "details" | "completed" | "failed";

export type HarvestSkipCode = "invalid_record" | "detail_not_found" | "not_a_fork" | "duplicate_login";

export type HarvestJobFailure = {
  code: HarvestErrorCode;
  reason: string;
  at: Date;
};

/**
 * In-flight aggregate owned by one crawler run. Rows are streamed to the
 * export, so the job keeps counters instead of the rows themselves.
 */
export class HarvestJob {
  readonly id: string;
  readonly target: FetchTarget;
  readonly startedAt: Date;
  readonly pendingTokens = new Set<string>();
  readonly skippedByCode: Partial<Record<HarvestSkipCode, number>> = {};

  status: HarvestJobStatus = "running";
  phase: HarvestPhase = "preflight";
  pagesFetched = 0;
  recordsWritten = 0;
  finishedAt?: Date;
  failure?: HarvestJobFailure;

  constructor(target: FetchTarget, id: string = randomUUID(), now: Date = new Date()) {
    this.id = id;
    this.target = Object.freeze({ ...target });
    this.startedAt = now;
  }

  addSkipped(code: HarvestSkipCode): number {
    this.skippedByCode[code] = (this.skippedByCode[code] ?? 0) + 1;
    return this.skippedByCode[code] ?? 0;
  }

  /** Records dropped for data problems; filtered (non-fork) and repeated entries are not counted. */
  droppedCount(): number {
    return (this.skippedByCode.invalid_record ?? 0) + (this.skippedByCode.detail_not_found ?? 0);
  }

  complete(now: Date = new Date()): void {
    if (this.status !== "running") return;
    this.status = "completed";
    this.phase = "completed";
    this.finishedAt = now;
    this.pendingTokens.clear();
  }

  fail(error: HarvestError, now: Date = new Date()): void {
    if (this.status !== "running") return;
    this.status = "failed";
    this.phase = "failed";
    this.finishedAt = now;
    this.failure = { code: error.code, reason: error.message, at: now };
    this.pendingTokens.clear();
  }
}
