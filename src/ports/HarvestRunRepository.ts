import type { HarvestJobStatus, HarvestSkipCode } from "../core/jobs/HarvestJob";
import type { FetchTarget } from "../core/target/fetchTarget";

export type HarvestRunRecord = {
  runId: string;
  target: FetchTarget;
  status: Exclude<HarvestJobStatus, "running">;
  startedAt: Date;
  finishedAt: Date;
  pagesFetched: number;
  recordCount: number;
  skippedByCode: Partial<Record<HarvestSkipCode, number>>;
  exportPath?: string;
  failure?: { code: string; reason: string };
};

/** Optional ledger of finished harvests. */
export interface HarvestRunRepository {
  record(run: HarvestRunRecord): Promise<void>;
}
