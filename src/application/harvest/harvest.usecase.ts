import { join } from "path";
import {
  type HarvestErrorCode,
  HarvestAbandonedError,
  PageLimitExceededError,
  toErrorMessage
} from "../../core/errors/harvest.errors";
import { HarvestJob, type HarvestPhase, type HarvestSkipCode } from "../../core/jobs/HarvestJob";
import { describeTarget, type FetchTarget } from "../../core/target/fetchTarget";
import type { CsvExportWriter, CsvRow, OpenExport } from "../../ports/ExportSink";
import type { HarvestRunRepository } from "../../ports/HarvestRunRepository";
import type { PageSource } from "../../ports/PageSource";
import { drainWorkQueue } from "../../shared/concurrency/workQueue";
import { createProgressChannel, type ProgressChannel, type ProgressListener } from "../../shared/progress/progressChannel";
import type { RateGovernor } from "../../shared/rate-limit/RateGovernor";
import {
  classifyDetailFailure,
  classifyRecordFailure,
  type RecordFailureDecision,
  toJobFailure
} from "./harvest.error-handler";
import { prepareHarvest, type HarvestPlan, type ListingDecision } from "./harvest.plan";
import { type HarvesterConfig, type HarvesterConfigInput, resolveHarvesterConfig } from "./harvester.config";

export type HarvestDeps = {
  source: PageSource;
  openExport: OpenExport;
  runs?: HarvestRunRepository;
  // Only used to surface rate-limit waits in progress updates, on the governor's clock.
  governor?: RateGovernor;
};

export type HarvestProgress = {
  jobId: string;
  target: string;
  phase: HarvestPhase;
  pagesFetched: number;
  recordsNormalized: number;
  recordsDropped: number;
  rateLimitedUntil?: string;
};

export type HarvestOptions = {
  config?: HarvesterConfigInput;
  onProgress?: ProgressListener<HarvestProgress>;
  signal?: AbortSignal;
  jobId?: string;
};

type HarvestSummary = {
  jobId: string;
  target: FetchTarget;
  startedAt: Date;
  finishedAt: Date;
  pagesFetched: number;
  recordCount: number;
  skippedByCode: Partial<Record<HarvestSkipCode, number>>;
};

export type HarvestResult =
  | (HarvestSummary & { status: "completed"; exportPath: string })
  | (HarvestSummary & { status: "failed"; code: HarvestErrorCode; reason: string; partialExportPath?: string });

type ListingItem = { page: number; token?: string };
type DetailItem = { login: string };

const throwIfAbandoned = (signal?: AbortSignal) => {
  if (signal?.aborted) throw new HarvestAbandonedError();
};

class HarvestRun {
  private readonly label: string;
  private readonly progress?: ProgressChannel<HarvestProgress>;
  private rateLimitedUntilMs?: number;

  constructor(
    private readonly job: HarvestJob,
    private readonly deps: HarvestDeps,
    private readonly config: HarvesterConfig,
    private readonly options: HarvestOptions
  ) {
    this.label = describeTarget(job.target);
    this.progress = options.onProgress ? createProgressChannel(options.onProgress, config.progressCapacity) : undefined;
  }

  report(): void {
    if (!this.progress) return;
    const update: HarvestProgress = {
      jobId: this.job.id,
      target: this.label,
      phase: this.job.phase,
      pagesFetched: this.job.pagesFetched,
      recordsNormalized: this.job.recordsWritten,
      recordsDropped: this.job.droppedCount()
    };
    const nowMs = this.deps.governor?.nowMs() ?? Date.now();
    if (this.rateLimitedUntilMs != null && this.rateLimitedUntilMs > nowMs) {
      update.rateLimitedUntil = new Date(this.rateLimitedUntilMs).toISOString();
    }
    this.progress.publish(update);
  }

  watchRateLimit(): () => void {
    if (!this.deps.governor) return () => undefined;
    return this.deps.governor.onWait(({ untilMs }) => {
      this.rateLimitedUntilMs = untilMs;
      this.report();
    });
  }

  closeProgress(): void {
    this.progress?.close();
  }

  private applyDecision(decision: RecordFailureDecision): void {
    if (decision.action === "fail") throw decision.error;
    const skippedCount = this.job.addSkipped(decision.code);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ ...decision.log, jobId: this.job.id, skippedCount }));
  }

  private async write(writer: CsvExportWriter, row: CsvRow): Promise<void> {
    await writer.writeRow(row);
    this.job.recordsWritten += 1;
  }

  /**
   * Drains the listing. Every page reveals at most one continuation token, so
   * the pool works ahead only as far as the API lets it. Returns the follower
   * logins collected for the detail phase.
   */
  async crawlListing(plan: HarvestPlan, writer: CsvExportWriter): Promise<string[]> {
    const { job, deps, config } = this;
    const logins = new Set<string>();

    const outcome = await drainWorkQueue<ListingItem>(
      [{ page: 1 }],
      async (item, enqueue) => {
        const page = await deps.source.fetchPage(job.target, item.token);
        if (item.token) job.pendingTokens.delete(item.token);
        job.pagesFetched += 1;

        for (const [index, raw] of page.records.entries()) {
          let decision: ListingDecision;
          try {
            decision = plan.decide(raw);
          } catch (err) {
            this.applyDecision(classifyRecordFailure(err, { target: this.label, page: item.page, index }));
            continue;
          }

          if (decision.action === "write") await this.write(writer, decision.row);
          else if (decision.action === "filter") job.addSkipped(decision.code);
          else if (logins.has(decision.login)) job.addSkipped("duplicate_login");
          else logins.add(decision.login);
        }

        if (page.next) {
          if (item.page >= config.maxPages) {
            throw new PageLimitExceededError({
              message: `Listing for ${this.label} has more than ${config.maxPages} pages`,
              context: { page: item.page }
            });
          }
          job.pendingTokens.add(page.next);
          enqueue({ page: item.page + 1, token: page.next });
        }
        this.report();
      },
      { concurrency: config.concurrency, signal: this.options.signal }
    );

    if (outcome.cancelled) throw new HarvestAbandonedError();
    return Array.from(logins);
  }

  async crawlDetails(plan: HarvestPlan, writer: CsvExportWriter, logins: string[]): Promise<void> {
    const outcome = await drainWorkQueue<DetailItem>(
      logins.map((login) => ({ login })),
      async ({ login }) => {
        let row: CsvRow;
        try {
          row = plan.normalizeDetail(await this.deps.source.fetchUser(login));
        } catch (err) {
          this.applyDecision(classifyDetailFailure(err, { target: this.label, login }));
          this.report();
          return;
        }
        await this.write(writer, row);
        this.report();
      },
      { concurrency: this.config.concurrency, signal: this.options.signal }
    );

    if (outcome.cancelled) throw new HarvestAbandonedError();
  }
}

/**
 * On failure the export is either deleted or closed and kept, per
 * `partialExport`. Returns the kept path.
 */
const settleFailedExport = async (
  writer: CsvExportWriter,
  config: HarvesterConfig,
  jobId: string
): Promise<string | undefined> => {
  try {
    if (config.partialExport === "keep") {
      await writer.close();
      return writer.path;
    }
    await writer.discard();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "harvest.export_cleanup_failed",
      jobId,
      path: writer.path,
      policy: config.partialExport,
      message: toErrorMessage(err)
    }));
  }
  return undefined;
};

const recordRun = async (runs: HarvestRunRepository | undefined, result: HarvestResult): Promise<void> => {
  if (!runs) return;
  try {
    await runs.record({
      runId: result.jobId,
      target: result.target,
      status: result.status,
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      pagesFetched: result.pagesFetched,
      recordCount: result.recordCount,
      skippedByCode: result.skippedByCode,
      ...(result.status === "completed"
        ? { exportPath: result.exportPath }
        : {
            ...(result.partialExportPath ? { exportPath: result.partialExportPath } : {}),
            failure: { code: result.code, reason: result.reason }
          })
    });
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "harvest.run_record_failed",
      runId: result.jobId,
      message: toErrorMessage(err)
    }));
  }
};

/**
 * Harvests one target into a gzip CSV export. Never throws for harvest
 * failures: the caller gets either an export path with a record count or a
 * failure reason.
 */
export const runHarvest = async (
  deps: HarvestDeps,
  target: FetchTarget,
  options: HarvestOptions = {}
): Promise<HarvestResult> => {
  const config = resolveHarvesterConfig(options.config);
  const job = new HarvestJob(target, options.jobId);
  const run = new HarvestRun(job, deps, config, options);
  const stopWatchingRateLimit = run.watchRateLimit();
  let writer: CsvExportWriter | undefined;
  let partialExportPath: string | undefined;

  try {
    throwIfAbandoned(options.signal);
    run.report();
    const plan = await prepareHarvest(job.target, deps.source);
    throwIfAbandoned(options.signal);

    writer = await deps.openExport(join(config.outputDir, plan.fileName), plan.columns);
    job.phase = "listing";
    run.report();
    const logins = await run.crawlListing(plan, writer);

    if (plan.hasDetailPhase) {
      throwIfAbandoned(options.signal);
      job.phase = "details";
      run.report();
      await run.crawlDetails(plan, writer, logins);
    }

    await writer.close();
    job.complete();
  } catch (err) {
    job.fail(toJobFailure(err));
    if (writer) partialExportPath = await settleFailedExport(writer, config, job.id);
  } finally {
    stopWatchingRateLimit();
  }

  run.report();
  run.closeProgress();

  const summary: HarvestSummary = {
    jobId: job.id,
    target: job.target,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt ?? new Date(),
    pagesFetched: job.pagesFetched,
    recordCount: job.recordsWritten,
    skippedByCode: { ...job.skippedByCode }
  };

  let result: HarvestResult;
  if (job.status === "completed" && writer) {
    result = { ...summary, status: "completed", exportPath: writer.path };
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "harvest.completed",
      jobId: job.id,
      target: describeTarget(job.target),
      exportPath: writer.path,
      recordCount: summary.recordCount,
      pagesFetched: summary.pagesFetched,
      skippedByCode: summary.skippedByCode
    }));
  } else {
    const code = job.failure?.code ?? "unexpected";
    const reason = job.failure?.reason ?? "Harvest ended without a result";
    result = {
      ...summary,
      status: "failed",
      code,
      reason,
      ...(partialExportPath ? { partialExportPath } : {})
    };
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "harvest.failed",
      jobId: job.id,
      target: describeTarget(job.target),
      code,
      reason,
      recordCount: summary.recordCount,
      partialExportPath: partialExportPath ?? null
    }));
  }

  await recordRun(deps.runs, result);
  return result;
};

/**
 * Runs several harvests through a job-level queue. They share the deps (and
 * so one transport and one governor); a failing job never affects the others.
 * Results come back in target order.
 */
export const harvestTargets = async (
  deps: HarvestDeps,
  targets: readonly FetchTarget[],
  options: Omit<HarvestOptions, "jobId"> = {}
): Promise<HarvestResult[]> => {
  const config = resolveHarvesterConfig(options.config);
  const settled: { index: number; result: HarvestResult }[] = [];

  // No signal here: an abandoned queue still yields one "abandoned" result per target.
  await drainWorkQueue(
    targets.map((target, index) => ({ target, index })),
    async ({ target, index }) => {
      settled.push({ index, result: await runHarvest(deps, target, { ...options, config }) });
    },
    { concurrency: config.maxConcurrentJobs }
  );

  return settled.sort((a, b) => a.index - b.index).map((entry) => entry.result);
};
