import { harvestTargets, type HarvestProgress, type HarvestResult } from "../application/harvest/harvest.usecase";
import type { FetchTarget } from "../core/target/fetchTarget";
import { openGzipCsvExport } from "../infrastructure/export/GzipCsvExportSink";
import { GitHubHttpClient } from "../infrastructure/github/GitHubHttpClient";
import { GitHubPageFetcher } from "../infrastructure/github/GitHubPageFetcher";
import { MongoHarvestRunRepository } from "../infrastructure/mongo/MongoHarvestRunRepository";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import type { ProgressListener } from "../shared/progress/progressChannel";
import { RateGovernor } from "../shared/rate-limit/RateGovernor";

export type RunHarvestsOptions = {
  onProgress?: ProgressListener<HarvestProgress>;
  signal?: AbortSignal;
};

/**
 * Wires one governor and one transport for the whole process and runs the
 * targets through the job queue. The Mongo ledger is only attached when
 * MONGO_URI is set.
 */
export const runHarvests = async (
  targets: readonly FetchTarget[],
  options: RunHarvestsOptions = {}
): Promise<HarvestResult[]> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const governor = new RateGovernor();
  const transport = new GitHubHttpClient(env.GITHUB_TOKEN, governor, {
    timeoutMs: runtime.timeoutMs,
    retry: runtime.retryPolicy
  });
  const source = new GitHubPageFetcher(transport, env.GITHUB_API_URL, runtime.harvesterConfig.pageSize);
  const runs = env.MONGO_URI ? new MongoHarvestRunRepository(env.MONGO_URI) : undefined;

  try {
    return await harvestTargets(
      { source, openExport: (path, columns) => openGzipCsvExport(path, columns), runs, governor },
      targets,
      { config: runtime.harvesterConfig, onProgress: options.onProgress, signal: options.signal }
    );
  } finally {
    await runs?.close();
  }
};
