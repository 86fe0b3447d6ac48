export {
  harvestTargets,
  runHarvest,
  type HarvestDeps,
  type HarvestOptions,
  type HarvestProgress,
  type HarvestResult
} from "./application/harvest/harvest.usecase";
export {
  defaultHarvesterConfig,
  resolveHarvesterConfig,
  type HarvesterConfig,
  type PartialExportPolicy
} from "./application/harvest/harvester.config";
export { runHarvests, type RunHarvestsOptions } from "./composition/root";
export * from "./core/errors/harvest.errors";
export { describeTarget, parseFetchTarget, type FetchTarget, type HarvestKind } from "./core/target/fetchTarget";
export {
  normalizeContributor,
  normalizeFollower,
  normalizeFork,
  normalizeRepositoryContext
} from "./core/records/normalizeRecord";
export { sanitizeText } from "./core/records/sanitizeText";
export type { Page, RawRecord } from "./core/records/record.types";
export { openGzipCsvExport, withGzipCsvExport } from "./infrastructure/export/GzipCsvExportSink";
export { GitHubHttpClient } from "./infrastructure/github/GitHubHttpClient";
export { GitHubPageFetcher } from "./infrastructure/github/GitHubPageFetcher";
export { MongoHarvestRunRepository } from "./infrastructure/mongo/MongoHarvestRunRepository";
export { RateGovernor, type RateState } from "./shared/rate-limit/RateGovernor";
