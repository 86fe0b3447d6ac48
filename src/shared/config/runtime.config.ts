import {
  defaultHarvesterConfig,
  type HarvesterConfig,
  harvesterCaps,
  isPartialExportPolicy,
  partialExportPolicies,
  validateHarvesterConfig
} from "../../application/harvest/harvester.config";
import { defaultRetryPolicy, type RetryPolicy } from "../retry/retry";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 },
  retryDelayMs: { min: 1, max: 600000 }
} as const;

export type RuntimeConfig = {
  harvesterConfig: HarvesterConfig;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalPartialExport = (env: NodeJS.ProcessEnv, name: string) => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = raw.trim().toLowerCase();
  if (!isPartialExportPolicy(value)) {
    throw new Error(`${name}=${raw} must be one of: ${partialExportPolicies.join(", ")}`);
  }
  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const harvesterConfig = validateHarvesterConfig({
    ...defaultHarvesterConfig,
    concurrency:
      parseOptionalIntInRange(env, "HARVEST_CONCURRENCY", harvesterCaps.concurrency) ?? defaultHarvesterConfig.concurrency,
    pageSize: parseOptionalIntInRange(env, "HARVEST_PAGE_SIZE", harvesterCaps.pageSize) ?? defaultHarvesterConfig.pageSize,
    maxPages: parseOptionalIntInRange(env, "HARVEST_MAX_PAGES", harvesterCaps.maxPages) ?? defaultHarvesterConfig.maxPages,
    maxConcurrentJobs:
      parseOptionalIntInRange(env, "HARVEST_MAX_CONCURRENT_JOBS", harvesterCaps.maxConcurrentJobs) ??
      defaultHarvesterConfig.maxConcurrentJobs,
    outputDir: env.HARVEST_OUTPUT_DIR?.trim() ? env.HARVEST_OUTPUT_DIR.trim() : defaultHarvesterConfig.outputDir,
    partialExport: parseOptionalPartialExport(env, "HARVEST_PARTIAL_EXPORT") ?? defaultHarvesterConfig.partialExport
  });

  const timeoutMs = parseOptionalIntInRange(env, "GITHUB_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 10000;

  const minDelayMs =
    parseOptionalIntInRange(env, "HARVEST_RETRY_BASE_DELAY_MS", runtimeCaps.retryDelayMs) ?? defaultRetryPolicy.minDelayMs;
  const maxDelayMs =
    parseOptionalIntInRange(env, "HARVEST_RETRY_MAX_DELAY_MS", runtimeCaps.retryDelayMs) ?? defaultRetryPolicy.maxDelayMs;
  if (maxDelayMs < minDelayMs) {
    throw new Error(`HARVEST_RETRY_MAX_DELAY_MS=${maxDelayMs} must be >= HARVEST_RETRY_BASE_DELAY_MS=${minDelayMs}`);
  }

  return { harvesterConfig, timeoutMs, retryPolicy: { ...defaultRetryPolicy, minDelayMs, maxDelayMs } };
};
