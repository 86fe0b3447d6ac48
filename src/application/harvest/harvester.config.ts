export type PartialExportPolicy = "discard" | "keep";

export type HarvesterConfig = {
  concurrency: number;
  pageSize: number;
  maxPages: number;
  maxConcurrentJobs: number;
  outputDir: string;
  partialExport: PartialExportPolicy;
  progressCapacity: number;
};

export type HarvesterConfigInput = Partial<HarvesterConfig>;

export const defaultHarvesterConfig: HarvesterConfig = {
  concurrency: 10,
  pageSize: 100,
  maxPages: 1000,
  maxConcurrentJobs: 2,
  outputDir: ".",
  partialExport: "discard",
  progressCapacity: 32
};

export const harvesterCaps = {
  concurrency: { min: 1, max: 50 },
  // GitHub caps per_page at 100.
  pageSize: { min: 1, max: 100 },
  maxPages: { min: 1, max: 100000 },
  maxConcurrentJobs: { min: 1, max: 10 },
  progressCapacity: { min: 1, max: 1024 }
} as const;

export const partialExportPolicies: readonly PartialExportPolicy[] = ["discard", "keep"];

export const isPartialExportPolicy = (value: string): value is PartialExportPolicy =>
  (partialExportPolicies as readonly string[]).includes(value);

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateHarvesterConfig = (config: HarvesterConfig): HarvesterConfig => {
  assertIntegerInRange("concurrency", config.concurrency, harvesterCaps.concurrency.min, harvesterCaps.concurrency.max);
  assertIntegerInRange("pageSize", config.pageSize, harvesterCaps.pageSize.min, harvesterCaps.pageSize.max);
  assertIntegerInRange("maxPages", config.maxPages, harvesterCaps.maxPages.min, harvesterCaps.maxPages.max);
  assertIntegerInRange(
    "maxConcurrentJobs",
    config.maxConcurrentJobs,
    harvesterCaps.maxConcurrentJobs.min,
    harvesterCaps.maxConcurrentJobs.max
  );
  assertIntegerInRange(
    "progressCapacity",
    config.progressCapacity,
    harvesterCaps.progressCapacity.min,
    harvesterCaps.progressCapacity.max
  );
  if (!isPartialExportPolicy(config.partialExport)) {
    throw new Error(`partialExport must be one of: ${partialExportPolicies.join(", ")}. Received: ${String(config.partialExport)}`);
  }
  if (config.outputDir.trim() === "") {
    throw new Error("outputDir must not be empty");
  }
  return config;
};

export const resolveHarvesterConfig = (input: HarvesterConfigInput = {}): HarvesterConfig =>
  validateHarvesterConfig({
    ...defaultHarvesterConfig,
    ...input,
    outputDir: input.outputDir?.trim() || defaultHarvesterConfig.outputDir
  });
