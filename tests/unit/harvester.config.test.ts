import { resolveHarvesterConfig, validateHarvesterConfig } from "../../src/application/harvest/harvester.config";

describe("harvester config", () => {
  it("fills defaults and keeps overrides", () => {
    expect(resolveHarvesterConfig({ concurrency: 4, outputDir: "  out " })).toEqual({
      concurrency: 4,
      pageSize: 100,
      maxPages: 1000,
      maxConcurrentJobs: 2,
      outputDir: "out",
      partialExport: "discard",
      progressCapacity: 32
    });
  });

  it("falls back to the default output directory for blank input", () => {
    expect(resolveHarvesterConfig({ outputDir: " " }).outputDir).toBe(".");
  });

  it.each([
    [{ concurrency: 0 }, "concurrency=0 is out of allowed range [1..50]"],
    [{ pageSize: 101 }, "pageSize=101 is out of allowed range [1..100]"],
    [{ maxPages: 1.5 }, "maxPages=1.5 is out of allowed range [1..100000]"],
    [{ maxConcurrentJobs: 11 }, "maxConcurrentJobs=11 is out of allowed range [1..10]"],
    [{ progressCapacity: 0 }, "progressCapacity=0 is out of allowed range [1..1024]"]
  ])("rejects %j", (input, message) => {
    expect(() => resolveHarvesterConfig(input)).toThrow(message);
  });

  it("rejects an empty output directory when validating a full config", () => {
    expect(() =>
      validateHarvesterConfig({
        concurrency: 1,
        pageSize: 1,
        maxPages: 1,
        maxConcurrentJobs: 1,
        outputDir: "",
        partialExport: "keep",
        progressCapacity: 1
      })
    ).toThrow("outputDir must not be empty");
  });
});
