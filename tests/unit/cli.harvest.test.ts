describe("harvest CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const completed = {
    status: "completed",
    jobId: "job-1",
    target: { kind: "followers", username: "octocat" },
    exportPath: "github_followers_octocat.csv.gz",
    recordCount: 137,
    pagesFetched: 2,
    skippedByCode: {}
  };

  const failed = {
    status: "failed",
    jobId: "job-2",
    target: { kind: "contributors", owner: "octocat", repo: "hello-world" },
    code: "not_found",
    reason: "GitHub resource not found: 404",
    recordCount: 8,
    pagesFetched: 2,
    skippedByCode: {}
  };

  const mockExit = () =>
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/harvest");

    const error = Object.assign(new Error("export failed"), {
      name: "ExportWriteError",
      code: "export_write_failed",
      context: {
        page: 2,
        path: "out/github_forks_octocat.csv.gz",
        status: 500,
        token: "test-secret"
      },
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "harvest.cli_failed",
      name: "ExportWriteError",
      message: "export failed",
      code: "export_write_failed",
      context: {
        page: 2,
        path: "out/github_forks_octocat.csv.gz",
        status: 500
      }
    });
    expect(envelope).not.toHaveProperty("stack");
    expect(JSON.stringify(envelope)).not.toContain("test-secret");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/harvest");

    const envelope = buildCliErrorEnvelope(new Error("boom"), true);
    expect(envelope.stack).toContain("Error: boom");
    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "1" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
    expect(isDebugMode({})).toBe(false);
  });

  it("parses targets, the default username and the progress flag", async () => {
    const { parseCliArgs } = await import("../../src/cli/harvest");

    expect(parseCliArgs(["followers", "contributors:octocat/hello-world", "--progress"], "octocat")).toEqual({
      targets: [
        { kind: "followers", username: "octocat" },
        { kind: "contributors", owner: "octocat", repo: "hello-world" }
      ],
      progress: true
    });
    expect(parseCliArgs(["forks:octocat"]).progress).toBe(false);
  });

  it("rejects unknown options and an empty target list", async () => {
    const { parseCliArgs } = await import("../../src/cli/harvest");

    expect(() => parseCliArgs(["followers:octocat", "--verbose"])).toThrow(
      "Unknown option --verbose. Usage: github-harvester"
    );
    expect(() => parseCliArgs(["--progress"])).toThrow("No harvest target given. Usage: github-harvester");
  });

  it("prints one result line per job and exits 1 when any job failed", async () => {
    const runHarvests = jest.fn().mockResolvedValue([completed, failed]);
    const loadEnv = jest.fn().mockReturnValue({ GITHUB_TOKEN: "test-secret", GITHUB_API_URL: "https://api.github.com" });
    jest.doMock("../../src/composition/root", () => ({ runHarvests }));
    jest.doMock("../../src/shared/config/env", () => ({ loadEnv }));

    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeHarvestCli } = await import("../../src/cli/harvest");
    await expect(
      executeHarvestCli(["followers:octocat", "contributors:octocat/hello-world"])
    ).rejects.toThrow("EXIT:1");

    expect(runHarvests).toHaveBeenCalledWith(
      [
        { kind: "followers", username: "octocat" },
        { kind: "contributors", owner: "octocat", repo: "hello-world" }
      ],
      expect.objectContaining({ onProgress: undefined })
    );
    expect(logSpy.mock.calls.map((call) => JSON.parse(String(call[0])))).toEqual([
      {
        event: "harvest.result",
        status: "completed",
        target: "followers:octocat",
        exportPath: "github_followers_octocat.csv.gz",
        recordCount: 137
      },
      {
        event: "harvest.result",
        status: "failed",
        target: "contributors:octocat/hello-world",
        code: "not_found",
        reason: "GitHub resource not found: 404",
        recordCount: 8,
        partialExportPath: null
      }
    ]);
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("exits normally when every job completed", async () => {
    const runHarvests = jest.fn().mockResolvedValue([completed]);
    const loadEnv = jest.fn().mockReturnValue({ GITHUB_TOKEN: "", GITHUB_API_URL: "https://api.github.com" });
    jest.doMock("../../src/composition/root", () => ({ runHarvests }));
    jest.doMock("../../src/shared/config/env", () => ({ loadEnv }));

    jest.spyOn(console, "log").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeHarvestCli } = await import("../../src/cli/harvest");
    await executeHarvestCli(["followers:octocat"]);

    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("logs a sanitized envelope and exits with code 1 on an unexpected failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const runHarvests = jest.fn().mockRejectedValue(Object.assign(new Error("bad config"), {
      name: "ConfigError",
      code: "config_invalid",
      context: { url: "https://api.github.com/users/octocat" },
      cause: { huge: "do-not-print-this" }
    }));
    const loadEnv = jest.fn().mockReturnValue({ GITHUB_TOKEN: "", GITHUB_API_URL: "https://api.github.com" });
    jest.doMock("../../src/composition/root", () => ({ runHarvests }));
    jest.doMock("../../src/shared/config/env", () => ({ loadEnv }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeHarvestCli } = await import("../../src/cli/harvest");
    await expect(executeHarvestCli(["forks:octocat"])).rejects.toThrow("EXIT:1");

    expect(runHarvests).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);

    const logged = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(JSON.parse(logged)).toEqual({
      event: "harvest.cli_failed",
      name: "ConfigError",
      message: "bad config",
      code: "config_invalid",
      context: { url: "https://api.github.com/users/octocat" }
    });
    expect(logged).not.toContain("do-not-print-this");
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("reports a bad target through the envelope without starting a harvest", async () => {
    const runHarvests = jest.fn();
    const loadEnv = jest.fn().mockReturnValue({ GITHUB_TOKEN: "", GITHUB_API_URL: "https://api.github.com" });
    jest.doMock("../../src/composition/root", () => ({ runHarvests }));
    jest.doMock("../../src/shared/config/env", () => ({ loadEnv }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    mockExit();

    const { executeHarvestCli } = await import("../../src/cli/harvest");
    await expect(executeHarvestCli(["stars:octocat"])).rejects.toThrow("EXIT:1");

    expect(runHarvests).not.toHaveBeenCalled();
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0] ?? ""))).toMatchObject({
      event: "harvest.cli_failed",
      message: 'Unknown harvest kind "stars". Expected one of: followers, contributors, forks'
    });
  });
});
