import { mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { constants, gunzipSync } from "zlib";
import { ExportWriteError } from "../../src/core/errors/harvest.errors";
import {
  escapeCsvField,
  openGzipCsvExport,
  toCsvLine,
  withGzipCsvExport
} from "../../src/infrastructure/export/GzipCsvExportSink";

const readCsv = async (path: string): Promise<string> => gunzipSync(await readFile(path)).toString("utf8");

const exists = async (path: string): Promise<boolean> =>
  stat(path).then(
    () => true,
    () => false
  );

describe("CSV encoding", () => {
  it.each([
    ["plain", "plain"],
    ["", ""],
    ["a,b", '"a,b"'],
    ['say "hi"', '"say ""hi"""'],
    ["two\nlines", '"two\nlines"'],
    [" leading", '" leading"']
  ])("escapes %j", (value, expected) => {
    expect(escapeCsvField(value)).toBe(expected);
  });

  it("joins fields with commas and ends lines with \\n", () => {
    expect(toCsvLine(["login", "name, full", "9"])).toBe('login,"name, full",9\n');
  });
});

describe("openGzipCsvExport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "harvest-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a header row and the rows in order as one gzip stream", async () => {
    const path = join(dir, "nested", "followers.csv.gz");
    const writer = await openGzipCsvExport(path, ["login", "bio"]);

    await writer.writeRow({ login: "octocat", bio: "Loves, commas" });
    await writer.writeRow({ login: "hubot" });
    await writer.close();

    expect(writer.rowsWritten()).toBe(2);
    expect(await readCsv(path)).toBe('login,bio\noctocat,"Loves, commas"\nhubot,\n');
  });

  it("produces a valid file with only the header when no rows are written", async () => {
    const path = join(dir, "empty.csv.gz");
    const writer = await openGzipCsvExport(path, ["full_name"]);
    await writer.close();

    expect(await readCsv(path)).toBe("full_name\n");
  });

  it("makes flushed rows readable before the export is closed", async () => {
    const path = join(dir, "partial.csv.gz");
    const writer = await openGzipCsvExport(path, ["login"], { flushEveryRows: 2 });
    await writer.writeRow({ login: "a" });
    await writer.writeRow({ login: "b" });

    let partial = "";
    for (let attempt = 0; attempt < 50 && !partial.includes("b\n"); attempt += 1) {
      await new Promise((resolve) => setTimeout(resolve, 10));
      try {
        partial = gunzipSync(await readFile(path), { finishFlush: constants.Z_SYNC_FLUSH }).toString("utf8");
      } catch {
        partial = "";
      }
    }

    expect(partial).toBe("login\na\nb\n");
    await writer.close();
  });

  it("discard closes and deletes the file", async () => {
    const path = join(dir, "gone.csv.gz");
    const writer = await openGzipCsvExport(path, ["login"]);
    await writer.writeRow({ login: "a" });

    await writer.discard();

    expect(await exists(path)).toBe(false);
  });

  it("rejects writes after close", async () => {
    const path = join(dir, "closed.csv.gz");
    const writer = await openGzipCsvExport(path, ["login"]);
    await writer.close();

    await expect(writer.writeRow({ login: "late" })).rejects.toThrow(ExportWriteError);
  });

  it("wraps filesystem failures in ExportWriteError", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");

    const error = await openGzipCsvExport(join(blocker, "out.csv.gz"), ["login"]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExportWriteError);
    expect(error).toMatchObject({ code: "export_write_failed", context: { path: join(blocker, "out.csv.gz") } });
  });

  it("rejects a flush cadence below one row", async () => {
    await expect(openGzipCsvExport(join(dir, "x.csv.gz"), ["login"], { flushEveryRows: 0 })).rejects.toThrow(
      "flushEveryRows must be an integer >= 1"
    );
  });
});

describe("withGzipCsvExport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "harvest-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("closes the export when the callback throws, leaving a valid file", async () => {
    const path = join(dir, "scoped.csv.gz");

    await expect(
      withGzipCsvExport(path, ["login"], async (writer) => {
        await writer.writeRow({ login: "first" });
        throw new Error("listing failed");
      })
    ).rejects.toThrow("listing failed");

    expect(await readCsv(path)).toBe("login\nfirst\n");
  });

  it("returns the callback result", async () => {
    const path = join(dir, "scoped.csv.gz");

    const count = await withGzipCsvExport(path, ["login"], async (writer) => {
      await writer.writeRow({ login: "a" });
      return writer.rowsWritten();
    });

    expect(count).toBe(1);
  });
});
