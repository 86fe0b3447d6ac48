import { createWriteStream, type WriteStream } from "fs";
import { mkdir, rm } from "fs/promises";
import { dirname } from "path";
import { once } from "events";
import { constants, createGzip, type Gzip } from "zlib";
import { ExportWriteError, toErrorMessage } from "../../core/errors/harvest.errors";
import type { CsvExportWriter, CsvRow } from "../../ports/ExportSink";

export type GzipCsvExportOptions = {
  // Sync-flush cadence; an interrupted file is readable up to the last flush.
  flushEveryRows?: number;
};

const needsQuoting = /[",\r\n]/;

export const escapeCsvField = (value: string): string =>
  needsQuoting.test(value) || value !== value.trim() ? `"${value.replace(/"/g, '""')}"` : value;

export const toCsvLine = (fields: readonly string[]): string => `${fields.map(escapeCsvField).join(",")}\n`;

class GzipCsvExportWriter implements CsvExportWriter {
  private rows = 0;
  private failure?: ExportWriteError;
  private finished?: Promise<void>;

  constructor(
    readonly path: string,
    private readonly columns: readonly string[],
    private readonly gzip: Gzip,
    private readonly file: WriteStream,
    private readonly flushEveryRows: number
  ) {
    const onError = (err: unknown) => {
      this.failure ??= this.wrap(err);
      file.destroy();
    };
    gzip.on("error", onError);
    file.on("error", onError);
    gzip.pipe(file);
  }

  private wrap(err: unknown): ExportWriteError {
    return new ExportWriteError({
      message: `Export write failed for ${this.path}: ${toErrorMessage(err)}`,
      context: { path: this.path },
      cause: err
    });
  }

  private assertWritable(): void {
    if (this.failure) throw this.failure;
    if (this.finished) {
      throw new ExportWriteError({ message: `Export ${this.path} is already closed`, context: { path: this.path } });
    }
  }

  async writeLine(line: string): Promise<void> {
    this.assertWritable();
    if (!this.gzip.write(line)) {
      // A stream error settles the wait; onError has recorded it as the failure.
      await Promise.race([once(this.gzip, "drain"), once(this.file, "close")]).catch((err: unknown) => {
        this.failure ??= this.wrap(err);
      });
    }
    if (this.failure) throw this.failure;
  }

  async writeRow(row: CsvRow): Promise<void> {
    await this.writeLine(toCsvLine(this.columns.map((column) => row[column] ?? "")));
    this.rows += 1;
    if (this.rows % this.flushEveryRows === 0) {
      this.gzip.flush(constants.Z_SYNC_FLUSH);
    }
  }

  rowsWritten(): number {
    return this.rows;
  }

  close(): Promise<void> {
    this.finished ??= new Promise<void>((resolve, reject) => {
      const settle = () => (this.failure ? reject(this.failure) : resolve());
      if (this.file.closed) {
        settle();
        return;
      }
      this.file.once("close", settle);
      this.gzip.end();
    });
    return this.finished;
  }

  async discard(): Promise<void> {
    try {
      await this.close();
    } finally {
      await rm(this.path, { force: true });
    }
  }
}

/**
 * Opens a streaming gzip-wrapped CSV file and writes the header row. Rows
 * reach disk in the order `writeRow` is called.
 */
export const openGzipCsvExport = async (
  path: string,
  columns: readonly string[],
  options: GzipCsvExportOptions = {}
): Promise<CsvExportWriter> => {
  const flushEveryRows = options.flushEveryRows ?? 100;
  if (!Number.isInteger(flushEveryRows) || flushEveryRows < 1) {
    throw new Error("flushEveryRows must be an integer >= 1");
  }

  try {
    await mkdir(dirname(path), { recursive: true });
    const file = createWriteStream(path);
    await once(file, "open");
    const gzip = createGzip();
    const writer = new GzipCsvExportWriter(path, columns, gzip, file, flushEveryRows);
    await writer.writeLine(toCsvLine(columns));
    return writer;
  } catch (err) {
    if (err instanceof ExportWriteError) throw err;
    throw new ExportWriteError({
      message: `Export could not be opened at ${path}: ${toErrorMessage(err)}`,
      context: { path },
      cause: err
    });
  }
};

/** Scoped writer: the export is closed when `fn` settles, even on failure. */
export const withGzipCsvExport = async <T>(
  path: string,
  columns: readonly string[],
  fn: (writer: CsvExportWriter) => Promise<T>,
  options?: GzipCsvExportOptions
): Promise<T> => {
  const writer = await openGzipCsvExport(path, columns, options);
  try {
    return await fn(writer);
  } finally {
    await writer.close();
  }
};
