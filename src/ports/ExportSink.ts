export type CsvRow = Readonly<Record<string, string>>;

export interface CsvExportWriter {
  readonly path: string;
  writeRow(row: CsvRow): Promise<void>;
  rowsWritten(): number;
  /** Flushes and ends the gzip stream; the file stays valid. */
  close(): Promise<void>;
  /** Closes and deletes the file. */
  discard(): Promise<void>;
}

export type OpenExport = (path: string, columns: readonly string[]) => Promise<CsvExportWriter>;
