export type LogRecord = Record<string, string>;

export type ParsedLogFile = {
  sourceFile: string;
  fields: LogRecord;
};

export type ParseResult = {
  records: ParsedLogFile[];
  skippedFiles: string[];
};

export type ColumnKind = "uint64" | "float64" | "boolean" | "timestamp";

export type ReportColumn = {
  name: ReportColumnName;
  kind: ColumnKind;
};

export type Uint64ColumnName =
  | "duration_seconds"
  | "removed_files"
  | "removed_bytes"
  | "kept_files"
  | "kept_bytes"
  | "failed_removed_files"
  | "failed_removed_bytes"
  | "total_files"
  | "total_bytes"
  | "directories"
  | "symlinks"
  | "unknown";

export type FloatColumnName =
  | "percent_files_removed"
  | "percent_bytes_removed"
  | "pre_purge_avg_file_size"
  | "purged_avg_file_size"
  | "post_purge_avg_file_size";

export type TimestampColumnName = "removal_basis_time" | "current_time" | "finish_time";

export type BooleanColumnName = "purge_success" | "dry_run";

export type ReportColumnName =
  | Uint64ColumnName
  | FloatColumnName
  | TimestampColumnName
  | BooleanColumnName;

export type PurgeReportRow = { user: string } & Record<Uint64ColumnName, bigint> &
  Record<FloatColumnName, number> &
  Record<TimestampColumnName, Date> &
  Record<BooleanColumnName, boolean>;

export type ReportCellValue = string | bigint | number | boolean | Date;

export type PurgeReport = {
  indexName: "user";
  columns: ReportColumn[];
  rows: PurgeReportRow[];
};

export type ReportOutputPaths = {
  snapshotPath: string;
  spreadsheetPath: string;
};

export type ReportRunSummary = {
  logFilesFound: number;
  recordsParsed: number;
  skippedFiles: string[];
  users: string[];
  snapshotPath: string;
  spreadsheetPath: string;
  startedAt: string;
  finishedAt: string;
};

export type ReportLogger = {
  info(message: string): void;
};
