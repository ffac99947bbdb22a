import type { ZodError } from "zod";

import type { ParsedLogFile, PurgeReport, PurgeReportRow } from "../interfaces/index.js";

import {
  CoercionError,
  DuplicateUserError,
  MissingFieldError,
  OverflowError,
  PrefixMismatchError,
  SchemaError,
} from "./errors.js";
import {
  REPORT_COLUMNS,
  REPORT_INDEX_NAME,
  REQUIRED_SUMMARY_FIELDS,
  UINT64_MAX,
  purgeSummarySchema,
} from "./reportSchema.js";

export type NormalizeOptions = {
  mountPrefix: string;
};

function assertRequiredFields(record: ParsedLogFile): void {
  for (const field of REQUIRED_SUMMARY_FIELDS) {
    if (!Object.hasOwn(record.fields, field)) {
      throw new MissingFieldError(record.sourceFile, field);
    }
  }
}

export function deriveUser(record: ParsedLogFile, mountPrefix: string): string {
  const directory = record.fields.directory;
  if (directory === undefined) throw new MissingFieldError(record.sourceFile, "directory");

  if (!directory.startsWith(mountPrefix) || directory.length === mountPrefix.length) {
    throw new PrefixMismatchError(record.sourceFile, directory, mountPrefix);
  }
  return directory.slice(mountPrefix.length);
}

function toCoercionError(record: ParsedLogFile, error: ZodError): CoercionError {
  const issue = error.issues[0];
  const field = issue ? String(issue.path[0]) : "unknown";
  const value = record.fields[field] ?? "";
  return new CoercionError(record.sourceFile, field, value, issue?.message ?? error.message);
}

function checkedSum(sourceFile: string, field: string, values: bigint[]): bigint {
  const total = values.reduce((sum, value) => sum + value, 0n);
  if (total > UINT64_MAX) throw new OverflowError(sourceFile, field);
  return total;
}

// UTF-8 byte order, which is also codepoint order.
function compareUsers(a: PurgeReportRow, b: PurgeReportRow): number {
  return Buffer.compare(Buffer.from(a.user, "utf8"), Buffer.from(b.user, "utf8"));
}

function toRow(record: ParsedLogFile, user: string): PurgeReportRow {
  const parsed = purgeSummarySchema.safeParse(record.fields);
  if (!parsed.success) throw toCoercionError(record, parsed.error);
  const summary = parsed.data;

  return {
    user,
    duration_seconds: summary.duration_seconds,
    removed_files: summary.removed_files,
    removed_bytes: summary.removed_bytes,
    kept_files: summary.kept_files,
    kept_bytes: summary.kept_bytes,
    failed_removed_files: summary.failed_removed_files,
    failed_removed_bytes: summary.failed_removed_bytes,
    total_files: checkedSum(record.sourceFile, "total_files", [
      summary.removed_files,
      summary.failed_removed_files,
      summary.kept_files,
    ]),
    total_bytes: checkedSum(record.sourceFile, "total_bytes", [
      summary.removed_bytes,
      summary.failed_removed_bytes,
      summary.kept_bytes,
    ]),
    directories: summary.directories,
    symlinks: summary.symlinks,
    unknown: summary.unknown,
    percent_files_removed: summary.percent_files_removed,
    percent_bytes_removed: summary.percent_bytes_removed,
    pre_purge_avg_file_size: summary.pre_purge_avg_file_size,
    purged_avg_file_size: summary.purged_avg_file_size,
    post_purge_avg_file_size: summary.post_purge_avg_file_size,
    removal_basis_time: summary.removal_basis_time,
    current_time: summary.current_time,
    finish_time: summary.finish_time,
    purge_success: summary.purge_success,
    dry_run: summary.dry_run,
  };
}

/**
 * Merges parsed log records into one report: one row per user, typed columns in
 * presentation order, sorted by user. Throws a `SchemaError` on the first record
 * that cannot be represented; no partial report is produced.
 */
export function normalizeRecords(records: ParsedLogFile[], options: NormalizeOptions): PurgeReport {
  if (records.length === 0) {
    throw new SchemaError("No summary records were found in any log file");
  }

  const sourceByUser = new Map<string, string>();
  const rows: PurgeReportRow[] = [];

  for (const record of records) {
    assertRequiredFields(record);
    const user = deriveUser(record, options.mountPrefix);

    const firstSource = sourceByUser.get(user);
    if (firstSource !== undefined) {
      throw new DuplicateUserError(user, firstSource, record.sourceFile);
    }
    sourceByUser.set(user, record.sourceFile);

    rows.push(toRow(record, user));
  }

  rows.sort(compareUsers);

  return {
    indexName: REPORT_INDEX_NAME,
    columns: REPORT_COLUMNS.map((column) => ({ ...column })),
    rows,
  };
}
