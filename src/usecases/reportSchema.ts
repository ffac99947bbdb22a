import { z } from "zod";

import type { ReportColumn } from "../interfaces/index.js";

export const UINT64_MAX = 2n ** 64n - 1n;

// 9999-12-31 23:59:59 UTC, the last second a spreadsheet date can hold.
export const MAX_EPOCH_SECONDS = 253_402_300_799n;

const UNSIGNED_INTEGER_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Columns of the report in presentation order. The row index (`user`) is not a column.
 */
export const REPORT_COLUMNS = [
  { name: "duration_seconds", kind: "uint64" },
  { name: "removed_files", kind: "uint64" },
  { name: "removed_bytes", kind: "uint64" },
  { name: "kept_files", kind: "uint64" },
  { name: "kept_bytes", kind: "uint64" },
  { name: "failed_removed_files", kind: "uint64" },
  { name: "failed_removed_bytes", kind: "uint64" },
  { name: "total_files", kind: "uint64" },
  { name: "total_bytes", kind: "uint64" },
  { name: "directories", kind: "uint64" },
  { name: "symlinks", kind: "uint64" },
  { name: "unknown", kind: "uint64" },
  { name: "percent_files_removed", kind: "float64" },
  { name: "percent_bytes_removed", kind: "float64" },
  { name: "pre_purge_avg_file_size", kind: "float64" },
  { name: "purged_avg_file_size", kind: "float64" },
  { name: "post_purge_avg_file_size", kind: "float64" },
  { name: "removal_basis_time", kind: "timestamp" },
  { name: "current_time", kind: "timestamp" },
  { name: "finish_time", kind: "timestamp" },
  { name: "purge_success", kind: "boolean" },
  { name: "dry_run", kind: "boolean" },
] as const satisfies readonly ReportColumn[];

export const REPORT_INDEX_NAME = "user";

// Human-readable duplicates of the epoch fields. Required, then discarded.
export const LEGACY_TIME_STRING_FIELDS = [
  "current_time_str",
  "removal_basis_time_str",
  "finish_time_str",
] as const;

const uint64 = z.string().transform((value, ctx) => {
  if (!UNSIGNED_INTEGER_PATTERN.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected an unsigned integer" });
    return z.NEVER;
  }
  const parsed = BigInt(value);
  if (parsed > UINT64_MAX) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "exceeds the unsigned 64-bit range" });
    return z.NEVER;
  }
  return parsed;
});

const float64 = z.string().transform((value, ctx) => {
  const parsed = Number(value);
  if (!DECIMAL_PATTERN.test(value) || !Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a finite decimal number" });
    return z.NEVER;
  }
  return parsed;
});

const boolean = z.string().transform((value, ctx) => {
  const normalized = value.toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected "true" or "false"' });
  return z.NEVER;
});

const epochSeconds = uint64.transform((seconds, ctx) => {
  if (seconds > MAX_EPOCH_SECONDS) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "outside the representable date range" });
    return z.NEVER;
  }
  return new Date(Number(seconds) * 1000);
});

export const purgeSummarySchema = z.object({
  directory: z.string(),
  current_time: epochSeconds,
  removal_basis_time: epochSeconds,
  finish_time: epochSeconds,
  duration_seconds: uint64,
  removed_bytes: uint64,
  removed_files: uint64,
  failed_removed_bytes: uint64,
  failed_removed_files: uint64,
  kept_bytes: uint64,
  kept_files: uint64,
  directories: uint64,
  symlinks: uint64,
  unknown: uint64,
  percent_bytes_removed: float64,
  percent_files_removed: float64,
  pre_purge_avg_file_size: float64,
  post_purge_avg_file_size: float64,
  purged_avg_file_size: float64,
  dry_run: boolean,
  purge_success: boolean,
});

export type PurgeSummary = z.infer<typeof purgeSummarySchema>;

export const REQUIRED_SUMMARY_FIELDS: readonly string[] = [
  ...Object.keys(purgeSummarySchema.shape),
  ...LEGACY_TIME_STRING_FIELDS,
];
