import { readFile } from "node:fs/promises";
import { deserialize, serialize } from "node:v8";
import { z } from "zod";

import type { PurgeReport } from "../../interfaces/index.js";

import { ParseError, SnapshotFormatError, describeError } from "../../usecases/errors.js";
import { REPORT_COLUMNS, REPORT_INDEX_NAME } from "../../usecases/reportSchema.js";

export const SNAPSHOT_FORMAT = "purge-report-snapshot";
export const SNAPSHOT_VERSION = 1;
export const SNAPSHOT_EXTENSION = ".snapshot";

const snapshotRowSchema = z
  .object({
    user: z.string(),
    duration_seconds: z.bigint(),
    removed_files: z.bigint(),
    removed_bytes: z.bigint(),
    kept_files: z.bigint(),
    kept_bytes: z.bigint(),
    failed_removed_files: z.bigint(),
    failed_removed_bytes: z.bigint(),
    total_files: z.bigint(),
    total_bytes: z.bigint(),
    directories: z.bigint(),
    symlinks: z.bigint(),
    unknown: z.bigint(),
    percent_files_removed: z.number(),
    percent_bytes_removed: z.number(),
    pre_purge_avg_file_size: z.number(),
    purged_avg_file_size: z.number(),
    post_purge_avg_file_size: z.number(),
    removal_basis_time: z.date(),
    current_time: z.date(),
    finish_time: z.date(),
    purge_success: z.boolean(),
    dry_run: z.boolean(),
  })
  .strict();

const snapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  indexName: z.literal(REPORT_INDEX_NAME),
  columns: z.array(z.object({ name: z.string(), kind: z.string() })),
  rows: z.array(snapshotRowSchema),
});

type SnapshotEnvelope = z.infer<typeof snapshotSchema>;

function hasExpectedColumns(columns: SnapshotEnvelope["columns"]): boolean {
  return (
    columns.length === REPORT_COLUMNS.length &&
    columns.every(
      (column, index) =>
        column.name === REPORT_COLUMNS[index].name && column.kind === REPORT_COLUMNS[index].kind,
    )
  );
}

export function serializeSnapshot(report: PurgeReport): Buffer {
  const envelope: SnapshotEnvelope = {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    indexName: report.indexName,
    columns: report.columns,
    rows: report.rows,
  };
  return serialize(envelope);
}

export function deserializeSnapshot(buffer: Buffer): PurgeReport {
  let decoded: unknown;
  try {
    decoded = deserialize(buffer);
  } catch (error) {
    throw new SnapshotFormatError(`Unable to decode report snapshot: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = snapshotSchema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SnapshotFormatError(
      `Invalid report snapshot at "${issue.path.join(".")}": ${issue.message}`,
    );
  }
  if (!hasExpectedColumns(parsed.data.columns)) {
    throw new SnapshotFormatError("Report snapshot columns do not match this report version");
  }

  return {
    indexName: parsed.data.indexName,
    columns: REPORT_COLUMNS.map((column) => ({ ...column })),
    rows: parsed.data.rows,
  };
}

export async function readSnapshot(snapshotPath: string): Promise<PurgeReport> {
  let buffer: Buffer;
  try {
    buffer = await readFile(snapshotPath);
  } catch (error) {
    throw new ParseError(snapshotPath, error);
  }
  return deserializeSnapshot(buffer);
}
