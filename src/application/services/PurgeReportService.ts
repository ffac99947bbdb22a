import { join } from "node:path";

import { listLogFiles, parseLogFiles } from "../../infrastructure/parsing/PurgeLogParser.js";
import {
  SNAPSHOT_EXTENSION,
  readSnapshot,
} from "../../infrastructure/persistence/ReportSnapshot.js";
import { SPREADSHEET_EXTENSION } from "../../infrastructure/persistence/ReportSpreadsheet.js";
import {
  assertOutputsAvailable,
  writeReport,
} from "../../infrastructure/persistence/ReportWriter.js";
import type {
  PurgeReport,
  ReportLogger,
  ReportOutputPaths,
  ReportRunSummary,
} from "../../interfaces/index.js";
import { NoLogFilesError } from "../../usecases/errors.js";
import { normalizeRecords } from "../../usecases/normalize.js";

export type GenerateReportInput = {
  logDir: string;
  outDir: string;
  fileName: string;
};

export type PurgeReportServiceOptions = {
  mountPrefix: string;
  logger?: ReportLogger;
};

const silentLogger: ReportLogger = { info: () => {} };

export function resolveOutputPaths(outDir: string, fileName: string): ReportOutputPaths {
  return {
    snapshotPath: join(outDir, `${fileName}${SNAPSHOT_EXTENSION}`),
    spreadsheetPath: join(outDir, `${fileName}${SPREADSHEET_EXTENSION}`),
  };
}

export class PurgeReportService {
  private readonly logger: ReportLogger;

  constructor(private readonly options: PurgeReportServiceOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async generate(input: GenerateReportInput): Promise<ReportRunSummary> {
    const startedAt = new Date().toISOString();
    const outputs = resolveOutputPaths(input.outDir, input.fileName);
    await assertOutputsAvailable(outputs);

    const logFiles = await listLogFiles(input.logDir);
    if (logFiles.length === 0) throw new NoLogFilesError(input.logDir);
    this.logger.info(`Found ${logFiles.length} log file(s) in ${input.logDir}`);

    const { records, skippedFiles } = await parseLogFiles(logFiles);
    this.logger.info(`Parsed ${records.length} summary record(s)`);
    for (const skipped of skippedFiles) {
      this.logger.info(`Skipped ${skipped}: no summary lines`);
    }

    const report = normalizeRecords(records, { mountPrefix: this.options.mountPrefix });
    this.logger.info(
      `Normalized ${report.rows.length} user row(s) with ${report.columns.length} columns`,
    );

    await writeReport(report, outputs);
    this.logger.info(`Wrote ${outputs.snapshotPath}`);
    this.logger.info(`Wrote ${outputs.spreadsheetPath}`);

    return {
      logFilesFound: logFiles.length,
      recordsParsed: records.length,
      skippedFiles,
      users: report.rows.map((row) => row.user),
      snapshotPath: outputs.snapshotPath,
      spreadsheetPath: outputs.spreadsheetPath,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }

  async inspect(snapshotPath: string): Promise<PurgeReport> {
    return readSnapshot(snapshotPath);
  }
}
