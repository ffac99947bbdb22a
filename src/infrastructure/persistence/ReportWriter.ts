import { stat, writeFile } from "node:fs/promises";

import type { PurgeReport, ReportOutputPaths } from "../../interfaces/index.js";

import { OutputConflictError, WriteError, hasErrorCode } from "../../usecases/errors.js";
import { serializeSnapshot } from "./ReportSnapshot.js";
import { buildSpreadsheet } from "./ReportSpreadsheet.js";

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return false;
    throw new WriteError(path, error);
  }
}

export async function findExistingOutputs(paths: ReportOutputPaths): Promise<string[]> {
  const candidates = [paths.snapshotPath, paths.spreadsheetPath];
  const existing: string[] = [];
  for (const candidate of candidates) {
    if (await pathExists(candidate)) existing.push(candidate);
  }
  return existing;
}

export async function assertOutputsAvailable(paths: ReportOutputPaths): Promise<void> {
  const existing = await findExistingOutputs(paths);
  if (existing.length > 0) throw new OutputConflictError(existing);
}

async function writeExclusive(path: string, contents: Buffer): Promise<void> {
  try {
    await writeFile(path, contents, { flag: "wx" });
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) throw new OutputConflictError([path]);
    throw new WriteError(path, error);
  }
}

/**
 * Writes the snapshot and then the spreadsheet. Both are serialized before the
 * first write, and neither file may already exist.
 */
export async function writeReport(report: PurgeReport, paths: ReportOutputPaths): Promise<void> {
  await assertOutputsAvailable(paths);

  const snapshot = serializeSnapshot(report);
  let spreadsheet: Buffer;
  try {
    spreadsheet = await buildSpreadsheet(report);
  } catch (error) {
    throw new WriteError(paths.spreadsheetPath, error);
  }

  await writeExclusive(paths.snapshotPath, snapshot);
  await writeExclusive(paths.spreadsheetPath, spreadsheet);
}
