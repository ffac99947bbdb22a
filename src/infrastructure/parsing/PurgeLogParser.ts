import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";

import type { LogRecord, ParsedLogFile, ParseResult } from "../../interfaces/index.js";

import { DiscoveryError, ParseError, describeError } from "../../usecases/errors.js";

export const LOG_FILE_SUFFIX = ".log";

// Per-item detail lines written by the purge tool for kept and removed entries.
const DETAIL_LINE_PREFIXES = ["K\t", "R\t"];

function isDetailLine(line: string): boolean {
  return DETAIL_LINE_PREFIXES.some((prefix) => line.startsWith(prefix));
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function listLogFiles(logDir: string): Promise<string[]> {
  const entries = await readdir(logDir, { withFileTypes: true }).catch((error: unknown) => {
    throw new DiscoveryError(`Unable to list log directory ${logDir}: ${describeError(error)}`, {
      cause: error,
    });
  });

  return entries
    .filter((entry) => entry.isFile() || entry.isSymbolicLink())
    .map((entry) => entry.name)
    .filter((name) => name.endsWith(LOG_FILE_SUFFIX))
    .sort(compareCodeUnits)
    .map((name) => join(logDir, name));
}

/**
 * Builds the summary record of one log file from its lines.
 * Returns `undefined` when every line is a detail line or blank.
 */
export function parseLogLines(lines: Iterable<string>): LogRecord | undefined {
  const record: LogRecord = {};
  let usableLines = 0;

  for (const line of lines) {
    if (isDetailLine(line)) continue;
    const trimmed = line.trim();
    if (!trimmed) continue;

    const separatorIndex = trimmed.indexOf("\t");
    const key = separatorIndex === -1 ? trimmed : trimmed.slice(0, separatorIndex).trim();
    const value = separatorIndex === -1 ? "" : trimmed.slice(separatorIndex + 1).trim();
    // A key such as "__proto__" must stay an ordinary field. Repeated keys: last one wins.
    Object.defineProperty(record, key, {
      configurable: true,
      enumerable: true,
      value,
      writable: true,
    });
    usableLines++;
  }

  return usableLines > 0 ? record : undefined;
}

export async function parseLogFile(filePath: string): Promise<LogRecord | undefined> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ParseError(filePath, error);
  }

  return parseLogLines(contents.split(/\r?\n/));
}

export async function parseLogFiles(filePaths: string[]): Promise<ParseResult> {
  const records: ParsedLogFile[] = [];
  const skippedFiles: string[] = [];

  for (const filePath of filePaths) {
    const fields = await parseLogFile(filePath);
    if (!fields) {
      skippedFiles.push(filePath);
      continue;
    }
    records.push({ sourceFile: filePath, fields });
  }

  return { records, skippedFiles };
}
