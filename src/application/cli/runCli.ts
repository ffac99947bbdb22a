import { access, constants } from "node:fs/promises";

import type { PurgeReport, ReportLogger } from "../../interfaces/index.js";
import { UsageError, describeError } from "../../usecases/errors.js";
import {
  resolveConfigFilePath,
  resolvePurgeReportOptions,
} from "../config/resolvePurgeReportOptions.js";
import { PurgeReportService } from "../services/PurgeReportService.js";

type ParsedArgs = {
  _: string[];
  [key: string]: string | undefined | string[];
};

export type CliIo = {
  env: NodeJS.ProcessEnv;
  stderr: (text: string) => void;
  stdout: (text: string) => void;
};

const BOOLEAN_FLAGS = new Set(["help", "quiet"]);

const USAGE = [
  "Usage: purge-report <log_dir> <out_dir> <file_name> [--prefix <mount>] [--config <path>] [--quiet]",
  "       purge-report inspect <snapshot_file>",
  "",
  "  <log_dir>   directory containing the purge run logs (*.log)",
  "  <out_dir>   directory where the generated files will be written",
  "  <file_name> file name prefix given to the generated .snapshot and .xlsx files",
  "",
  "Flags:",
  "  --prefix  Mount prefix stripped from each logged directory (default: /mnt/orangefs/)",
  "  --config  JSON configuration file path (default: ./purge-report.config.json when present)",
  "  --quiet   Only print errors",
  "",
].join("\n");

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { _: [] };

  for (let i = 0; i < argv.length; i++) {
    const current = argv[i];
    if (current === "-h") {
      parsed.help = "true";
      continue;
    }
    if (!current.startsWith("--")) {
      parsed._.push(current);
      continue;
    }

    const key = current.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      parsed[key] = "true";
      continue;
    }

    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      throw new UsageError(`Flag --${key} requires a value\n${USAGE}`);
    }

    parsed[key] = next;
    i++;
  }

  return parsed;
}

function getOptionalArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

async function assertAccess(path: string, mode: number, message: string): Promise<void> {
  try {
    await access(path, mode);
  } catch (error) {
    throw new UsageError(`${message} (${path})`, { cause: error });
  }
}

function toJsonLine(row: PurgeReport["rows"][number]): string {
  return JSON.stringify(row, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
}

function createLogger(io: CliIo, quiet: boolean): ReportLogger {
  return {
    info: (message) => {
      if (!quiet) io.stdout(`${message}\n`);
    },
  };
}

async function runInspect(args: ParsedArgs, io: CliIo, service: PurgeReportService): Promise<void> {
  const snapshotPath = args._[1];
  const report = await service.inspect(snapshotPath);
  for (const row of report.rows) {
    io.stdout(`${toJsonLine(row)}\n`);
  }
}

async function runReport(
  args: ParsedArgs,
  logger: ReportLogger,
  service: PurgeReportService,
): Promise<void> {
  const [logDir, outDir, fileName] = args._;
  await assertAccess(
    logDir,
    constants.R_OK | constants.X_OK,
    "log_dir argument must have both read and execute permissions set!",
  );
  await assertAccess(
    outDir,
    constants.R_OK | constants.W_OK | constants.X_OK,
    "out_dir argument must have: read, write, and execute permissions set!",
  );

  const summary = await service.generate({ fileName, logDir, outDir });
  logger.info(`Report generated for ${summary.users.length} user(s)`);
}

/**
 * Runs the command line and returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help === "true") {
      io.stdout(USAGE);
      return 0;
    }

    const isInspect = args._[0] === "inspect" && args._.length === 2;
    if (!isInspect && args._.length !== 3) {
      throw new UsageError(`Expected 3 arguments but received ${args._.length}\n${USAGE}`);
    }

    const options = resolvePurgeReportOptions({
      configFilePath: resolveConfigFilePath(argv, io.env),
      env: io.env,
      overrides: {
        mountPrefix: getOptionalArg(args, "prefix"),
        quiet: args.quiet === "true" ? true : undefined,
      },
    });
    const logger = createLogger(io, options.quiet);
    const service = new PurgeReportService({
      logger,
      mountPrefix: options.mountPrefix,
    });

    if (isInspect) {
      await runInspect(args, io, service);
    } else {
      await runReport(args, logger, service);
    }
    return 0;
  } catch (error) {
    io.stderr(`ERROR: ${describeError(error)}\n`);
    return 1;
  }
}
