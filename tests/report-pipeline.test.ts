import { mkdtemp, mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { runCli } from "../src/application/cli/runCli.js";
import {
  PurgeReportService,
  resolveOutputPaths,
} from "../src/application/services/PurgeReportService.js";
import { readSnapshot } from "../src/infrastructure/persistence/ReportSnapshot.js";
import { NoLogFilesError, OutputConflictError } from "../src/usecases/errors.js";
import { MOUNT_PREFIX, createSummaryFields, toLogText } from "./helpers/purgeLogFixtures.js";

const cleanupPaths: string[] = [];

afterEach(async () => {
  while (cleanupPaths.length > 0) {
    const path = cleanupPaths.pop();
    if (!path) continue;
    await rm(path, { recursive: true, force: true });
  }
});

type Workspace = {
  logDir: string;
  outDir: string;
};

async function createWorkspace(): Promise<Workspace> {
  const tempRoot = await mkdtemp(join(tmpdir(), "purge-report-pipeline-"));
  cleanupPaths.push(tempRoot);
  const logDir = join(tempRoot, "logs");
  const outDir = join(tempRoot, "out");
  await mkdir(logDir);
  await mkdir(outDir);
  return { logDir, outDir };
}

async function writeUserLogs(logDir: string): Promise<void> {
  await writeFile(
    join(logDir, "1456790400-bob.log"),
    toLogText(createSummaryFields("bob", { kept_files: "7" })),
  );
  await writeFile(
    join(logDir, "1456790400-alice.log"),
    toLogText(createSummaryFields("alice"), [
      "K\t/mnt/orangefs/alice/keep.dat",
      "K\t/mnt/orangefs/alice/also-keep.dat",
    ]),
  );
  await writeFile(join(logDir, "1456790400-trace.log"), "R\t/mnt/orangefs/carol/old.dat\n");
}

function createIo(env: NodeJS.ProcessEnv = {}) {
  const output = { stderr: "", stdout: "" };
  return {
    io: {
      env,
      stderr: (text: string) => {
        output.stderr += text;
      },
      stdout: (text: string) => {
        output.stdout += text;
      },
    },
    output,
  };
}

describe("Purge report service", () => {
  it("discovers, parses, normalizes and writes a report", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeUserLogs(logDir);
    const messages: string[] = [];
    const service = new PurgeReportService({
      logger: { info: (message) => messages.push(message) },
      mountPrefix: MOUNT_PREFIX,
    });

    const summary = await service.generate({ fileName: "march", logDir, outDir });

    expect(summary.logFilesFound).toBe(3);
    expect(summary.recordsParsed).toBe(2);
    expect(summary.skippedFiles).toEqual([join(logDir, "1456790400-trace.log")]);
    expect(summary.users).toEqual(["alice", "bob"]);
    expect(summary.snapshotPath).toBe(join(outDir, "march.snapshot"));
    expect(summary.spreadsheetPath).toBe(join(outDir, "march.xlsx"));
    expect(messages[0]).toBe(`Found 3 log file(s) in ${logDir}`);

    const report = await service.inspect(summary.snapshotPath);
    expect(report.rows[0].user).toBe("alice");
    expect(report.rows[0].total_files).toBe(15n);
    expect(report.rows[1].total_files).toBe(17n);
  });

  it("fails before writing when no log files are found", async () => {
    const { logDir, outDir } = await createWorkspace();
    const service = new PurgeReportService({ mountPrefix: MOUNT_PREFIX });

    await expect(service.generate({ fileName: "empty", logDir, outDir })).rejects.toBeInstanceOf(
      NoLogFilesError,
    );
    expect(await readdir(outDir)).toEqual([]);
  });

  it("checks for existing outputs before reading any logs", async () => {
    const { logDir, outDir } = await createWorkspace();
    const paths = resolveOutputPaths(outDir, "march");
    await writeFile(paths.snapshotPath, "existing");
    const service = new PurgeReportService({ mountPrefix: MOUNT_PREFIX });

    await expect(service.generate({ fileName: "march", logDir, outDir })).rejects.toBeInstanceOf(
      OutputConflictError,
    );
  });
});

describe("purge-report CLI", () => {
  it("generates both files and exits with 0", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeUserLogs(logDir);
    const { io, output } = createIo();

    const exitCode = await runCli([logDir, outDir, "march"], io);

    expect(exitCode).toBe(0);
    expect(output.stderr).toBe("");
    expect(output.stdout.endsWith("Report generated for 2 user(s)\n")).toBe(true);
    expect((await readdir(outDir)).sort()).toEqual(["march.snapshot", "march.xlsx"]);
  });

  it("exits with 1 and creates nothing when the log directory has no log files", async () => {
    const { logDir, outDir } = await createWorkspace();
    const { io, output } = createIo();

    const exitCode = await runCli([logDir, outDir, "march"], io);

    expect(exitCode).toBe(1);
    expect(output.stderr).toBe(`ERROR: No log files found in ${logDir}! Nothing to do!\n`);
    expect(await readdir(outDir)).toEqual([]);
  });

  it("refuses a second run with the same output arguments", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeUserLogs(logDir);

    const first = createIo();
    expect(await runCli([logDir, outDir, "march"], first.io)).toBe(0);
    const firstSnapshot = await readSnapshot(join(outDir, "march.snapshot"));

    const second = createIo();
    expect(await runCli([logDir, outDir, "march"], second.io)).toBe(1);
    expect(
      second.output.stderr.startsWith(
        "ERROR: One or more of the files to be generated already exists",
      ),
    ).toBe(true);
    expect((await readdir(outDir)).sort()).toEqual(["march.snapshot", "march.xlsx"]);
    expect(await readSnapshot(join(outDir, "march.snapshot"))).toEqual(firstSnapshot);
  });

  it("rejects a wrong argument count", async () => {
    const { io, output } = createIo();

    const exitCode = await runCli(["only-one"], io);

    expect(exitCode).toBe(1);
    expect(output.stderr.startsWith("ERROR: Expected 3 arguments but received 1\n")).toBe(true);
  });

  it("rejects a value flag given without a value", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeUserLogs(logDir);
    const { io, output } = createIo();

    const exitCode = await runCli([logDir, outDir, "march", "--prefix"], io);

    expect(exitCode).toBe(1);
    expect(output.stderr.startsWith("ERROR: Flag --prefix requires a value\n")).toBe(true);
    expect(await readdir(outDir)).toEqual([]);
  });

  it("rejects a log directory that does not exist", async () => {
    const { outDir } = await createWorkspace();
    const missing = join(outDir, "missing");
    const { io, output } = createIo();

    const exitCode = await runCli([missing, outDir, "march"], io);

    expect(exitCode).toBe(1);
    expect(output.stderr).toBe(
      `ERROR: log_dir argument must have both read and execute permissions set! (${missing})\n`,
    );
  });

  it("applies the mount prefix from --prefix and stays silent with --quiet", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeFile(
      join(logDir, "1456790400-dana.log"),
      toLogText(createSummaryFields("dana", { directory: "/scratch/dana" })),
    );
    const { io, output } = createIo();

    const exitCode = await runCli(
      ["--quiet", logDir, outDir, "scratch", "--prefix", "/scratch/"],
      io,
    );

    expect(exitCode).toBe(0);
    expect(output.stdout).toBe("");
    const report = await readSnapshot(join(outDir, "scratch.snapshot"));
    expect(report.rows.map((row) => row.user)).toEqual(["dana"]);
  });

  it("reads the mount prefix from the environment", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeFile(
      join(logDir, "1456790400-erin.log"),
      toLogText(createSummaryFields("erin", { directory: "/data/erin" })),
    );
    const { io } = createIo({ PURGE_REPORT_MOUNT_PREFIX: "/data/", PURGE_REPORT_QUIET: "true" });

    expect(await runCli([logDir, outDir, "env"], io)).toBe(0);
    const report = await readSnapshot(join(outDir, "env.snapshot"));
    expect(report.rows[0].user).toBe("erin");
  });

  it("prints snapshot rows as JSON lines with inspect", async () => {
    const { logDir, outDir } = await createWorkspace();
    await writeUserLogs(logDir);
    expect(await runCli(["--quiet", logDir, outDir, "march"], createIo().io)).toBe(0);
    const { io, output } = createIo();

    const exitCode = await runCli(["inspect", join(outDir, "march.snapshot")], io);

    expect(exitCode).toBe(0);
    const lines = output.stdout.trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    const first: unknown = JSON.parse(lines[0]);
    expect(first).toMatchObject({
      user: "alice",
      total_files: "15",
      current_time: "2016-03-01T00:00:00.000Z",
      purge_success: true,
      percent_files_removed: 66.666667,
    });
  });

  it("prints usage with --help", async () => {
    const { io, output } = createIo();

    expect(await runCli(["--help"], io)).toBe(0);
    expect(output.stdout.startsWith("Usage: purge-report <log_dir> <out_dir> <file_name>")).toBe(
      true,
    );
  });
});
