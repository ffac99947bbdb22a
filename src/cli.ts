#!/usr/bin/env node
import { runCli } from "./application/cli/runCli.js";

runCli(process.argv.slice(2), {
  env: process.env,
  stderr: (text) => process.stderr.write(text),
  stdout: (text) => process.stdout.write(text),
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    process.stderr.write(
      `ERROR: ${error instanceof Error ? error.stack || error.message : String(error)}\n`,
    );
    process.exit(1);
  });
