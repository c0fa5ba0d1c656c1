#!/usr/bin/env node
import "dotenv/config";
import { SUMMARY_PREFIX } from "./cli/constants.js";
import { runCLI } from "./cli/program.js";

runCLI().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${SUMMARY_PREFIX} Error: ${message}\n`);
  process.exitCode = 1;
});
