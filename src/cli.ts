#!/usr/bin/env node
// src/cli.ts
import { describeFatal } from "./cli-util.js";
import { CLI_NAME } from "./constants.js";
import { buildProgram } from "./program.js";

const program = buildProgram();

// Default help when no arguments given
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  const { message, exitCode } = describeFatal(err, CLI_NAME);
  console.error(message);
  process.exitCode = exitCode;
});
