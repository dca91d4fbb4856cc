// src/program.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { mergeOptsWithLogger } from "./cli-util.js";
import type { ScanCliOptions } from "./config.js";
import type { Confirm } from "./confirm.js";
import { CLI_NAME } from "./constants.js";
import type { SpawnDigestWorker } from "./executor.js";
import { listSupportedHashes } from "./hash.js";
import { LOG_LEVELS, type Logger } from "./logger.js";
import { configureScanCommand, runScan, type ScanOutcome } from "./scan.js";

export function readVersion(): string {
  try {
    const raw = fs.readFileSync(
      path.join(__dirname, "..", "package.json"),
      "utf8",
    );
    const pkg: unknown = JSON.parse(raw);
    if (
      typeof pkg === "object" &&
      pkg !== null &&
      "version" in pkg &&
      typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return "0.0.0";
}

/** Collaborators the commands use; tests swap them out. */
export type ProgramDeps = {
  logger?: Logger;
  write?: (text: string) => void;
  confirm?: Confirm;
  spawn?: SpawnDigestWorker;
  onOutcome?: (outcome: ScanOutcome) => void;
};

export function buildProgram(deps: ProgramDeps = {}): Command {
  const write = deps.write ?? ((text: string) => console.log(text));
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Find byte-identical files and keep only the oldest copy of each",
    )
    .version(readVersion());

  program.option(
    "--log-level <level>",
    `log verbosity (${LOG_LEVELS.join(", ")})`,
    "info",
  );

  configureScanCommand(program.command("scan", { isDefault: true })).action(
    async (opts: ScanCliOptions, command: Command) => {
      const params = mergeOptsWithLogger(command, opts, deps.logger);
      const outcome = await runScan({
        ...params,
        write: deps.write,
        confirm: deps.confirm,
        spawn: deps.spawn,
      });
      deps.onOutcome?.(outcome);
    },
  );

  program
    .command("hashes")
    .description("List the hash algorithms this runtime supports")
    .action(() => {
      write(listSupportedHashes().join("\n"));
    });

  return program;
}
