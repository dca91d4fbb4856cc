// src/scan.ts
import { Command, Option } from "commander";
import {
  resolveScanConfig,
  validateRoot,
  type ScanCliOptions,
  type ScanConfig,
} from "./config.js";
import { confirmPrompt, type Confirm } from "./confirm.js";
import { PARTIAL_DIGEST_BYTES, TRASH_DIR_NAME } from "./constants.js";
import { createDigestExecutor, type SpawnDigestWorker } from "./executor.js";
import { findDuplicates, type FunnelResult } from "./funnel.js";
import { defaultHashAlg, hashChoices } from "./hash.js";
import { collectListOption } from "./ignore.js";
import { ConsoleLogger, type LogLevel, type Logger } from "./logger.js";
import { planDeletions, TIE_BREAKS, type DeletionPlan } from "./planner.js";
import {
  combineObservers,
  loggerProgressObserver,
  type ProgressObserver,
} from "./progress.js";
import {
  createRemover,
  executeDeletionPlan,
  type RemovalOutcome,
} from "./remove.js";
import {
  humanFileSize,
  numberFormatter,
  planToJson,
  renderExamples,
  renderOutcome,
  renderStatistics,
  writeDeletionLog,
} from "./report.js";

const noItems = (): string[] => [];

export function configureScanCommand(command: Command): Command {
  return command
    .description(
      "Find byte-identical files and optionally delete all but the oldest copy",
    )
    .requiredOption("--root <path>", "directory to scan")
    .option(
      "--skip <name>",
      "directory name never descended into (repeat or comma-separated)",
      collectListOption,
      noItems(),
    )
    .option("--no-default-skips", "do not skip the built-in system directories")
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectListOption,
      noItems(),
    )
    .addOption(
      new Option("--hash <algorithm>", "content hash algorithm")
        .choices(hashChoices())
        .default(defaultHashAlg()),
    )
    .option("--workers <n>", "hash worker threads; 1 hashes sequentially")
    .option(
      "--partial-bytes <n>",
      "bytes read for the partial digest",
      String(PARTIAL_DIGEST_BYTES),
    )
    .option("--verify", "compare duplicates byte for byte before planning", false)
    .addOption(
      new Option("--tie-break <policy>", "keeper among copies with equal mtime")
        .choices(TIE_BREAKS)
        .default("path"),
    )
    .option("--log-file <file>", "write the deletion plan to a text log")
    .option("--delete", "delete the newer copies (asks first)", false)
    .option("-y, --yes", "do not ask before deleting", false)
    .option("--dry-run", "report what --delete would do without doing it", false)
    .option(
      "--permanent",
      "delete permanently instead of moving to the trash directory",
      false,
    )
    .option(
      "--trash-dir <path>",
      `where deleted files are moved (default <root>/${TRASH_DIR_NAME})`,
    )
    .option("--json", "print the plan as JSON instead of tables", false);
}

export type ScanRunOptions = ScanCliOptions & {
  logger?: Logger;
  logLevel?: LogLevel;
  observer?: ProgressObserver;
  /** alternative worker spawner for the digest pool */
  spawn?: SpawnDigestWorker;
  confirm?: Confirm;
  /** receives report text; defaults to stdout */
  write?: (text: string) => void;
  signal?: AbortSignal;
};

export type ScanOutcome = {
  config: ScanConfig;
  funnel: FunnelResult;
  plan: DeletionPlan;
  logFile?: string;
  /** the user declined the deletion prompt */
  cancelled?: boolean;
  removal?: RemovalOutcome;
};

const stdoutWriter = (text: string) => {
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
};

/**
 * Scan a tree, plan the cleanup, report it, and (with --delete) remove the
 * newer copies. Throws ConfigError before touching the tree if the options or
 * the root are invalid.
 */
export async function runScan(opts: ScanRunOptions): Promise<ScanOutcome> {
  const logger = opts.logger ?? new ConsoleLogger(opts.logLevel ?? "info");
  const write = opts.write ?? stdoutWriter;
  const config = resolveScanConfig(opts);
  await validateRoot(config.root);

  logger.info(`scan: using hash=${config.hashAlg}`);
  logger.debug("running scan", {
    root: config.root,
    skipDirs: config.skipDirs,
    ignoreRules: config.ignoreRules,
  });

  const observer = combineObservers(
    loggerProgressObserver(logger.child("progress")),
    opts.observer,
  );
  const executor = createDigestExecutor({
    alg: config.hashAlg,
    workers: config.workers,
    partialBytes: config.partialBytes,
    chunkBytes: config.chunkBytes,
    partialBatch: config.partialBatch,
    fullBatch: config.fullBatch,
    spawn: opts.spawn,
    logger: logger.child("digest"),
  });
  logger.debug("digest executor ready", {
    mode: executor.mode,
    concurrency: executor.concurrency,
  });

  const t0 = Date.now();
  let funnel: FunnelResult;
  try {
    funnel = await findDuplicates(config.root, {
      executor,
      skipDirs: config.skipDirs,
      ignoreRules: config.ignoreRules,
      verify: config.verify,
      chunkBytes: config.chunkBytes,
      observer,
      logger: logger.child("funnel"),
      signal: opts.signal,
    });
  } finally {
    await executor.close();
  }
  logger.info("scan complete", {
    ...funnel.counts,
    durationMs: Date.now() - t0,
  });

  const plan = planDeletions(funnel.groups, { tieBreak: config.tieBreak });
  const outcome: ScanOutcome = { config, funnel, plan };

  if (config.logFile) {
    await writeDeletionLog(config.logFile, plan);
    outcome.logFile = config.logFile;
    logger.info("log saved", { file: config.logFile });
  }

  const emitJson = () => {
    write(
      JSON.stringify(
        {
          root: config.root,
          counts: funnel.counts,
          ...planToJson(plan),
          removal: outcome.removal ?? null,
        },
        null,
        2,
      ),
    );
  };

  if (!plan.entries.length) {
    if (config.json) {
      emitJson();
    } else {
      write("No duplicates found.");
    }
    return outcome;
  }

  if (!config.json) {
    write(renderStatistics(plan.stats));
    write(renderExamples(plan.decisions));
  }

  if (config.delete) {
    const remover = createRemover({
      permanent: config.permanent,
      trashDir: config.trashDir,
      root: config.root,
    });
    if (!config.yes && !config.dryRun) {
      const ask = opts.confirm ?? confirmPrompt();
      const where =
        remover.method === "trash"
          ? `to ${remover.location}`
          : "PERMANENTLY (cannot be restored)";
      const ok = await ask(
        `Delete ${numberFormatter.format(plan.stats.filesToDelete)} files ` +
          `(${humanFileSize(plan.stats.wastedBytes)}) ${where}? (yes/no) `,
      );
      if (!ok) {
        outcome.cancelled = true;
        logger.info("deletion cancelled; no files deleted");
      }
    }
    if (!outcome.cancelled) {
      outcome.removal = await executeDeletionPlan(plan.entries, remover, {
        dryRun: config.dryRun,
        logger: logger.child("delete"),
        observer,
      });
      if (!config.json) write(renderOutcome(outcome.removal));
    } else if (!config.json) {
      write("Cancelled; no files deleted.");
    }
  }

  if (config.json) emitJson();
  return outcome;
}
