// src/config.ts
import os from "node:os";
import path from "node:path";
import { stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import {
  DEFAULT_SKIP_DIRS,
  DIGEST_CHUNK_BYTES,
  FULL_DISPATCH_BATCH,
  MAX_DEFAULT_WORKERS,
  PARTIAL_DIGEST_BYTES,
  PARTIAL_DISPATCH_BATCH,
  TRASH_DIR_NAME,
} from "./constants.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { autoIgnoreForRoot, normalizeIgnorePatterns } from "./ignore.js";
import { errorMessage } from "./logger.js";
import { TIE_BREAKS, type TieBreak } from "./planner.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RootPathError extends ConfigError {
  constructor(
    message: string,
    public readonly root: string,
  ) {
    super(message);
    this.name = "RootPathError";
  }
}

/** Options as commander hands them over; numbers still arrive as strings. */
export type ScanCliOptions = {
  root: string;
  skip?: string[];
  defaultSkips?: boolean;
  ignore?: string[];
  hash?: string;
  workers?: string | number;
  partialBytes?: string | number;
  chunkBytes?: string | number;
  partialBatch?: string | number;
  fullBatch?: string | number;
  verify?: boolean;
  tieBreak?: string;
  logFile?: string;
  delete?: boolean;
  yes?: boolean;
  dryRun?: boolean;
  permanent?: boolean;
  trashDir?: string;
  json?: boolean;
};

export type ScanConfig = {
  root: string;
  skipDirs: string[];
  ignoreRules: string[];
  hashAlg: HashAlg;
  workers: number;
  partialBytes: number;
  chunkBytes: number;
  partialBatch: number;
  fullBatch: number;
  verify: boolean;
  tieBreak: TieBreak;
  logFile?: string;
  delete: boolean;
  yes: boolean;
  dryRun: boolean;
  permanent: boolean;
  /** unset when removal is permanent */
  trashDir?: string;
  json: boolean;
};

export function defaultWorkerCount(): number {
  const fromEnv = process.env.DUPSWEEP_WORKERS;
  if (fromEnv) return parsePositiveInt(fromEnv, "DUPSWEEP_WORKERS");
  return Math.max(1, Math.min(os.availableParallelism(), MAX_DEFAULT_WORKERS));
}

export function parsePositiveInt(
  raw: string | number | undefined,
  label: string,
  fallback?: number,
): number {
  if (raw === undefined || raw === "") {
    if (fallback === undefined) {
      throw new ConfigError(`${label} is required`);
    }
    return fallback;
  }
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${label} must be a positive integer (got '${raw}')`);
  }
  return n;
}

function parseTieBreak(raw: string | undefined): TieBreak {
  if (!raw) return "path";
  const match = TIE_BREAKS.find((t) => t === raw.trim().toLowerCase());
  if (!match) {
    throw new ConfigError(
      `tie-break must be one of ${TIE_BREAKS.join(", ")} (got '${raw}')`,
    );
  }
  return match;
}

/**
 * Turn CLI options into a complete config. Throws ConfigError on bad values;
 * the root itself is checked by validateRoot.
 */
export function resolveScanConfig(opts: ScanCliOptions): ScanConfig {
  if (!opts.root || !opts.root.trim()) {
    throw new RootPathError("no root directory given", opts.root ?? "");
  }
  const root = path.resolve(opts.root);
  let hashAlg: HashAlg;
  try {
    hashAlg = normalizeHashAlg(opts.hash);
  } catch (err) {
    throw new ConfigError(errorMessage(err));
  }
  const permanent = opts.permanent ?? false;
  const trashDir = permanent
    ? undefined
    : path.resolve(opts.trashDir ?? path.join(root, TRASH_DIR_NAME));

  const skipDirs = new Set<string>(
    opts.defaultSkips === false ? [] : DEFAULT_SKIP_DIRS,
  );
  for (const name of opts.skip ?? []) {
    const trimmed = name.trim();
    if (trimmed) skipDirs.add(trimmed);
  }

  const ignoreRules = normalizeIgnorePatterns([
    ...(opts.ignore ?? []),
    ...(trashDir ? autoIgnoreForRoot(root, trashDir) : []),
  ]);

  return {
    root,
    skipDirs: Array.from(skipDirs),
    ignoreRules,
    hashAlg,
    workers: parsePositiveInt(opts.workers, "workers", defaultWorkerCount()),
    partialBytes: parsePositiveInt(
      opts.partialBytes,
      "partial-bytes",
      PARTIAL_DIGEST_BYTES,
    ),
    chunkBytes: parsePositiveInt(
      opts.chunkBytes,
      "chunk-bytes",
      DIGEST_CHUNK_BYTES,
    ),
    partialBatch: parsePositiveInt(
      opts.partialBatch,
      "partial-batch",
      PARTIAL_DISPATCH_BATCH,
    ),
    fullBatch: parsePositiveInt(opts.fullBatch, "full-batch", FULL_DISPATCH_BATCH),
    verify: opts.verify ?? false,
    tieBreak: parseTieBreak(opts.tieBreak),
    logFile: opts.logFile ? path.resolve(opts.logFile) : undefined,
    delete: opts.delete ?? false,
    yes: opts.yes ?? false,
    dryRun: opts.dryRun ?? false,
    permanent,
    trashDir,
    json: opts.json ?? false,
  };
}

/** The root must exist and be a directory before any stage starts. */
export async function validateRoot(root: string): Promise<void> {
  let st: Stats;
  try {
    st = await stat(root);
  } catch (err) {
    throw new RootPathError(
      `directory not found: '${root}' (${errorMessage(err)})`,
      root,
    );
  }
  if (!st.isDirectory()) {
    throw new RootPathError(`not a directory: '${root}'`, root);
  }
}
