// src/funnel.ts
import path from "node:path";
import type { DigestExecutor, DigestResults } from "./executor.js";
import { NullLogger, type Logger } from "./logger.js";
import type { ProgressObserver } from "./progress.js";
import { splitByContent } from "./verify.js";
import { walkFiles, type FileRecord } from "./walk.js";

/** Files whose full content digests match; never fewer than two. */
export type DuplicateGroup = {
  digest: string;
  size: number;
  files: FileRecord[];
};

export type FunnelStage = "size" | "partial" | "full" | "verify";

export type FunnelStageCounts = {
  scannedFiles: number;
  scannedBytes: number;
  /** files sharing their size with at least one other file */
  sizeCandidates: number;
  /** files sharing (size, partial digest) with at least one other file */
  partialCandidates: number;
  /** files in a full-digest group (after verification, when enabled) */
  fullCandidates: number;
  /** files dropped because a digest or comparison read failed */
  unreadable: number;
  /** directories the walk could not list */
  walkErrors: number;
};

export type FunnelResult = {
  root: string;
  groups: DuplicateGroup[];
  counts: FunnelStageCounts;
};

export type FunnelOptions = {
  executor: DigestExecutor;
  skipDirs?: Iterable<string>;
  ignoreRules?: readonly string[];
  /** compare group members byte for byte after the full digest stage */
  verify?: boolean;
  chunkBytes?: number;
  observer?: ProgressObserver;
  logger?: Logger;
  /** checked between stages only */
  signal?: AbortSignal;
  /** called with each stage's survivors before the next stage starts */
  inspect?: (
    stage: FunnelStage,
    survivors: readonly FileRecord[],
  ) => void | Promise<void>;
};

function bucketize<K>(
  files: readonly FileRecord[],
  keyOf: (f: FileRecord) => K | null,
): Map<K, FileRecord[]> {
  const buckets = new Map<K, FileRecord[]>();
  for (const f of files) {
    const key = keyOf(f);
    if (key === null) continue;
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(f);
    } else {
      buckets.set(key, [f]);
    }
  }
  return buckets;
}

// Flatten buckets with two or more members, keeping bucket then member order.
function multiples<K>(buckets: Map<K, FileRecord[]>): FileRecord[] {
  const out: FileRecord[] = [];
  for (const bucket of buckets.values()) {
    if (bucket.length > 1) out.push(...bucket);
  }
  return out;
}

function countMissing(files: readonly FileRecord[], results: DigestResults) {
  let n = 0;
  for (const f of files) {
    if (results.get(f.path) == null) n++;
  }
  return n;
}

function firstPath(group: DuplicateGroup): string {
  let min = group.files[0].path;
  for (const f of group.files) {
    if (f.path < min) min = f.path;
  }
  return min;
}

/**
 * Partition the files under root into groups of identical content:
 * size, then (size, partial digest), then full digest. Each stage only looks at
 * the survivors of the previous one, and none starts before the previous has
 * finished. Unreadable files are dropped where they fail.
 */
export async function findDuplicates(
  root: string,
  opts: FunnelOptions,
): Promise<FunnelResult> {
  const {
    executor,
    skipDirs,
    ignoreRules,
    verify = false,
    chunkBytes,
    observer,
    signal,
    inspect,
  } = opts;
  const logger = opts.logger ?? new NullLogger();
  const absRoot = path.resolve(root);
  const counts: FunnelStageCounts = {
    scannedFiles: 0,
    scannedBytes: 0,
    sizeCandidates: 0,
    partialCandidates: 0,
    fullCandidates: 0,
    unreadable: 0,
    walkErrors: 0,
  };
  const done = (groups: DuplicateGroup[]): FunnelResult => ({
    root: absRoot,
    groups,
    counts,
  });

  signal?.throwIfAborted();

  // ---- stage 1: size ----
  const all: FileRecord[] = [];
  for await (const f of walkFiles(absRoot, {
    skipDirs,
    ignoreRules,
    observer,
    onError: (err) => {
      counts.walkErrors += 1;
      logger.debug("walk error", { path: err.path, error: err.message });
    },
  })) {
    all.push(f);
    counts.scannedBytes += f.size;
  }
  counts.scannedFiles = all.length;
  const sizeSurvivors = multiples(bucketize(all, (f) => f.size));
  counts.sizeCandidates = sizeSurvivors.length;
  logger.info("indexed files", {
    files: counts.scannedFiles,
    bytes: counts.scannedBytes,
    candidates: counts.sizeCandidates,
  });
  await inspect?.("size", sizeSurvivors);
  if (!sizeSurvivors.length) {
    logger.info("no duplicates possible; every file has a unique size");
    return done([]);
  }
  signal?.throwIfAborted();

  // ---- stage 2: partial digest ----
  observer?.stageStart?.("partial", sizeSurvivors.length);
  const partial = await executor.run("partial", sizeSurvivors, { observer });
  counts.unreadable += countMissing(sizeSurvivors, partial);
  const partialSurvivors = multiples(
    bucketize(sizeSurvivors, (f) => {
      const digest = partial.get(f.path);
      return digest == null ? null : `${f.size}:${digest}`;
    }),
  );
  counts.partialCandidates = partialSurvivors.length;
  observer?.stageEnd?.("partial", partialSurvivors.length);
  await inspect?.("partial", partialSurvivors);
  if (!partialSurvivors.length) {
    logger.info("no duplicates found after partial digests");
    return done([]);
  }
  signal?.throwIfAborted();

  // ---- stage 3: full digest ----
  observer?.stageStart?.("full", partialSurvivors.length);
  const full = await executor.run("full", partialSurvivors, { observer });
  counts.unreadable += countMissing(partialSurvivors, full);
  let groups: DuplicateGroup[] = [];
  for (const [digest, files] of bucketize(
    partialSurvivors,
    (f) => full.get(f.path) ?? null,
  )) {
    if (files.length > 1) {
      groups.push({ digest, size: files[0].size, files });
    }
  }
  const fullSurvivors = groups.flatMap((g) => g.files);
  observer?.stageEnd?.("full", fullSurvivors.length);
  await inspect?.("full", fullSurvivors);

  // ---- optional stage 4: byte comparison ----
  if (verify && groups.length) {
    signal?.throwIfAborted();
    observer?.stageStart?.("verify", fullSurvivors.length);
    const verified: DuplicateGroup[] = [];
    let compared = 0;
    for (const g of groups) {
      const classes = await splitByContent(g.files, {
        chunkBytes,
        onUnreadable: (file, err) => {
          counts.unreadable += 1;
          logger.debug("unreadable file dropped", {
            stage: "verify",
            path: file.path,
            error: err.message,
          });
        },
      });
      if (classes.length > 1) {
        logger.warn("digest collision; files differ despite equal digests", {
          digest: g.digest,
          classes: classes.length,
        });
      }
      for (const files of classes) {
        if (files.length > 1) verified.push({ ...g, files });
      }
      compared += g.files.length;
      observer?.progress?.({
        stage: "verify",
        completedFiles: compared,
        totalFiles: fullSurvivors.length,
      });
    }
    groups = verified;
    const verifiedSurvivors = groups.flatMap((g) => g.files);
    observer?.stageEnd?.("verify", verifiedSurvivors.length);
    await inspect?.("verify", verifiedSurvivors);
  }

  counts.fullCandidates = groups.reduce((n, g) => n + g.files.length, 0);
  groups.sort((a, b) => {
    const pa = firstPath(a);
    const pb = firstPath(b);
    return pa < pb ? -1 : pa > pb ? 1 : 0;
  });
  logger.info("duplicate scan complete", {
    groups: groups.length,
    files: counts.fullCandidates,
    unreadable: counts.unreadable,
  });
  return done(groups);
}
