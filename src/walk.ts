// src/walk.ts
import * as walk from "@nodelib/fs.walk";
import { lstat } from "node:fs/promises";
import path from "node:path";
import type { Stats } from "node:fs";
import { createIgnorer, toRel } from "./ignore.js";
import { WALK_PROGRESS_EVERY, type ProgressObserver } from "./progress.js";

export type FileRecord = {
  /** absolute path; the identity of the record */
  readonly path: string;
  readonly size: number;
  /** modification time in seconds */
  readonly mtime: number;
  /** discovery index within one scan */
  readonly order: number;
};

export type WalkOptions = {
  /** directory basenames never descended into */
  skipDirs?: Iterable<string>;
  /** gitignore-style rules, relative to the root */
  ignoreRules?: readonly string[];
  concurrency?: number;
  observer?: ProgressObserver;
  onError?: (err: NodeJS.ErrnoException) => void;
};

async function statOf(entry: walk.Entry): Promise<Stats | null> {
  if (entry.stats) return entry.stats;
  try {
    return await lstat(entry.path);
  } catch {
    // vanished or unreadable; it cannot be compared
    return null;
  }
}

/**
 * Regular files under root, as a lazy stream. Symlinks are not followed and
 * skipped directories are pruned before their children are listed. A root
 * whose own name is in the skip-set yields nothing.
 */
export async function* walkFiles(
  root: string,
  {
    skipDirs = [],
    ignoreRules = [],
    concurrency = 64,
    observer,
    onError,
  }: WalkOptions = {},
): AsyncGenerator<FileRecord> {
  const absRoot = path.resolve(root);
  const skip = new Set(skipDirs);
  const ig = createIgnorer(ignoreRules);

  if (skip.has(path.basename(absRoot))) {
    observer?.stageStart?.("walk");
    observer?.stageEnd?.("walk", 0);
    return;
  }

  const stream = walk.walkStream(absRoot, {
    stats: true,
    followSymbolicLinks: false,
    concurrency,
    // Do not descend into skipped or ignored directories
    deepFilter: (e) => {
      if (skip.has(e.name)) return false;
      return !ig.ignoresDir(toRel(e.path, absRoot));
    },
    entryFilter: (e) => {
      if (!e.dirent.isFile()) return false;
      return !ig.ignoresFile(toRel(e.path, absRoot));
    },
    errorFilter: (err) => {
      onError?.(err);
      return true;
    },
  });

  observer?.stageStart?.("walk");
  let order = 0;
  let bytes = 0;
  for await (const raw of stream) {
    const entry: walk.Entry = raw;
    const st = await statOf(entry);
    if (!st || !st.isFile()) continue;
    const record: FileRecord = {
      path: entry.path,
      size: st.size,
      mtime: st.mtimeMs / 1000,
      order: order++,
    };
    bytes += record.size;
    if (order % WALK_PROGRESS_EVERY === 0) {
      observer?.progress?.({
        stage: "walk",
        completedFiles: order,
        completedBytes: bytes,
      });
    }
    yield record;
  }
  observer?.stageEnd?.("walk", order);
}
