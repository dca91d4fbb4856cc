// src/remove.ts
import {
  copyFile,
  mkdir,
  rename,
  rm,
  stat,
  unlink,
  utimes,
} from "node:fs/promises";
import path from "node:path";
import { NullLogger, errorMessage, type Logger } from "./logger.js";
import type { DeletionEntry } from "./planner.js";
import type { ProgressObserver } from "./progress.js";

export type RemovalMethod = "trash" | "permanent";

export interface FileRemover {
  readonly method: RemovalMethod;
  /** where removed files can be restored from, if anywhere */
  readonly location?: string;
  remove(file: string): Promise<void>;
}

/** Unrecoverable removal; the fallback when no trash directory is usable. */
export class PermanentRemover implements FileRemover {
  readonly method = "permanent";

  async remove(file: string): Promise<void> {
    await rm(file, { force: false });
  }
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Moves files under `<trashDir>/<batch>/`, keeping their path relative to the
 * scan root so they can be put back by hand.
 */
export class TrashRemover implements FileRemover {
  readonly method = "trash";
  readonly location: string;

  constructor(
    trashDir: string,
    private readonly root: string,
    batch: string = new Date().toISOString().replace(/[:.]/g, "-"),
  ) {
    this.location = path.join(path.resolve(trashDir), batch);
  }

  destinationFor(file: string): string {
    const abs = path.resolve(file);
    let rel = path.relative(path.resolve(this.root), abs);
    if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
      // outside the root: keep the full path below the trash batch
      rel = abs.replace(/^([A-Za-z]:)?[\\/]+/, "");
    }
    return path.join(this.location, rel);
  }

  async remove(file: string): Promise<void> {
    const dest = this.destinationFor(file);
    await mkdir(path.dirname(dest), { recursive: true });
    try {
      await rename(file, dest);
    } catch (err) {
      if (!isErrno(err) || err.code !== "EXDEV") throw err;
      // different device: copy, carry the timestamps over, then unlink
      const st = await stat(file);
      await copyFile(file, dest);
      await utimes(dest, st.atime, st.mtime);
      await unlink(file);
    }
  }
}

export function createRemover({
  permanent = false,
  trashDir,
  root,
}: {
  permanent?: boolean;
  trashDir?: string;
  root: string;
}): FileRemover {
  if (permanent || !trashDir) return new PermanentRemover();
  return new TrashRemover(trashDir, root);
}

export type RemovalFailure = { path: string; error: string };

export type RemovalOutcome = {
  method: RemovalMethod;
  location?: string;
  dryRun: boolean;
  attempted: number;
  deleted: number;
  failed: number;
  freedBytes: number;
  failures: RemovalFailure[];
};

async function exists(file: string): Promise<boolean> {
  try {
    await stat(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove every delete target of a plan. Targets are independent: a failure is
 * recorded and the rest continue. A target whose keeper has disappeared since
 * the scan is left alone.
 */
export async function executeDeletionPlan(
  entries: readonly DeletionEntry[],
  remover: FileRemover,
  {
    dryRun = false,
    logger = new NullLogger(),
    observer,
  }: { dryRun?: boolean; logger?: Logger; observer?: ProgressObserver } = {},
): Promise<RemovalOutcome> {
  const outcome: RemovalOutcome = {
    method: remover.method,
    location: remover.location,
    dryRun,
    attempted: entries.length,
    deleted: 0,
    failed: 0,
    freedBytes: 0,
    failures: [],
  };
  const fail = (file: string, error: string) => {
    outcome.failed += 1;
    outcome.failures.push({ path: file, error });
    logger.warn("delete failed", { path: file, error });
  };

  observer?.stageStart?.("delete", entries.length);
  let completed = 0;
  for (const { target, keep, size } of entries) {
    completed += 1;
    if (!(await exists(keep.path))) {
      fail(target.path, `kept copy '${keep.path}' is missing`);
    } else if (dryRun) {
      outcome.deleted += 1;
      outcome.freedBytes += size;
      logger.debug("would delete", { path: target.path, keep: keep.path });
    } else {
      try {
        await remover.remove(target.path);
        outcome.deleted += 1;
        outcome.freedBytes += size;
        logger.debug("deleted", { path: target.path, method: remover.method });
      } catch (err) {
        fail(target.path, errorMessage(err));
      }
    }
    observer?.progress?.({
      stage: "delete",
      completedFiles: completed,
      totalFiles: entries.length,
    });
  }
  observer?.stageEnd?.("delete", outcome.deleted);
  return outcome;
}
