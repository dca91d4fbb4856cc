import type { DuplicateGroup } from "./funnel.js";
import type { FileRecord } from "./walk.js";

/**
 * How to pick the keeper among files with the same mtime. All members are
 * identical, so any choice is correct; "path" is reproducible across
 * platforms, "discovery" follows traversal order.
 */
export type TieBreak = "path" | "discovery";
export const TIE_BREAKS: TieBreak[] = ["path", "discovery"];

export type DeletionEntry = {
  target: FileRecord;
  keep: FileRecord;
  size: number;
};

export type DeletionDecision = {
  digest: string;
  size: number;
  keep: FileRecord;
  remove: DeletionEntry[];
};

export type ScanStatistics = {
  groups: number;
  totalFiles: number;
  filesToKeep: number;
  filesToDelete: number;
  /** bytes of one copy per group */
  totalBytes: number;
  /** bytes held by the extra copies */
  wastedBytes: number;
};

export type DeletionPlan = {
  decisions: DeletionDecision[];
  entries: DeletionEntry[];
  stats: ScanStatistics;
};

export function compareForKeep(tieBreak: TieBreak) {
  return (a: FileRecord, b: FileRecord): number => {
    if (a.mtime !== b.mtime) return a.mtime - b.mtime;
    if (tieBreak === "path") {
      if (a.path !== b.path) return a.path < b.path ? -1 : 1;
      return 0;
    }
    return a.order - b.order;
  };
}

export function decideGroup(
  group: DuplicateGroup,
  tieBreak: TieBreak = "path",
): DeletionDecision {
  const [keep, ...rest] = [...group.files].sort(compareForKeep(tieBreak));
  return {
    digest: group.digest,
    size: group.size,
    keep,
    remove: rest.map((target) => ({ target, keep, size: group.size })),
  };
}

export function computeStatistics(
  groups: readonly DuplicateGroup[],
): ScanStatistics {
  const stats: ScanStatistics = {
    groups: groups.length,
    totalFiles: 0,
    filesToKeep: 0,
    filesToDelete: 0,
    totalBytes: 0,
    wastedBytes: 0,
  };
  for (const g of groups) {
    const extra = g.files.length - 1;
    stats.totalFiles += g.files.length;
    stats.filesToKeep += 1;
    stats.filesToDelete += extra;
    stats.totalBytes += g.size;
    stats.wastedBytes += g.size * extra;
  }
  return stats;
}

/** Classify every group into one keeper and its delete targets. No I/O. */
export function planDeletions(
  groups: readonly DuplicateGroup[],
  { tieBreak = "path" }: { tieBreak?: TieBreak } = {},
): DeletionPlan {
  const decisions = groups.map((g) => decideGroup(g, tieBreak));
  return {
    decisions,
    entries: decisions.flatMap((d) => d.remove),
    stats: computeStatistics(groups),
  };
}

export function wastePercent(stats: ScanStatistics): number {
  const denominator = stats.totalBytes + stats.wastedBytes;
  return denominator > 0 ? (stats.wastedBytes / denominator) * 100 : 0;
}
