// src/report.ts
import { writeFile } from "node:fs/promises";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { EXAMPLE_GROUPS } from "./constants.js";
import {
  wastePercent,
  type DeletionDecision,
  type DeletionPlan,
  type ScanStatistics,
} from "./planner.js";
import type { RemovalOutcome } from "./remove.js";

export const numberFormatter = new Intl.NumberFormat("en-US");

export function humanFileSize(bytes: number): string {
  if (!Number.isFinite(bytes)) return "-";
  const sign = bytes < 0 ? -1 : 1;
  let value = Math.abs(bytes);
  const units = ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB"];
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }
  const formatted = value >= 10 ? value.toFixed(1) : value.toFixed(2);
  return `${sign < 0 ? "-" : ""}${formatted.replace(/\.0+$/, "")} ${units[unitIndex]}`;
}

const pad2 = (n: number) => String(n).padStart(2, "0");

/** Local time as "YYYY-MM-DD HH:MM:SS"; input in seconds. */
export function formatDate(seconds: number): string {
  if (!Number.isFinite(seconds)) return "unknown";
  const d = new Date(seconds * 1000);
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  );
}

function fieldTable(title: string): AsciiTable3 {
  const table = new AsciiTable3(title)
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  table.setAlign(2, AlignmentEnum.RIGHT);
  return table;
}

export function renderStatistics(stats: ScanStatistics): string {
  const table = fieldTable("Duplicate Analysis");
  table.addRow("Duplicate groups", numberFormatter.format(stats.groups));
  table.addRow("Duplicate files", numberFormatter.format(stats.totalFiles));
  table.addRow("Files to keep (oldest)", numberFormatter.format(stats.filesToKeep));
  table.addRow(
    "Files to delete (newer)",
    numberFormatter.format(stats.filesToDelete),
  );
  table.addRow("Original data size", humanFileSize(stats.totalBytes));
  table.addRow("Wasted space", humanFileSize(stats.wastedBytes));
  table.addRow("Waste percentage", `${wastePercent(stats).toFixed(1)}%`);
  return table.toString();
}

export function renderExamples(
  decisions: readonly DeletionDecision[],
  limit = EXAMPLE_GROUPS,
): string {
  const lines: string[] = [];
  decisions.slice(0, limit).forEach((d, i) => {
    lines.push(`Group ${i + 1}:`);
    lines.push(`  KEEP (oldest):   ${d.keep.path}`);
    lines.push(`                   ${formatDate(d.keep.mtime)}`);
    for (const { target } of d.remove) {
      lines.push(`  DELETE (newer):  ${target.path}`);
      lines.push(`                   ${formatDate(target.mtime)}`);
    }
    lines.push("");
  });
  if (decisions.length > limit) {
    lines.push(`... and ${decisions.length - limit} more groups`);
  }
  return lines.join("\n");
}

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);

/** Plain text log of the whole plan, one block per group, sorted by keeper. */
export function formatDeletionLog(plan: DeletionPlan): string {
  const { stats } = plan;
  const out: string[] = [
    "DUPLICATE CLEANUP LOG",
    RULE,
    "",
    `Total duplicate groups: ${numberFormatter.format(stats.groups)}`,
    `Files to delete: ${numberFormatter.format(stats.filesToDelete)}`,
    `Space to free: ${humanFileSize(stats.wastedBytes)}`,
    "",
    THIN_RULE,
    "",
  ];
  const sorted = [...plan.decisions].sort((a, b) =>
    a.keep.path < b.keep.path ? -1 : a.keep.path > b.keep.path ? 1 : 0,
  );
  sorted.forEach((d, i) => {
    out.push(`Group ${i + 1}`);
    out.push(`KEEP (oldest):   ${d.keep.path}`);
    out.push(`                 Modified: ${formatDate(d.keep.mtime)}`);
    out.push(`                 Size: ${humanFileSize(d.size)}`);
    out.push("");
    for (const { target, size } of d.remove) {
      out.push(`DELETE (newer):  ${target.path}`);
      out.push(`                 Modified: ${formatDate(target.mtime)}`);
      out.push(`                 Size: ${humanFileSize(size)}`);
      out.push("");
    }
    out.push(THIN_RULE);
    out.push("");
  });
  return out.join("\n");
}

export async function writeDeletionLog(
  file: string,
  plan: DeletionPlan,
): Promise<void> {
  await writeFile(file, formatDeletionLog(plan), "utf8");
}

export function renderOutcome(outcome: RemovalOutcome): string {
  const table = fieldTable(
    outcome.dryRun ? "Dry Run Complete" : "Operation Complete",
  );
  table.addRow(
    outcome.dryRun ? "Would delete" : "Deleted",
    numberFormatter.format(outcome.deleted),
  );
  table.addRow(
    outcome.dryRun ? "Would free" : "Freed",
    humanFileSize(outcome.freedBytes),
  );
  table.addRow("Failed", numberFormatter.format(outcome.failed));
  table.addRow("Method", outcome.method);
  if (outcome.location) table.addRow("Location", outcome.location);
  return table.toString();
}

/** JSON-friendly view of a plan for --json output. */
export function planToJson(plan: DeletionPlan) {
  return {
    stats: plan.stats,
    groups: plan.decisions.map((d) => ({
      digest: d.digest,
      size: d.size,
      keep: { path: d.keep.path, mtime: d.keep.mtime },
      delete: d.remove.map(({ target }) => ({
        path: target.path,
        mtime: target.mtime,
      })),
    })),
  };
}
