import type { Logger } from "./logger.js";

export type ScanStage = "walk" | "partial" | "full" | "verify" | "delete";

export type StageProgress = {
  stage: ScanStage;
  completedFiles: number;
  totalFiles?: number;
  completedBytes?: number;
  totalBytes?: number;
};

/**
 * Checkpoint callbacks invoked by the walk, digest and delete stages. Every
 * method is optional; observers never influence the result.
 */
export interface ProgressObserver {
  stageStart?(stage: ScanStage, totalFiles?: number): void;
  progress?(update: StageProgress): void;
  stageEnd?(stage: ScanStage, survivors: number): void;
}

export const WALK_PROGRESS_EVERY = 1000;

export function combineObservers(
  ...observers: (ProgressObserver | undefined)[]
): ProgressObserver {
  const list = observers.filter((o): o is ProgressObserver => o != null);
  return {
    stageStart(stage, totalFiles) {
      for (const o of list) o.stageStart?.(stage, totalFiles);
    },
    progress(update) {
      for (const o of list) o.progress?.(update);
    },
    stageEnd(stage, survivors) {
      for (const o of list) o.stageEnd?.(stage, survivors);
    },
  };
}

export function progressIntervalMs(): number {
  const raw = Number(process.env.DUPSWEEP_PROGRESS_MS ?? 3000);
  return Number.isFinite(raw) && raw >= 0 ? raw : 3000;
}

/**
 * Logs "progress" at info level, at most once per interval per stage, plus
 * once at the start and end of every stage.
 */
export function loggerProgressObserver(
  logger: Logger,
  {
    intervalMs = progressIntervalMs(),
    clock = () => Date.now(),
  }: { intervalMs?: number; clock?: () => number } = {},
): ProgressObserver {
  let lastEmit = 0;
  return {
    stageStart(stage, totalFiles) {
      lastEmit = clock();
      logger.info("stage start", { stage, totalFiles });
    },
    progress(update) {
      const now = clock();
      if (intervalMs > 0 && now - lastEmit < intervalMs) return;
      lastEmit = now;
      const { stage, completedFiles, totalFiles, completedBytes, totalBytes } =
        update;
      const percent =
        totalBytes
          ? Math.min(100, Math.round(((completedBytes ?? 0) / totalBytes) * 100))
          : totalFiles
            ? Math.min(100, Math.round((completedFiles / totalFiles) * 100))
            : undefined;
      logger.info("progress", {
        stage,
        completedFiles,
        totalFiles,
        completedBytes,
        totalBytes,
        percent,
      });
    },
    stageEnd(stage, survivors) {
      logger.info("stage complete", { stage, survivors });
    },
  };
}
