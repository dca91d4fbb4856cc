export {
  findDuplicates,
  type DuplicateGroup,
  type FunnelOptions,
  type FunnelResult,
  type FunnelStage,
  type FunnelStageCounts,
} from "./funnel.js";

export {
  planDeletions,
  decideGroup,
  computeStatistics,
  wastePercent,
  type DeletionDecision,
  type DeletionEntry,
  type DeletionPlan,
  type ScanStatistics,
  type TieBreak,
} from "./planner.js";

export {
  createDigestExecutor,
  SequentialExecutor,
  WorkerPoolExecutor,
  threadWorkerSpawner,
  type DigestExecutor,
  type DigestResults,
  type DigestWorker,
  type SpawnDigestWorker,
} from "./executor.js";

export {
  partialDigest,
  fullDigest,
  normalizeHashAlg,
  listSupportedHashes,
  type HashAlg,
  type DigestKind,
} from "./hash.js";

export { walkFiles, type FileRecord, type WalkOptions } from "./walk.js";

export {
  createRemover,
  executeDeletionPlan,
  PermanentRemover,
  TrashRemover,
  type FileRemover,
  type RemovalOutcome,
} from "./remove.js";

export {
  formatDeletionLog,
  writeDeletionLog,
  renderStatistics,
  renderExamples,
  humanFileSize,
} from "./report.js";

export { runScan, type ScanOutcome, type ScanRunOptions } from "./scan.js";

export {
  resolveScanConfig,
  ConfigError,
  RootPathError,
  type ScanConfig,
} from "./config.js";

export type { ProgressObserver, ScanStage } from "./progress.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
