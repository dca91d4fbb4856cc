// src/executor.ts
import { Worker } from "node:worker_threads";
import fs from "node:fs";
import path from "node:path";
import {
  digestBatch,
  type DigestBatchMessage,
  type DigestJob,
  type DigestReply,
} from "./digest-batch.js";
import type { DigestKind } from "./hash.js";
import {
  DIGEST_CHUNK_BYTES,
  FULL_DISPATCH_BATCH,
  PARTIAL_DIGEST_BYTES,
  PARTIAL_DISPATCH_BATCH,
} from "./constants.js";
import { NullLogger, errorMessage, type Logger } from "./logger.js";
import type { ProgressObserver } from "./progress.js";

/** One entry per input path; null means the file could not be read. */
export type DigestResults = Map<string, string | null>;

export type DigestTarget = { path: string; size: number };

export type DigestSettings = {
  alg: string;
  partialBytes: number;
  chunkBytes: number;
  partialBatch: number;
  fullBatch: number;
};

export type DigestRunOptions = {
  batchSize?: number;
  observer?: ProgressObserver;
};

export interface DigestExecutor {
  readonly mode: "pool" | "sequential";
  readonly concurrency: number;
  run(
    kind: DigestKind,
    files: readonly DigestTarget[],
    opts?: DigestRunOptions,
  ): Promise<DigestResults>;
  close(): Promise<void>;
}

/** The minimal surface the pool needs from a worker. */
export interface DigestWorker {
  send(job: DigestJob): void;
  onReply(listener: (replies: DigestReply[]) => void): void;
  onFailure(listener: (err: Error) => void): void;
  terminate(): Promise<void>;
}

export type SpawnDigestWorker = () => DigestWorker;

export function defaultWorkerScript(): string {
  return path.join(__dirname, "hash-worker.js");
}

export function threadWorkerSpawner(script: string): SpawnDigestWorker {
  return () => {
    const w = new Worker(script);
    let terminating = false;
    return {
      send: (job) => w.postMessage(job),
      onReply: (listener) => {
        w.on("message", (msg: DigestBatchMessage) => listener(msg.done));
      },
      onFailure: (listener) => {
        w.on("error", listener);
        w.on("exit", (code) => {
          if (!terminating && code !== 0) {
            listener(new Error(`hash worker exited with code ${code}`));
          }
        });
      },
      terminate: async () => {
        terminating = true;
        await w.terminate();
      },
    };
  };
}

export function resolveDigestSettings(
  partial: Partial<DigestSettings> & { alg: string },
): DigestSettings {
  return {
    alg: partial.alg,
    partialBytes: partial.partialBytes ?? PARTIAL_DIGEST_BYTES,
    chunkBytes: partial.chunkBytes ?? DIGEST_CHUNK_BYTES,
    partialBatch: partial.partialBatch ?? PARTIAL_DISPATCH_BATCH,
    fullBatch: partial.fullBatch ?? FULL_DISPATCH_BATCH,
  };
}

function uniqueTargets(files: readonly DigestTarget[]): DigestTarget[] {
  const seen = new Set<string>();
  const out: DigestTarget[] = [];
  for (const f of files) {
    if (seen.has(f.path)) continue;
    seen.add(f.path);
    out.push(f);
  }
  return out;
}

// Fan-in for one run: the only writer to the results map.
class DigestRun {
  readonly results: DigestResults = new Map();
  readonly finished: Promise<void>;
  private readonly resolveFinished: () => void;
  private readonly sizes = new Map<string, number>();
  private readonly totalBytes: number;
  private completedBytes = 0;

  constructor(
    private readonly kind: DigestKind,
    files: readonly DigestTarget[],
    private readonly observer: ProgressObserver | undefined,
    private readonly logger: Logger,
  ) {
    let total = 0;
    for (const f of files) {
      this.sizes.set(f.path, f.size);
      total += f.size;
    }
    this.totalBytes = total;
    let resolveFinished: () => void = () => {};
    this.finished = new Promise<void>((resolve) => {
      resolveFinished = resolve;
    });
    this.resolveFinished = resolveFinished;
    if (!files.length) this.resolveFinished();
  }

  settle(reply: DigestReply): void {
    const size = this.sizes.get(reply.path);
    if (size === undefined || this.results.has(reply.path)) return;
    if ("digest" in reply) {
      this.results.set(reply.path, reply.digest);
    } else {
      this.results.set(reply.path, null);
      this.logger.debug("unreadable file dropped", {
        stage: this.kind,
        path: reply.path,
        error: reply.error,
      });
    }
    this.completedBytes += size;
    this.observer?.progress?.({
      stage: this.kind,
      completedFiles: this.results.size,
      totalFiles: this.sizes.size,
      completedBytes: this.completedBytes,
      totalBytes: this.totalBytes,
    });
    if (this.results.size === this.sizes.size) this.resolveFinished();
  }
}

function jobFor(
  kind: DigestKind,
  paths: string[],
  settings: DigestSettings,
): DigestJob {
  return {
    kind,
    alg: settings.alg,
    paths,
    partialBytes: settings.partialBytes,
    chunkBytes: settings.chunkBytes,
  };
}

/** Single defined fallback: digest in input order on the calling thread. */
export class SequentialExecutor implements DigestExecutor {
  readonly mode = "sequential";
  readonly concurrency = 1;

  constructor(
    private readonly settings: DigestSettings,
    private readonly logger: Logger = new NullLogger(),
  ) {}

  async run(
    kind: DigestKind,
    files: readonly DigestTarget[],
    { observer }: DigestRunOptions = {},
  ): Promise<DigestResults> {
    const targets = uniqueTargets(files);
    const state = new DigestRun(kind, targets, observer, this.logger);
    for (const f of targets) {
      const replies = await digestBatch(jobFor(kind, [f.path], this.settings));
      for (const r of replies) state.settle(r);
    }
    await state.finished;
    return state.results;
  }

  async close(): Promise<void> {}
}

/**
 * Bounded pool of digest workers. Batches go to whichever worker is free;
 * replies fan in to the active run keyed by path, so completion order does not
 * matter. A worker that dies has its in-flight files reported as unreadable and
 * is replaced.
 */
export class WorkerPoolExecutor implements DigestExecutor {
  readonly mode = "pool";
  private readonly workers = new Set<DigestWorker>();
  private readonly freeWorkers: DigestWorker[] = [];
  private readonly waiters: Array<(w: DigestWorker) => void> = [];
  private readonly inFlight = new Map<DigestWorker, string[]>();
  private active: DigestRun | null = null;
  private closed = false;

  constructor(
    private readonly spawn: SpawnDigestWorker,
    readonly concurrency: number,
    private readonly settings: DigestSettings,
    private readonly logger: Logger = new NullLogger(),
  ) {
    for (let i = 0; i < concurrency; i++) {
      this.addWorker();
    }
  }

  private addWorker(): void {
    const w = this.spawn();
    this.workers.add(w);
    w.onReply((replies) => this.handleReply(w, replies));
    w.onFailure((err) => this.handleFailure(w, err));
    this.release(w);
  }

  private release(w: DigestWorker): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(w);
    } else {
      this.freeWorkers.push(w);
    }
  }

  private nextWorker(): Promise<DigestWorker> {
    return new Promise((resolve) => {
      const w = this.freeWorkers.pop();
      if (w) return resolve(w);
      this.waiters.push(resolve);
    });
  }

  private handleReply(w: DigestWorker, replies: DigestReply[]): void {
    const sent = this.inFlight.get(w) ?? [];
    this.inFlight.delete(w);
    const run = this.active;
    if (run) {
      for (const r of replies) run.settle(r);
      // a reply must cover its whole batch; anything missing counts as unreadable
      for (const p of sent) {
        if (!run.results.has(p)) {
          run.settle({ path: p, error: "no reply from hash worker" });
        }
      }
    }
    if (this.workers.has(w)) this.release(w);
  }

  private handleFailure(w: DigestWorker, err: Error): void {
    if (!this.workers.has(w)) return;
    this.workers.delete(w);
    const idx = this.freeWorkers.indexOf(w);
    if (idx >= 0) this.freeWorkers.splice(idx, 1);
    const lost = this.inFlight.get(w) ?? [];
    this.inFlight.delete(w);
    this.logger.warn("hash worker failed", {
      error: err.message,
      inFlight: lost.length,
    });
    for (const p of lost) {
      this.active?.settle({ path: p, error: err.message });
    }
    if (!this.closed) this.addWorker();
  }

  async run(
    kind: DigestKind,
    files: readonly DigestTarget[],
    { batchSize, observer }: DigestRunOptions = {},
  ): Promise<DigestResults> {
    if (this.closed) throw new Error("digest executor is closed");
    if (this.active) {
      throw new Error("digest executor is already running a batch");
    }
    const targets = uniqueTargets(files);
    const size = Math.max(
      1,
      batchSize ??
        (kind === "partial"
          ? this.settings.partialBatch
          : this.settings.fullBatch),
    );
    const state = new DigestRun(kind, targets, observer, this.logger);
    this.active = state;
    try {
      for (let i = 0; i < targets.length; i += size) {
        const batch = targets.slice(i, i + size).map((f) => f.path);
        const w = await this.nextWorker();
        this.inFlight.set(w, batch);
        try {
          w.send(jobFor(kind, batch, this.settings));
        } catch (err) {
          this.handleFailure(
            w,
            err instanceof Error ? err : new Error(errorMessage(err)),
          );
        }
      }
      await state.finished;
    } finally {
      this.active = null;
    }
    return state.results;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const all = Array.from(this.workers);
    this.workers.clear();
    this.freeWorkers.length = 0;
    await Promise.all(all.map((w) => w.terminate()));
  }
}

export type ExecutorOptions = Partial<DigestSettings> & {
  alg: string;
  workers: number;
  spawn?: SpawnDigestWorker;
  workerScript?: string;
  logger?: Logger;
};

/**
 * Picks the worker pool when more than one worker is wanted and a worker can
 * be started, and the sequential executor otherwise.
 */
export function createDigestExecutor(opts: ExecutorOptions): DigestExecutor {
  const logger = opts.logger ?? new NullLogger();
  const settings = resolveDigestSettings(opts);
  if (opts.workers <= 1) {
    return new SequentialExecutor(settings, logger);
  }
  let spawn = opts.spawn;
  if (!spawn) {
    const script = opts.workerScript ?? defaultWorkerScript();
    if (!fs.existsSync(script)) {
      logger.debug("hash worker script not found; hashing sequentially", {
        script,
      });
      return new SequentialExecutor(settings, logger);
    }
    spawn = threadWorkerSpawner(script);
  }
  return new WorkerPoolExecutor(spawn, opts.workers, settings, logger);
}
