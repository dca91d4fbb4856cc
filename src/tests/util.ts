import fsp from "node:fs/promises";
import os from "node:os";
import { dirname, join } from "node:path";
import { digestBatch, type DigestJob, type DigestReply } from "../digest-batch.js";
import type { DigestWorker, SpawnDigestWorker } from "../executor.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), prefix));
}

/** Write a file (creating parents) and optionally pin its mtime, in seconds. */
export async function writeFileAt(
  root: string,
  rel: string,
  content: string | Buffer,
  mtime?: number,
): Promise<string> {
  const p = join(root, rel);
  await fsp.mkdir(dirname(p), { recursive: true });
  await fsp.writeFile(p, content);
  if (mtime !== undefined) {
    await fsp.utimes(p, mtime, mtime);
  }
  return p;
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export type InProcessOptions = {
  /** delay before job number n (counted across all workers) replies */
  delayMs?: (n: number) => number;
  /** make the worker die instead of replying */
  crashOn?: (job: DigestJob) => boolean;
};

export type InProcessSpawner = SpawnDigestWorker & {
  stats: { spawned: number; jobs: DigestJob[] };
};

/**
 * Stand-in for worker threads: runs digestBatch on the main thread after a
 * delay, so replies come back in a different order than jobs were sent.
 */
export function inProcessSpawner({
  delayMs = (n) => [15, 0, 8, 3][n % 4],
  crashOn,
}: InProcessOptions = {}): InProcessSpawner {
  const jobs: DigestJob[] = [];
  const stats = { spawned: 0, jobs };
  const spawn = (): DigestWorker => {
    stats.spawned += 1;
    let onReply: ((replies: DigestReply[]) => void) | undefined;
    let onFailure: ((err: Error) => void) | undefined;
    let terminated = false;
    const timers = new Set<NodeJS.Timeout>();
    return {
      send(job) {
        const n = stats.jobs.length;
        stats.jobs.push(job);
        const timer = setTimeout(() => {
          timers.delete(timer);
          if (terminated) return;
          if (crashOn?.(job)) {
            onFailure?.(new Error("worker crashed"));
            return;
          }
          digestBatch(job).then(
            (replies) => {
              if (!terminated) onReply?.(replies);
            },
            (err: Error) => onFailure?.(err),
          );
        }, delayMs(n));
        timers.add(timer);
      },
      onReply(listener) {
        onReply = listener;
      },
      onFailure(listener) {
        onFailure = listener;
      },
      async terminate() {
        terminated = true;
        for (const t of timers) clearTimeout(t);
        timers.clear();
      },
    };
  };
  return Object.assign(spawn, { stats });
}

/** Group membership as sorted path lists, sorted; for order-free comparison. */
export function membership(groups: { files: { path: string }[] }[]): string[][] {
  return groups
    .map((g) => g.files.map((f) => f.path).sort())
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}
