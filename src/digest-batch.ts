import { computeDigest, type DigestKind } from "./hash.js";
import { errorMessage } from "./logger.js";

export type DigestJob = {
  kind: DigestKind;
  alg: string;
  paths: string[];
  partialBytes?: number;
  chunkBytes?: number;
};

export type DigestReply =
  | { path: string; digest: string }
  | { path: string; error: string };

export type DigestBatchMessage = { done: DigestReply[] };

/**
 * Digest every path of a job, one at a time. A failing file becomes an error
 * reply; the rest of the batch still runs.
 */
export async function digestBatch(job: DigestJob): Promise<DigestReply[]> {
  const { kind, alg, paths, partialBytes, chunkBytes } = job;
  const out: DigestReply[] = [];
  for (const path of paths) {
    try {
      const digest = await computeDigest(kind, path, {
        alg,
        partialBytes,
        chunkBytes,
      });
      out.push({ path, digest });
    } catch (err) {
      // Common case: file vanished mid-scan or permission error
      out.push({ path, error: errorMessage(err) });
    }
  }
  return out;
}
