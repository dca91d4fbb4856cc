// src/hash-worker.ts
import { parentPort } from "node:worker_threads";
import { digestBatch, type DigestJob } from "./digest-batch.js";

const port = parentPort;
if (!port) {
  throw new Error("hash-worker must be run as a worker");
}

port.on("message", (job: DigestJob) => {
  digestBatch(job).then(
    (done) => port.postMessage({ done }),
    (err: unknown) => {
      // digestBatch absorbs per-file errors; anything here is a bug, so crash
      // the worker and let the pool fail the in-flight files
      setImmediate(() => {
        throw err;
      });
    },
  );
});
