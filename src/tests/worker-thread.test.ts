import { createHash } from "node:crypto";
import fs from "node:fs";
import fsp from "node:fs/promises";
import { join, resolve } from "node:path";
import {
  createDigestExecutor,
  resolveDigestSettings,
  threadWorkerSpawner,
  WorkerPoolExecutor,
  type DigestTarget,
} from "../executor.js";
import { mkTmp, writeFileAt } from "./util";

const FIXTURE_WORKER = join(__dirname, "fixtures", "digest-worker.cjs");
const BUILT_WORKER = resolve(__dirname, "../../dist/hash-worker.js");

const md5 = (data: string) => createHash("md5").update(data).digest("hex");

describe("digest pool on real worker threads", () => {
  let tmp: string;
  let targets: DigestTarget[];

  beforeAll(async () => {
    tmp = await mkTmp("dupsweep-threads-");
    targets = [];
    for (let i = 0; i < 5; i++) {
      const content = `threaded ${i}`;
      targets.push({
        path: await writeFileAt(tmp, `t${i}.txt`, content),
        size: content.length,
      });
    }
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  const settings = resolveDigestSettings({ alg: "md5", fullBatch: 1 });

  test("replies from threads are keyed back to their paths", async () => {
    const pool = new WorkerPoolExecutor(
      threadWorkerSpawner(FIXTURE_WORKER),
      2,
      settings,
    );
    try {
      const results = await pool.run("full", targets);
      expect(results.size).toBe(5);
      targets.forEach((t, i) => {
        expect(results.get(t.path)).toBe(md5(`threaded ${i}`));
      });
    } finally {
      await pool.close();
    }
  });

  test("a thread that exits mid-batch loses only its own files", async () => {
    const crash = await writeFileAt(tmp, "crash.txt", "boom");
    const pool = new WorkerPoolExecutor(
      threadWorkerSpawner(FIXTURE_WORKER),
      2,
      settings,
    );
    try {
      const results = await pool.run("full", [
        ...targets,
        { path: crash, size: 4 },
      ]);
      expect(results.get(crash)).toBeNull();
      expect(results.get(targets[4].path)).toBe(md5("threaded 4"));
      // the replacement thread keeps serving later runs
      const again = await pool.run("full", targets.slice(0, 2));
      expect(again.get(targets[0].path)).toBe(md5("threaded 0"));
    } finally {
      await pool.close();
      await fsp.rm(crash);
    }
  });

  test("a closed pool refuses work", async () => {
    const pool = new WorkerPoolExecutor(
      threadWorkerSpawner(FIXTURE_WORKER),
      1,
      settings,
    );
    await pool.close();
    await expect(pool.run("full", targets)).rejects.toThrow(
      "digest executor is closed",
    );
  });

  // dist/ exists after `npm run build`
  const whenBuilt = fs.existsSync(BUILT_WORKER) ? test : test.skip;

  whenBuilt("the compiled hash worker answers partial and full jobs", async () => {
    const pool = createDigestExecutor({
      alg: "md5",
      workers: 2,
      workerScript: BUILT_WORKER,
    });
    try {
      expect(pool.mode).toBe("pool");
      const full = await pool.run("full", targets);
      const partial = await pool.run("partial", targets);
      targets.forEach((t, i) => {
        expect(full.get(t.path)).toBe(md5(`threaded ${i}`));
        expect(partial.get(t.path)).toBe(md5(`threaded ${i}`));
      });
    } finally {
      await pool.close();
    }
  });
});
