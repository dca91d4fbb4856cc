import fsp from "node:fs/promises";
import { join } from "node:path";
import { DEFAULT_SKIP_DIRS } from "../constants.js";
import {
  createDigestExecutor,
  resolveDigestSettings,
  SequentialExecutor,
  type DigestExecutor,
} from "../executor.js";
import { findDuplicates, type FunnelStage } from "../funnel.js";
import type { DigestKind } from "../hash.js";
import type { FileRecord } from "../walk.js";
import { inProcessSpawner, membership, mkTmp, writeFileAt } from "./util";

const sequential = () => new SequentialExecutor(resolveDigestSettings({ alg: "md5" }));

// Claims every file has the same digest; only byte comparison can tell them apart.
function constantExecutor(digest: string): DigestExecutor & { calls: DigestKind[] } {
  const calls: DigestKind[] = [];
  return {
    mode: "sequential",
    concurrency: 1,
    calls,
    async run(kind, files) {
      calls.push(kind);
      return new Map(files.map((f): [string, string] => [f.path, digest]));
    },
    async close() {},
  };
}

describe("findDuplicates", () => {
  let tmp: string;
  const big = Buffer.alloc(10_000, 0x61);
  const bigTail = Buffer.from(big);
  bigTail[bigTail.length - 1] = 0x62;

  beforeAll(async () => {
    tmp = await mkTmp("dupsweep-funnel-");
    await writeFileAt(tmp, "dup/one.txt", "same content here", 1_000);
    await writeFileAt(tmp, "dup/two.txt", "same content here", 2_000);
    await writeFileAt(tmp, "dup/three.txt", "same content here", 3_000);
    await writeFileAt(tmp, "b/left.txt", "abcd1");
    await writeFileAt(tmp, "b/right.txt", "abcd2");
    await writeFileAt(tmp, "themes/c1.txt", "themed dup");
    await writeFileAt(tmp, "themes/c2.txt", "themed dup");
    await writeFileAt(tmp, "unique.txt", "unique file contents");
    await writeFileAt(tmp, "zero/e1.txt", "");
    await writeFileAt(tmp, "zero/e2.txt", "");
    await writeFileAt(tmp, "big/head-only.bin", big);
    await writeFileAt(tmp, "big/tail-differs.bin", bigTail);
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  const p = (rel: string) => join(tmp, rel);

  test("groups identical files and nothing else", async () => {
    const result = await findDuplicates(tmp, {
      executor: sequential(),
      skipDirs: DEFAULT_SKIP_DIRS,
    });
    expect(membership(result.groups)).toEqual([
      [p("dup/one.txt"), p("dup/three.txt"), p("dup/two.txt")],
      [p("zero/e1.txt"), p("zero/e2.txt")],
    ]);
    expect(result.groups.map((g) => g.size)).toEqual([17, 0]);
    expect(result.root).toBe(tmp);
  });

  test("reports how many files survive each stage", async () => {
    const { counts } = await findDuplicates(tmp, {
      executor: sequential(),
      skipDirs: DEFAULT_SKIP_DIRS,
    });
    expect(counts).toEqual({
      scannedFiles: 10,
      scannedBytes: 51 + 10 + 20 + 20_000,
      sizeCandidates: 9,
      partialCandidates: 7,
      fullCandidates: 5,
      unreadable: 0,
      walkErrors: 0,
    });
  });

  test("equal-size files with different content never group", async () => {
    const result = await findDuplicates(tmp, { executor: sequential() });
    const grouped = result.groups.flatMap((g) => g.files.map((f) => f.path));
    expect(grouped).not.toContain(p("b/left.txt"));
    expect(grouped).not.toContain(p("big/head-only.bin"));
  });

  test("files under a skipped directory never reach any stage", async () => {
    const seen: string[] = [];
    const result = await findDuplicates(tmp, {
      executor: sequential(),
      skipDirs: ["themes"],
      inspect: (_stage, survivors) => {
        seen.push(...survivors.map((f) => f.path));
      },
    });
    expect(seen.filter((s) => s.includes("themes"))).toEqual([]);
    expect(result.groups).toHaveLength(2);

    const unskipped = await findDuplicates(tmp, { executor: sequential() });
    expect(membership(unskipped.groups)).toContainEqual([
      p("themes/c1.txt"),
      p("themes/c2.txt"),
    ]);
  });

  test("each stage only narrows the previous one", async () => {
    const stages = new Map<FunnelStage, string[]>();
    await findDuplicates(tmp, {
      executor: sequential(),
      skipDirs: DEFAULT_SKIP_DIRS,
      inspect: (stage, survivors) => {
        stages.set(
          stage,
          survivors.map((f) => f.path),
        );
      },
    });
    const size = stages.get("size") ?? [];
    const partial = stages.get("partial") ?? [];
    const full = stages.get("full") ?? [];
    expect(size).toHaveLength(9);
    expect(partial.every((f) => size.includes(f))).toBe(true);
    expect(full.every((f) => partial.includes(f))).toBe(true);
    expect(partial).toContain(p("big/head-only.bin"));
    expect(full).not.toContain(p("big/head-only.bin"));
  });

  test("group members really are byte-identical", async () => {
    const { groups } = await findDuplicates(tmp, {
      executor: sequential(),
      skipDirs: DEFAULT_SKIP_DIRS,
    });
    for (const g of groups) {
      const [first, ...rest] = await Promise.all(
        g.files.map((f) => fsp.readFile(f.path)),
      );
      for (const other of rest) expect(other.equals(first)).toBe(true);
    }
  });

  test("a worker pool finds the same groups as sequential digesting", async () => {
    const spawn = inProcessSpawner();
    const pool = createDigestExecutor({
      alg: "md5",
      workers: 3,
      partialBatch: 2,
      fullBatch: 1,
      spawn,
    });
    try {
      const viaPool = await findDuplicates(tmp, { executor: pool });
      const viaSeq = await findDuplicates(tmp, { executor: sequential() });
      expect(pool.mode).toBe("pool");
      expect(membership(viaPool.groups)).toEqual(membership(viaSeq.groups));
      expect(viaPool.groups.map((g) => g.digest)).toEqual(
        viaSeq.groups.map((g) => g.digest),
      );
      expect(viaPool.counts).toEqual(viaSeq.counts);
      expect(spawn.stats.spawned).toBe(3);
    } finally {
      await pool.close();
    }
  });

  test("repeated scans of an unchanged tree agree", async () => {
    const a = await findDuplicates(tmp, { executor: sequential() });
    const b = await findDuplicates(tmp, { executor: sequential() });
    expect(membership(b.groups)).toEqual(membership(a.groups));
    expect(b.groups.map((g) => g.digest)).toEqual(a.groups.map((g) => g.digest));
    expect(b.counts).toEqual(a.counts);
  });
});

describe("findDuplicates edge cases", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("dupsweep-funnel-edge-");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("an empty root yields no groups and no error", async () => {
    const executor = constantExecutor("x");
    const result = await findDuplicates(tmp, { executor });
    expect(result.groups).toEqual([]);
    expect(result.counts).toEqual({
      scannedFiles: 0,
      scannedBytes: 0,
      sizeCandidates: 0,
      partialCandidates: 0,
      fullCandidates: 0,
      unreadable: 0,
      walkErrors: 0,
    });
    expect(executor.calls).toEqual([]);
  });

  test("a file that vanishes before digesting collapses its group", async () => {
    const keep = await writeFileAt(tmp, "d/keep.txt", "pair");
    const gone = await writeFileAt(tmp, "d/gone.txt", "pair");
    const x = await writeFileAt(tmp, "e/x.txt", "other pair");
    const y = await writeFileAt(tmp, "e/y.txt", "other pair");
    const result = await findDuplicates(tmp, {
      executor: sequential(),
      inspect: async (stage, survivors: readonly FileRecord[]) => {
        if (stage === "size") {
          expect(survivors.map((f) => f.path)).toContain(gone);
          await fsp.rm(gone);
        }
      },
    });
    expect(membership(result.groups)).toEqual([[x, y]]);
    expect(result.counts.unreadable).toBe(1);
    expect(result.groups.flatMap((g) => g.files.map((f) => f.path))).not.toContain(
      keep,
    );
  });

  test("verification splits files that only share a digest", async () => {
    const x = await writeFileAt(tmp, "x.txt", "aaaa");
    await writeFileAt(tmp, "y.txt", "bbbb");
    const z = await writeFileAt(tmp, "z.txt", "aaaa");

    const trusting = await findDuplicates(tmp, {
      executor: constantExecutor("collide"),
    });
    expect(trusting.groups).toHaveLength(1);
    expect(trusting.groups[0].files).toHaveLength(3);

    const verified = await findDuplicates(tmp, {
      executor: constantExecutor("collide"),
      verify: true,
      chunkBytes: 2,
    });
    expect(membership(verified.groups)).toEqual([[x, z]]);
    expect(verified.groups[0].digest).toBe("collide");
    expect(verified.counts.fullCandidates).toBe(2);
  });

  test("an aborted signal stops the scan between stages", async () => {
    await writeFileAt(tmp, "a.txt", "dup");
    await writeFileAt(tmp, "b.txt", "dup");
    const controller = new AbortController();
    const executor = constantExecutor("x");
    const run = findDuplicates(tmp, {
      executor,
      signal: controller.signal,
      inspect: (stage) => {
        if (stage === "size") controller.abort(new Error("scan cancelled"));
      },
    });
    await expect(run).rejects.toThrow("scan cancelled");
    expect(executor.calls).toEqual([]);
  });

  test("an already aborted signal fails before walking", async () => {
    const controller = new AbortController();
    controller.abort(new Error("too late"));
    await expect(
      findDuplicates(tmp, { executor: constantExecutor("x"), signal: controller.signal }),
    ).rejects.toThrow("too late");
  });
});
