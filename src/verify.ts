import { open, type FileHandle } from "node:fs/promises";
import { DIGEST_CHUNK_BYTES } from "./constants.js";
import { errorMessage } from "./logger.js";
import type { FileRecord } from "./walk.js";

export class UnreadableFileError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`cannot read '${path}': ${errorMessage(cause)}`);
    this.name = "UnreadableFileError";
  }
}

async function openOrFail(path: string): Promise<FileHandle> {
  try {
    return await open(path, "r");
  } catch (err) {
    throw new UnreadableFileError(path, err);
  }
}

async function fill(
  fh: FileHandle,
  path: string,
  buf: Buffer,
  position: number,
): Promise<number> {
  let filled = 0;
  try {
    while (filled < buf.length) {
      const { bytesRead } = await fh.read(
        buf,
        filled,
        buf.length - filled,
        position + filled,
      );
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
  } catch (err) {
    throw new UnreadableFileError(path, err);
  }
  return filled;
}

/**
 * Compare two files byte for byte. Throws UnreadableFileError naming the file
 * that could not be read.
 */
export async function sameContent(
  a: string,
  b: string,
  chunkBytes: number = DIGEST_CHUNK_BYTES,
): Promise<boolean> {
  const fa = await openOrFail(a);
  try {
    const fb = await openOrFail(b);
    try {
      const bufA = Buffer.alloc(chunkBytes);
      const bufB = Buffer.alloc(chunkBytes);
      let position = 0;
      for (;;) {
        const [na, nb] = await Promise.all([
          fill(fa, a, bufA, position),
          fill(fb, b, bufB, position),
        ]);
        if (na !== nb) return false;
        if (na === 0) return true;
        if (!bufA.subarray(0, na).equals(bufB.subarray(0, nb))) return false;
        position += na;
      }
    } finally {
      await fb.close();
    }
  } finally {
    await fa.close();
  }
}

/**
 * Split files that share a digest into classes of identical content. Each file
 * is compared against the first member of every existing class. Unreadable
 * files are reported and left out; classes keep discovery order.
 */
export async function splitByContent(
  files: readonly FileRecord[],
  {
    chunkBytes = DIGEST_CHUNK_BYTES,
    onUnreadable,
  }: {
    chunkBytes?: number;
    onUnreadable?: (file: FileRecord, err: UnreadableFileError) => void;
  } = {},
): Promise<FileRecord[][]> {
  const classes: FileRecord[][] = [];
  for (const file of files) {
    let placed = false;
    let unreadable = false;
    for (let i = 0; i < classes.length && !placed; i++) {
      const rep = classes[i][0];
      try {
        if (await sameContent(rep.path, file.path, chunkBytes)) {
          classes[i].push(file);
          placed = true;
        }
      } catch (err) {
        if (!(err instanceof UnreadableFileError)) throw err;
        if (err.path === file.path) {
          onUnreadable?.(file, err);
          unreadable = true;
          break;
        }
        // the representative went away; the next member takes its place
        onUnreadable?.(rep, err);
        classes[i].shift();
        if (!classes[i].length) classes.splice(i, 1);
        i--;
      }
    }
    if (!placed && !unreadable) classes.push([file]);
  }
  return classes;
}
