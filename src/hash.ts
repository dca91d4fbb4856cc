// src/hash.ts
import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { createHash, getHashes } from "node:crypto";
import { DIGEST_CHUNK_BYTES, PARTIAL_DIGEST_BYTES } from "./constants.js";

const ENCODING = "hex";

export const CURATED_HASH_ALGOS = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export type DigestKind = "partial" | "full";

/** Short names accepted on the command line. */
export const HASH_ALIASES: Readonly<Record<string, HashAlg>> = {
  blake2b: "blake2b512",
  blake2s: "blake2s256",
};

export function defaultHashAlg(): HashAlg {
  return "md5";
}

let available: HashAlg[] | undefined;

/** Curated algorithms the running OpenSSL build provides. */
export function listSupportedHashes(): HashAlg[] {
  if (!available) {
    const runtime = new Set(getHashes().map((h) => h.toLowerCase()));
    available = CURATED_HASH_ALGOS.filter((alg) => runtime.has(alg));
  }
  return available;
}

/** Every name `--hash` accepts: supported algorithms plus their aliases. */
export function hashChoices(): string[] {
  const supported = listSupportedHashes();
  const aliases = Object.entries(HASH_ALIASES)
    .filter(([, alg]) => supported.includes(alg))
    .map(([alias]) => alias);
  return [...supported, ...aliases];
}

export function normalizeHashAlg(requested?: string): HashAlg {
  if (!requested) return defaultHashAlg();
  const name = requested.trim().toLowerCase();
  const wanted = HASH_ALIASES[name] ?? name;
  const supported = listSupportedHashes();
  const match = supported.find((alg) => alg === wanted);
  if (!match) {
    throw new Error(
      `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${supported.join(", ")}`,
    );
  }
  return match;
}

/**
 * Digest of at most the first `bytes` bytes of a file. A file shorter than
 * `bytes` is hashed whole.
 */
export async function partialDigest(
  alg: string,
  path: string,
  bytes: number = PARTIAL_DIGEST_BYTES,
): Promise<string> {
  const fh = await open(path, "r");
  try {
    const buf = Buffer.alloc(bytes);
    let filled = 0;
    // short reads are legal; keep going until EOF or the buffer is full
    while (filled < bytes) {
      const { bytesRead } = await fh.read(buf, filled, bytes - filled, filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return createHash(alg).update(buf.subarray(0, filled)).digest(ENCODING);
  } finally {
    await fh.close();
  }
}

/** Digest of the whole file, streamed in `chunkBytes` reads. */
export async function fullDigest(
  alg: string,
  path: string,
  chunkBytes: number = DIGEST_CHUNK_BYTES,
): Promise<string> {
  const h = createHash(alg);
  const rs = createReadStream(path, { highWaterMark: chunkBytes });

  await pipeline(rs, async (src: AsyncIterable<Buffer>) => {
    for await (const chunk of src) h.update(chunk);
  });

  return h.digest(ENCODING);
}

export type DigestOptions = {
  alg: string;
  partialBytes?: number;
  chunkBytes?: number;
};

export async function computeDigest(
  kind: DigestKind,
  path: string,
  { alg, partialBytes, chunkBytes }: DigestOptions,
): Promise<string> {
  return kind === "partial"
    ? partialDigest(alg, path, partialBytes)
    : fullDigest(alg, path, chunkBytes);
}
