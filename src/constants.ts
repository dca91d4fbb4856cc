export const CLI_NAME = "dupsweep";

// first 8KB decides most non-duplicates
export const PARTIAL_DIGEST_BYTES = 8 * 1024;
export const DIGEST_CHUNK_BYTES = 256 * 1024;

// files per worker message; partial hashing is cheap so it ships bigger batches
export const PARTIAL_DISPATCH_BATCH = 50;
export const FULL_DISPATCH_BATCH = 20;

export const MAX_DEFAULT_WORKERS = 8;

export const DEFAULT_SKIP_DIRS: readonly string[] = [
  "$RECYCLE.BIN",
  "$Recycle.Bin",
  "System Volume Information",
  "themes",
];

export const TRASH_DIR_NAME = ".dupsweep-trash";

export const EXAMPLE_GROUPS = 5;
