import ignore from "ignore";
import path from "node:path";

export type Ignorer = {
  /** path relative to the root */
  ignoresFile: (rel: string) => boolean;
  ignoresDir: (rel: string) => boolean;
};

/** Forward slashes, no leading slash: the form `ignore` matches against. */
export function normalizeR(rel: string): string {
  return rel.split(path.sep).join("/").replace(/^\/+/, "");
}

export function toRel(abs: string, root: string): string {
  return normalizeR(path.relative(root, abs));
}

/** Trimmed, slash-normalized, blank-free and deduplicated. */
export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const cleaned = patterns
    .map((p) => p.trim().replace(/\\/g, "/"))
    .filter((p) => p.length > 0);
  return [...new Set(cleaned)];
}

/** commander collector: `--opt a,b --opt c` gives ["a", "b", "c"] */
export function collectListOption(value: string, previous: string[] = []): string[] {
  const added = value.split(",").flatMap((part) => {
    const item = part.trim();
    return item ? [item] : [];
  });
  return previous.concat(added);
}

export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return {
      ignoresFile: () => false,
      ignoresDir: () => false,
    };
  }
  const ig = ignore().add(cleaned);
  return {
    ignoresFile: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && ig.ignores(rel);
    },
    // trailing slash so "build/" style rules match directories only
    ignoresDir: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && ig.ignores(`${rel}/`);
    },
  };
}

/**
 * Ignore rule for a directory that lives inside the scanned root (e.g. the
 * trash directory), so a later scan never re-reads what an earlier one moved
 * there.
 */
export function autoIgnoreForRoot(root: string, dir: string): string[] {
  const rel = path.relative(path.resolve(root), path.resolve(dir));
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return [];
  return [`/${normalizeR(rel)}/`];
}
