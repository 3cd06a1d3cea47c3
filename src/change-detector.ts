import { createHash } from "node:crypto";

/** A successfully scanned file: canonical path plus digest of its raw bytes. */
export interface ScannedFile {
  path: string;
  hash: string;
}

export type FileStatus = "new" | "modified" | "unchanged" | "deleted";

export type Classification = Record<FileStatus, string[]>;

/** MD5 hex digest of raw bytes (no text normalization, so whitespace edits count). */
export function hashBytes(bytes: Uint8Array): string {
  return createHash("md5").update(bytes).digest("hex");
}

/**
 * Sort a scan into new / modified / unchanged / deleted against the prior
 * hash table.
 *
 * Paths listed in `unreadable` failed to read this run: they are left out of
 * every bucket, and in particular are not reported as deleted, so their
 * prior hash survives until a run can read them again.
 */
export function classify(
  scan: Iterable<ScannedFile>,
  prior: ReadonlyMap<string, string>,
  unreadable: ReadonlySet<string> = new Set(),
): Classification {
  const out: Classification = { new: [], modified: [], unchanged: [], deleted: [] };
  const seen = new Set<string>();
  for (const file of scan) {
    if (unreadable.has(file.path) || seen.has(file.path)) continue;
    seen.add(file.path);
    const before = prior.get(file.path);
    if (before === undefined) out.new.push(file.path);
    else if (before !== file.hash) out.modified.push(file.path);
    else out.unchanged.push(file.path);
  }
  for (const p of prior.keys()) {
    if (!seen.has(p) && !unreadable.has(p)) out.deleted.push(p);
  }
  return out;
}
