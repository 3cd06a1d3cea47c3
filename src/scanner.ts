import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { hashBytes, type ScannedFile } from "./change-detector";
import { errorMessage, InvalidDirectoryError } from "./errors";
import { mapWithConcurrency } from "./pool";

export interface DiscoverOptions {
  /** File extensions WITHOUT leading dot, matched case-insensitively. */
  allowedExt: readonly string[];
  /** Folder names pruned at any depth. */
  excludedFolders: readonly string[];
}

/** A readable file with its decoded text. */
export interface ScannedContent extends ScannedFile {
  text: string;
}

export interface ScanFailure {
  path: string;
  message: string;
}

export interface ScanResult {
  files: ScannedContent[];
  failures: ScanFailure[];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Resolve a user supplied root to its canonical absolute path.
 *
 * @throws {InvalidDirectoryError} When it does not exist or is not a directory.
 */
export async function resolveRoot(directory: string): Promise<string> {
  let real: string;
  try {
    real = await fs.realpath(path.resolve(directory));
  } catch {
    throw new InvalidDirectoryError(directory, "does not exist");
  }
  const st = await fs.stat(real);
  if (!st.isDirectory()) throw new InvalidDirectoryError(directory, "not a directory");
  return real;
}

/** Every allow-listed file under `root`, as sorted absolute paths. */
export async function discoverFiles(root: string, opts: DiscoverOptions): Promise<string[]> {
  if (!opts.allowedExt.length) return [];
  const exts = opts.allowedExt.map((e) => e.replace(/^\./, ""));
  const pattern = exts.length === 1 ? `**/*.${exts[0]}` : `**/*.{${exts.join(",")}}`;
  const files = await fg(pattern, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: false,
    ignore: opts.excludedFolders.map((name) => `**/${name}/**`),
  });
  return files.map((f) => path.normalize(f)).sort();
}

/**
 * Read, hash and decode files with a bounded number of concurrent reads.
 * Unreadable or non UTF-8 files are reported as failures, never thrown.
 */
export async function readFiles(
  paths: readonly string[],
  workers: number,
  signal?: AbortSignal,
): Promise<ScanResult> {
  const outcomes = await mapWithConcurrency(
    paths,
    workers,
    async (p): Promise<ScannedContent | ScanFailure> => {
      try {
        const bytes = await fs.readFile(p);
        return { path: p, hash: hashBytes(bytes), text: utf8.decode(bytes) };
      } catch (e) {
        return { path: p, message: errorMessage(e) };
      }
    },
    signal,
  );
  const files: ScannedContent[] = [];
  const failures: ScanFailure[] = [];
  for (const o of outcomes) {
    if ("hash" in o) files.push(o);
    else failures.push(o);
  }
  return { files, failures };
}
