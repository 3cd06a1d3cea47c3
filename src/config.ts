import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the .env at the project root; fall back to the working directory.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch {
    /* fall through to cwd lookup */
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  EMBED_BATCH_SIZE: number;
  EMBED_BATCH_SIZE_ACCELERATED: number;
  EMBED_WORKERS: number;
  READ_WORKERS: number;
  MIN_PARALLEL_CHUNKS: number;
  TOP_K: number;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  MAX_TOKENS: number;
  MAX_HISTORY_TURNS: number;
  GENERATION_MODEL: string;
  ANTHROPIC_API_KEY: string | undefined;
  MODEL_NAME: string;
  TRANSFORMERS_CACHE: string | undefined;
  INDEX_STORE_PATH: string;
  HOST: string;
  PORT: number;
  /** Host[:port] values accepted by the /mcp endpoint; empty means local-only defaults. */
  ALLOWED_HOSTS: string[];
  DNS_REBINDING_PROTECTION: boolean;
  VERBOSE: boolean;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_ALLOWED_EXT = [
  "md",
  "txt",
  "py",
  "cs",
  "js",
  "ts",
  "tsx",
  "json",
  "yaml",
  "yml",
];

export const DEFAULT_EXCLUDED_FOLDERS = [
  "node_modules",
  "dist",
  "build",
  ".git",
  "__pycache__",
  ".venv",
  "venv",
  "target",
  "bin",
  "obj",
  ".cache",
  "coverage",
];

function parseList(raw: string | undefined, fallback: string[]): string[] {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items && items.length ? items : fallback;
}

/** Integer knob with a default and an inclusive clamp; garbage falls back to the default. */
function parseKnob(raw: string | undefined, fallback: number, min: number, max: number): number {
  const trimmed = raw?.trim();
  if (!trimmed) return fallback;
  const n = Number(trimmed);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

function parseBool(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Parse every runtime knob from the environment. Never throws: invalid
 * values fall back to their defaults so a typo cannot keep the server down.
 */
export function getConfig(env: Env = process.env): Config {
  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = parseKnob(env.CHUNK_SIZE, 1000, 1, 8000);
  let CHUNK_OVERLAP = parseKnob(env.CHUNK_OVERLAP, 200, 0, 4000);
  // Overlap must stay below size for forward progress.
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[RAG] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  return {
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    EMBED_BATCH_SIZE: parseKnob(env.EMBED_BATCH_SIZE, 32, 1, 4096),
    EMBED_BATCH_SIZE_ACCELERATED: parseKnob(env.EMBED_BATCH_SIZE_ACCELERATED, 128, 1, 4096),
    EMBED_WORKERS: parseKnob(env.EMBED_WORKERS, 2, 1, 64),
    READ_WORKERS: parseKnob(env.READ_WORKERS, 8, 1, 256),
    MIN_PARALLEL_CHUNKS: parseKnob(env.MIN_PARALLEL_CHUNKS, 256, 0, 1_000_000),
    TOP_K: parseKnob(env.TOP_K, 5, 1, 50),
    // Extensions are compared lower-case, without the leading dot.
    ALLOWED_EXT: parseList(env.ALLOWED_EXT, DEFAULT_ALLOWED_EXT).map((e) =>
      e.toLowerCase().replace(/^\./, ""),
    ),
    // Folder names (not globs) pruned at any depth during traversal.
    EXCLUDED_FOLDERS: parseList(env.EXCLUDED_FOLDERS, DEFAULT_EXCLUDED_FOLDERS),
    MAX_TOKENS: parseKnob(env.MAX_TOKENS, 2000, 1, 64000),
    MAX_HISTORY_TURNS: parseKnob(env.MAX_HISTORY_TURNS, 20, 0, 1000),
    GENERATION_MODEL: env.GENERATION_MODEL?.trim() || "claude-sonnet-4-20250514",
    ANTHROPIC_API_KEY: env.ANTHROPIC_API_KEY?.trim() || undefined,
    MODEL_NAME: env.MODEL_NAME?.trim() || "Xenova/all-MiniLM-L6-v2",
    TRANSFORMERS_CACHE: env.TRANSFORMERS_CACHE?.trim() || undefined,
    INDEX_STORE_PATH: path.resolve(env.INDEX_STORE_PATH?.trim() || "./data/index"),
    HOST: env.HOST?.trim() || "127.0.0.1",
    PORT: parseKnob(env.PORT, 8000, 0, 65535),
    ALLOWED_HOSTS: parseList(env.ALLOWED_HOSTS, []),
    // Stays on unless explicitly disabled.
    DNS_REBINDING_PROTECTION: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true").trim().toLowerCase() !== "false",
    VERBOSE: parseBool(env.VERBOSE),
  };
}
