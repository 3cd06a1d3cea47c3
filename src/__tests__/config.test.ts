import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_ALLOWED_EXT, DEFAULT_EXCLUDED_FOLDERS, getConfig } from "../config";

describe("getConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("falls back to defaults for an empty environment", () => {
    const config = getConfig({});
    expect(config).toMatchObject({
      CHUNK_SIZE: 1000,
      CHUNK_OVERLAP: 200,
      EMBED_BATCH_SIZE: 32,
      EMBED_BATCH_SIZE_ACCELERATED: 128,
      EMBED_WORKERS: 2,
      READ_WORKERS: 8,
      MIN_PARALLEL_CHUNKS: 256,
      TOP_K: 5,
      MAX_TOKENS: 2000,
      MAX_HISTORY_TURNS: 20,
      MODEL_NAME: "Xenova/all-MiniLM-L6-v2",
      HOST: "127.0.0.1",
      PORT: 8000,
      ALLOWED_HOSTS: [],
      DNS_REBINDING_PROTECTION: true,
      VERBOSE: false,
      ANTHROPIC_API_KEY: undefined,
    });
    expect(config.ALLOWED_EXT).toEqual(DEFAULT_ALLOWED_EXT);
    expect(config.EXCLUDED_FOLDERS).toEqual(DEFAULT_EXCLUDED_FOLDERS);
    expect(config.INDEX_STORE_PATH).toBe(path.resolve("./data/index"));
  });

  it("clamps numeric knobs and ignores garbage", () => {
    const config = getConfig({ TOP_K: "500", EMBED_WORKERS: "abc", READ_WORKERS: "-3", PORT: "0" });
    expect(config.TOP_K).toBe(50);
    expect(config.EMBED_WORKERS).toBe(2);
    expect(config.READ_WORKERS).toBe(8);
    expect(config.PORT).toBe(0);
  });

  it("replaces an overlap that does not fit inside the chunk size", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const config = getConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" });
    expect(config.CHUNK_SIZE).toBe(100);
    expect(config.CHUNK_OVERLAP).toBe(15);
  });

  it("normalizes extension and flag values", () => {
    const config = getConfig({
      ALLOWED_EXT: ".MD, txt,,",
      VERBOSE: "yes",
      ENABLE_DNS_REBINDING_PROTECTION: "false",
      ALLOWED_HOSTS: "docs.internal:8000, localhost",
      ANTHROPIC_API_KEY: " test-secret ",
    });
    expect(config.ALLOWED_EXT).toEqual(["md", "txt"]);
    expect(config.VERBOSE).toBe(true);
    expect(config.DNS_REBINDING_PROTECTION).toBe(false);
    expect(config.ALLOWED_HOSTS).toEqual(["docs.internal:8000", "localhost"]);
    expect(config.ANTHROPIC_API_KEY).toBe("test-secret");
  });
});
