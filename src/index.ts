/**
 * Application entry point.
 *
 * 1. Load configuration (dotenv + environment knobs).
 * 2. Point the transformers model cache at its directory, then load the
 *    embedding model eagerly so the first request does not pay for it.
 * 3. Hydrate the vector store from INDEX_STORE_PATH (empty when nothing was
 *    saved yet, the saved profile no longer matches, or the artifacts are
 *    corrupt; in the last case index runs report fatal_error).
 * 4. Wire indexer, retriever and chat service and start the HTTP transport.
 *
 * Indexing is not run at startup: clients trigger it through POST /api/index.
 */
import { AnthropicGenerationClient } from "./generation";
import { ChatService } from "./chat";
import { getConfig } from "./config";
import { ConversationStore } from "./conversation";
import { configureModelCache, Embeddings } from "./embeddings";
import { Indexer } from "./indexer";
import { Persistence } from "./persistence";
import { Retriever } from "./retriever";
import { IndexRunLock, StatusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { VectorStore } from "./vector-store";

const config = getConfig();

await configureModelCache(config.TRANSFORMERS_CACHE).catch((e: unknown) =>
  console.error("[RAG] Could not prepare the model cache directory:", e),
);

const embeddings = new Embeddings(config.MODEL_NAME);
await embeddings.init();

const status = new StatusManager({ storePath: config.INDEX_STORE_PATH });
status.setModelName(embeddings.getModelName());

const store = new VectorStore({
  profile: {
    modelName: embeddings.getModelName(),
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
  },
  persistence: new Persistence(config.INDEX_STORE_PATH, config.VERBOSE),
});
await store.hydrate();

const indexer = new Indexer({
  store,
  embedder: embeddings,
  allowedExt: config.ALLOWED_EXT,
  excludedFolders: config.EXCLUDED_FOLDERS,
  batchSize: config.EMBED_BATCH_SIZE,
  acceleratedBatchSize: config.EMBED_BATCH_SIZE_ACCELERATED,
  embedWorkers: config.EMBED_WORKERS,
  readWorkers: config.READ_WORKERS,
  minParallelChunks: config.MIN_PARALLEL_CHUNKS,
  lock: new IndexRunLock(),
  status,
  verbose: config.VERBOSE,
});

const retriever = new Retriever(store, embeddings, config.TOP_K);

if (!config.ANTHROPIC_API_KEY) {
  console.error("[RAG] ANTHROPIC_API_KEY is not set; /api/chat will report generation errors.");
}
const chat = new ChatService({
  retriever,
  generator: new AnthropicGenerationClient({
    apiKey: config.ANTHROPIC_API_KEY,
    model: config.GENERATION_MODEL,
  }),
  topK: config.TOP_K,
  maxTokens: config.MAX_TOKENS,
});

await startHttpTransport(
  {
    indexer,
    chat,
    store,
    retriever,
    status,
    conversations: new ConversationStore(config.MAX_HISTORY_TURNS),
  },
  {
    host: config.HOST,
    port: config.PORT,
    allowedHosts: config.ALLOWED_HOSTS,
    dnsRebindingProtection: config.DNS_REBINDING_PROTECTION,
  },
);
