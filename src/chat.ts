import path from "node:path";
import type { Turn } from "./conversation";
import { errorMessage, InvalidRequestError } from "./errors";
import type { ChatEvent, SourceRef } from "./events";
import type { GenerationClient, GenerationRequest } from "./generation";
import type { RetrievalResult, Retriever } from "./retriever";

export const SYSTEM_PROMPT = [
  "You are a documentation assistant answering questions about a local document collection.",
  "Answer only from the provided context and the conversation so far.",
  "Cite the file name of every source you rely on, e.g. [auth.md].",
  "If the context does not contain the answer, say so plainly instead of guessing.",
].join(" ");

const NO_CONTEXT = "(no indexed documents matched this question)";

/** Sources block as it appears in the prompt, one provenance header per chunk. */
export function formatContext(sources: readonly RetrievalResult[]): string {
  if (!sources.length) return NO_CONTEXT;
  return sources
    .map((s) => `Source: ${path.basename(s.filePath)} (${s.filePath}, chunk ${s.chunkIndex})\n${s.text}`)
    .join("\n\n");
}

/** Build the generation request: system role, prior turns, then the grounded question. */
export function buildPrompt(
  query: string,
  sources: readonly RetrievalResult[],
  history: readonly Turn[],
  maxTokens: number,
): GenerationRequest {
  const question = `Based on the following documentation context, please answer the question.

Context:
${formatContext(sources)}

Question: ${query}

Please cite which files you're referencing in your answer.`;
  return {
    system: SYSTEM_PROMPT,
    messages: [
      ...history.map((t) => ({ role: t.role, content: t.text })),
      { role: "user", content: question },
    ],
    maxTokens,
  };
}

export function toSourceRefs(sources: readonly RetrievalResult[]): SourceRef[] {
  return sources.map((s) => ({
    file: path.basename(s.filePath),
    path: s.filePath,
    chunk: s.chunkIndex,
    score: Number(s.score.toFixed(4)),
  }));
}

export interface ChatServiceOptions {
  retriever: Retriever;
  generator: GenerationClient;
  topK?: number;
  maxTokens?: number;
}

/**
 * Conversation orchestrator. Emits exactly one `sources` record, then the
 * generator's text fragments as `content` records, then `done`. A failure
 * ends the sequence with `error` instead; content already emitted stays.
 */
export class ChatService {
  private readonly retriever: Retriever;
  private readonly generator: GenerationClient;
  private readonly topK: number;
  private readonly maxTokens: number;

  public constructor(opts: ChatServiceOptions) {
    this.retriever = opts.retriever;
    this.generator = opts.generator;
    this.topK = opts.topK ?? 5;
    this.maxTokens = opts.maxTokens ?? 2000;
  }

  /**
   * @throws {InvalidRequestError} Synchronously-checked empty query, before
   * the first record is produced.
   */
  public respond(query: string, history: readonly Turn[], signal?: AbortSignal): AsyncGenerator<ChatEvent> {
    if (!query.trim()) throw new InvalidRequestError("Missing query");
    return this.run(query.trim(), history, signal);
  }

  private async *run(query: string, history: readonly Turn[], signal?: AbortSignal): AsyncGenerator<ChatEvent> {
    let sources: RetrievalResult[];
    try {
      sources = await this.retriever.retrieve(query, this.topK);
    } catch (e) {
      console.error(`[RAG] Retrieval failed:`, e);
      yield { type: "error", data: { message: `Retrieval failed: ${errorMessage(e)}` } };
      return;
    }
    yield { type: "sources", data: toSourceRefs(sources) };

    const request = buildPrompt(query, sources, history, this.maxTokens);
    try {
      for await (const fragment of this.generator.stream(request, signal)) {
        if (signal?.aborted) return;
        yield { type: "content", data: fragment };
      }
    } catch (e) {
      if (signal?.aborted) return;
      console.error(`[RAG] Generation stream failed:`, e);
      yield { type: "error", data: { message: `Generation failed: ${errorMessage(e)}` } };
      return;
    }
    yield { type: "done", data: {} };
  }
}
