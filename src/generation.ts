import Anthropic from "@anthropic-ai/sdk";

export interface GenerationMessage {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationRequest {
  system: string;
  messages: GenerationMessage[];
  maxTokens: number;
}

/** Streaming text generation backend. Fragments are yielded as produced. */
export interface GenerationClient {
  stream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<string>;
}

export interface AnthropicGenerationOptions {
  apiKey?: string;
  model: string;
}

/** Claude Messages API, streamed; only text deltas are forwarded. */
export class AnthropicGenerationClient implements GenerationClient {
  private readonly client: Anthropic;
  private readonly model: string;

  public constructor(opts: AnthropicGenerationOptions) {
    this.client = new Anthropic({ apiKey: opts.apiKey });
    this.model = opts.model;
  }

  public async *stream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<string> {
    const stream = this.client.messages.stream(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        system: request.system,
        messages: request.messages,
      },
      { signal },
    );
    for await (const event of stream) {
      if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
        yield event.delta.text;
      }
    }
  }
}
