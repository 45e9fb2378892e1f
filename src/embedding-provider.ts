// Labor Law Assistant - Embedding provider
// Turns text into fixed-length vectors through the OpenAI embeddings API.

import { withTimeout } from "./utils.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI embeddings API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface EmbeddingProvider {
  /** One vector per input text, in input order. */
  embed(texts: string[], model?: string): Promise<number[][]>;
  embedOne(text: string, model?: string): Promise<number[]>;
  readonly defaultModel: string;
}

export interface OpenAIEmbeddingProviderOptions {
  model: string;
  batchSize?: number;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAIEmbeddingsClient;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  readonly defaultModel: string;

  constructor(client: OpenAIEmbeddingsClient, options: OpenAIEmbeddingProviderOptions) {
    this.client = client;
    this.defaultModel = options.model;
    this.batchSize = options.batchSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async embed(texts: string[], model: string = this.defaultModel): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const response = await withTimeout(
        this.client.embeddings.create({ model, input: batch }),
        this.timeoutMs,
        `Embedding batch of ${batch.length}`,
      );
      if (response.data.length !== batch.length) {
        throw new Error(`Embedding API returned ${response.data.length} vectors for ${batch.length} inputs`);
      }
      // Response order is not guaranteed; place by index.
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) {
        vectors.push(item.embedding);
      }
    }
    return vectors;
  }

  async embedOne(text: string, model: string = this.defaultModel): Promise<number[]> {
    const [vector] = await this.embed([text], model);
    return vector;
  }
}
