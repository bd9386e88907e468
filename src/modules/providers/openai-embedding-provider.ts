import type { CreateEmbeddingResponse, EmbeddingCreateParams } from "openai/resources/embeddings";
import { DimensionMismatchError } from "./errors.js";
import type { EmbeddingProvider } from "./types.js";

export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams, options?: { signal?: AbortSignal }): Promise<CreateEmbeddingResponse>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  client: EmbeddingsClient;
  model: string;
  dimensions: number;
}

// The embeddings endpoint accepts at most 2048 inputs per request.
const MAX_BATCH_SIZE = 256;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  private readonly client: EmbeddingsClient;
  private readonly model: string;

  constructor(options: OpenAIEmbeddingProviderOptions) {
    this.client = options.client;
    this.model = options.model;
    this.dimensions = options.dimensions;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedMany([text], signal);
    if (!embedding) {
      throw new Error("Embedding response missing vector payload.");
    }
    return embedding;
  }

  async embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let offset = 0; offset < texts.length; offset += MAX_BATCH_SIZE) {
      const batch = texts.slice(offset, offset + MAX_BATCH_SIZE);
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: batch,
          dimensions: this.dimensions
        },
        { signal }
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(`Embedding response returned ${ordered.length} vectors for ${batch.length} inputs.`);
      }
      for (const item of ordered) {
        if (item.embedding.length !== this.dimensions) {
          throw new DimensionMismatchError(this.dimensions, item.embedding.length, `embedding model ${this.model}`);
        }
        vectors.push(item.embedding);
      }
    }

    return vectors;
  }
}
