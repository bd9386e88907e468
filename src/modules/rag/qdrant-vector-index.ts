import { createHash } from "node:crypto";
import type { PointFilter, ScoredPoint, VectorStoreClient } from "../../clients/vector-store-client.js";
import { DimensionMismatchError } from "../providers/errors.js";
import type { ChunkOrigin, DocumentChunk, RetrievedChunk, VectorIndex, VectorQueryOptions } from "./types.js";

export interface QdrantVectorIndexOptions {
  collection: string;
  dimensions: number;
}

/** A ready client, or a function that resolves one on every call. */
export type VectorStoreSource = VectorStoreClient | (() => Promise<VectorStoreClient>);

/**
 * Qdrant accepts UUIDs or integers as point ids. Hashing the chunk id keeps
 * the mapping stable, so re-ingesting a chunk overwrites its point.
 */
export const pointIdFor = (chunkId: string): string => {
  const hex = createHash("sha256").update(chunkId).digest("hex");
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join("-");
};

const originFilter = (origin: ChunkOrigin | undefined): PointFilter | undefined =>
  origin ? { must: [{ key: "origin", match: { value: origin } }] } : undefined;

const clampScore = (score: number): number => {
  if (!Number.isFinite(score) || score < 0) {
    return 0;
  }
  return score > 1 ? 1 : score;
};

const stringifyPayload = (payload: Record<string, unknown>): Record<string, string> => {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (key === "text" || value === undefined || value === null) {
      continue;
    }
    metadata[key] = typeof value === "string" ? value : String(value);
  }
  return metadata;
};

const toRetrievedChunk = (point: ScoredPoint): RetrievedChunk | null => {
  const text = point.payload.text;
  const sourceId = point.payload.source_id;
  if (typeof text !== "string" || typeof sourceId !== "string") {
    return null;
  }
  const chunkId = point.payload.chunk_id;

  return {
    source_id: sourceId,
    chunk_id: typeof chunkId === "string" ? chunkId : String(point.id),
    text,
    score: clampScore(point.score),
    metadata: stringifyPayload(point.payload)
  };
};

/**
 * Cosine-similarity index over one Qdrant collection. Chunk text and metadata
 * are stored in the point payload; `origin` separates seeded reference
 * material from user uploads.
 */
export class QdrantVectorIndex implements VectorIndex {
  readonly dimensions: number;
  private readonly collection: string;

  constructor(
    private readonly source: VectorStoreSource,
    options: QdrantVectorIndexOptions
  ) {
    this.collection = options.collection;
    this.dimensions = options.dimensions;
  }

  async initialize(): Promise<void> {
    const client = await this.client();
    const existingSize = await client.getCollectionVectorSize(this.collection);
    if (existingSize === null) {
      await client.createCollection(this.collection, this.dimensions);
      return;
    }
    if (existingSize !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, existingSize, `collection ${this.collection}`);
    }
  }

  async insert(chunks: DocumentChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }
    for (const chunk of chunks) {
      this.assertDimensions(chunk.embedding, `chunk ${chunk.id}`);
    }

    const client = await this.client();
    await client.upsert(
      this.collection,
      chunks.map((chunk) => ({
        id: pointIdFor(chunk.id),
        vector: chunk.embedding,
        payload: { ...chunk.metadata, chunk_id: chunk.id, text: chunk.text }
      }))
    );
  }

  async query(vector: number[], options: VectorQueryOptions): Promise<RetrievedChunk[]> {
    this.assertDimensions(vector, "query vector");
    const client = await this.client();
    if (!(await client.collectionExists(this.collection))) {
      return [];
    }

    const points = await client.search(this.collection, {
      vector,
      limit: Math.max(1, options.topK),
      filter: originFilter(options.origin)
    });

    return points
      .map(toRetrievedChunk)
      .filter((chunk): chunk is RetrievedChunk => chunk !== null)
      .sort((a, b) => b.score - a.score);
  }

  async deleteAll(origin?: ChunkOrigin): Promise<void> {
    const client = await this.client();
    if (!(await client.collectionExists(this.collection))) {
      return;
    }
    if (!origin) {
      await client.deleteCollection(this.collection);
      await client.createCollection(this.collection, this.dimensions);
      return;
    }
    await client.delete(this.collection, { must: [{ key: "origin", match: { value: origin } }] });
  }

  async count(origin?: ChunkOrigin): Promise<number> {
    const client = await this.client();
    if (!(await client.collectionExists(this.collection))) {
      return 0;
    }
    return client.count(this.collection, originFilter(origin));
  }

  private async client(): Promise<VectorStoreClient> {
    return typeof this.source === "function" ? this.source() : this.source;
  }

  private assertDimensions(vector: number[], context: string): void {
    if (vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length, context);
    }
  }
}
