import { createHash } from "node:crypto";
import type { EmbeddingProvider } from "./types.js";

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "how", "in", "is", "it",
  "me", "of", "on", "or", "the", "this", "to", "what", "when", "which", "who", "with"
]);

export const tokenize = (text: string): string[] =>
  (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter((token) => !STOPWORDS.has(token));

const bucketFor = (token: string, dimensions: number): number =>
  createHash("sha256").update(token).digest().readUInt32BE(0) % dimensions;

/**
 * Deterministic bag-of-words embedding using feature hashing. Used when no
 * embedding service is configured (local mode, seeding offline, tests).
 * Texts that share no tokens embed to orthogonal vectors unless their buckets
 * collide.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;

  constructor(dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer, received ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[bucketFor(token, this.dimensions)] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    if (norm === 0) {
      return vector;
    }
    return vector.map((value) => value / norm);
  }
}
