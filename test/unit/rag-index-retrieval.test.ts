import { describe, expect, it, vi } from "vitest";
import { createLocalVectorStoreClient } from "../../src/clients/local-vector-store.js";
import type { VectorStoreClient } from "../../src/clients/vector-store-client.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import { buildRetrievalContextBlock } from "../../src/prompts/index.js";
import { DimensionMismatchError } from "../../src/modules/providers/errors.js";
import { HashingEmbeddingProvider } from "../../src/modules/providers/hashing-embedding-provider.js";
import type { EmbeddingProvider } from "../../src/modules/providers/types.js";
import { buildCitations } from "../../src/modules/rag/citation-builder.js";
import { ingestDocument } from "../../src/modules/rag/ingestion.js";
import { pointIdFor, QdrantVectorIndex } from "../../src/modules/rag/qdrant-vector-index.js";
import { createRetriever } from "../../src/modules/rag/retriever.js";
import { DEFAULT_SPLITTER_OPTIONS, splitText } from "../../src/modules/rag/text-splitter.js";
import type { DocumentChunk, RetrievedChunk, VectorIndex } from "../../src/modules/rag/types.js";
import {
  createTestVectorIndex,
  groundedRetrieval,
  httpError,
  neverSettles,
  SECTION_420_TEXT,
  section420Chunk,
  TEST_DIMENSIONS,
  TEST_SETTINGS
} from "../helpers/assistant-fakes.js";

const chunk = (id: string, embedding: number[], origin: "seed" | "upload" = "seed"): DocumentChunk => ({
  id,
  text: `text of ${id}`,
  embedding,
  metadata: { source_id: `src-${id}`, document_name: `Doc ${id}`, page: 1, chunk_index: 0, origin }
});

const createIndex = (dimensions = 4) => {
  const client = createLocalVectorStoreClient({ filePath: null });
  const index = new QdrantVectorIndex(client, { collection: "legal_chunks", dimensions });
  return { client, index };
};

const stubIndex = (results: RetrievedChunk[]): VectorIndex => ({
  dimensions: TEST_DIMENSIONS,
  initialize: vi.fn(async () => undefined),
  insert: vi.fn(async () => undefined),
  query: vi.fn(async () => results),
  deleteAll: vi.fn(async () => undefined),
  count: vi.fn(async () => results.length)
});

const stubEmbedder = (embed: EmbeddingProvider["embed"]): EmbeddingProvider => ({
  dimensions: TEST_DIMENSIONS,
  embed,
  embedMany: async (texts) => texts.map(() => new Array<number>(TEST_DIMENSIONS).fill(0))
});

const scored = (id: string, score: number): RetrievedChunk => ({
  source_id: `src-${id}`,
  chunk_id: id,
  text: `text of ${id}`,
  score,
  metadata: { document_name: `Doc ${id}` }
});

describe("modules/rag/text-splitter", () => {
  it("splits on words with overlapping context", () => {
    expect(splitText("aa bb cc dd ee", { ...DEFAULT_SPLITTER_OPTIONS, chunkSize: 10, chunkOverlap: 5 })).toEqual([
      "aa bb cc",
      "bb cc dd",
      "cc dd ee"
    ]);
  });

  it("prefers paragraph boundaries", () => {
    expect(
      splitText("First para here.\n\nSecond para here.", { ...DEFAULT_SPLITTER_OPTIONS, chunkSize: 20, chunkOverlap: 0 })
    ).toEqual(["First para here.", "Second para here."]);
  });

  it("falls back to characters when no separator applies", () => {
    expect(splitText("abcdefghijkl", { ...DEFAULT_SPLITTER_OPTIONS, chunkSize: 5, chunkOverlap: 0 })).toEqual([
      "abcde",
      "fghij",
      "kl"
    ]);
  });

  it("returns nothing for blank text and keeps short text whole", () => {
    expect(splitText("  \r\n  ")).toEqual([]);
    expect(splitText(SECTION_420_TEXT)).toEqual([SECTION_420_TEXT]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => splitText("text", { ...DEFAULT_SPLITTER_OPTIONS, chunkSize: 10, chunkOverlap: 10 })).toThrow(
      "chunkOverlap (10) must be smaller than chunkSize (10)"
    );
  });
});

describe("modules/rag/citation-builder", () => {
  it("builds sanitized ids and numeric locations", () => {
    const citations = buildCitations([
      { ...section420Chunk(0.9), source_id: "ipc 420" },
      { ...section420Chunk(0.5), metadata: { document_name: "Notes", page: "two" } }
    ]);

    expect(citations).toEqual([
      {
        id: "ipc_420:ipc-420-c0",
        source_id: "ipc 420",
        chunk_id: "ipc-420-c0",
        document_name: "IPC 420: Cheating",
        page: 1,
        chunk_index: 0,
        score: 0.9
      },
      {
        id: "ipc-420:ipc-420-c0",
        source_id: "ipc-420",
        chunk_id: "ipc-420-c0",
        document_name: "Notes",
        page: undefined,
        chunk_index: undefined,
        score: 0.5
      }
    ]);
  });

  it("suffixes repeated ids", () => {
    const citations = buildCitations([section420Chunk(0.9), section420Chunk(0.8)]);
    expect(citations.map((citation) => citation.id)).toEqual(["ipc-420:ipc-420-c0", "ipc-420:ipc-420-c0:2"]);
  });

  it("renders retrieved chunks as a labelled context block", () => {
    expect(buildRetrievalContextBlock(groundedRetrieval(0.8123))).toBe(
      `Retrieved legal context:\n\n[ipc-420:ipc-420-c0] (IPC 420: Cheating, page 1; score=0.812)\n${SECTION_420_TEXT}`
    );
    expect(
      buildRetrievalContextBlock({ chunks: [], citations: [], bestScore: 0, status: "empty", latencyMs: 0 })
    ).toBe("Retrieved legal context:\n(none)");
  });
});

describe("modules/rag/qdrant-vector-index", () => {
  it("creates the collection once and rejects a mismatched existing size", async () => {
    const { client, index } = createIndex(4);

    await index.initialize();
    await index.initialize();
    await expect(client.getCollectionVectorSize("legal_chunks")).resolves.toBe(4);

    const wider = new QdrantVectorIndex(client, { collection: "legal_chunks", dimensions: 8 });
    await expect(wider.initialize()).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("stores chunk metadata in the payload and returns it as strings", async () => {
    const { index } = createIndex(4);
    await index.initialize();
    await index.insert([chunk("a", [1, 0, 0, 0]), chunk("b", [0, 1, 0, 0]), chunk("c", [-1, 0, 0, 0])]);

    const results = await index.query([1, 0, 0, 0], { topK: 5 });

    expect(results.map((result) => [result.chunk_id, result.score])).toEqual([
      ["a", 1],
      ["b", 0],
      ["c", 0]
    ]);
    expect(results[0]).toEqual({
      source_id: "src-a",
      chunk_id: "a",
      text: "text of a",
      score: 1,
      metadata: {
        source_id: "src-a",
        document_name: "Doc a",
        page: "1",
        chunk_index: "0",
        origin: "seed",
        chunk_id: "a"
      }
    });
  });

  it("filters by origin and counts per origin", async () => {
    const { index } = createIndex(4);
    await index.initialize();
    await index.insert([chunk("seed-1", [1, 0, 0, 0]), chunk("upload-1", [1, 0, 0, 0], "upload")]);

    const uploads = await index.query([1, 0, 0, 0], { topK: 5, origin: "upload" });
    expect(uploads.map((result) => result.chunk_id)).toEqual(["upload-1"]);
    await expect(index.count()).resolves.toBe(2);
    await expect(index.count("upload")).resolves.toBe(1);

    await index.deleteAll("upload");
    await expect(index.count("upload")).resolves.toBe(0);
    await expect(index.count("seed")).resolves.toBe(1);

    await index.deleteAll();
    await expect(index.count()).resolves.toBe(0);
  });

  it("treats a missing collection as empty", async () => {
    const { index } = createIndex(4);

    await expect(index.query([1, 0, 0, 0], { topK: 3 })).resolves.toEqual([]);
    await expect(index.count()).resolves.toBe(0);
    await expect(index.deleteAll()).resolves.toBeUndefined();
  });

  it("rejects vectors of the wrong dimension", async () => {
    const { index } = createIndex(4);
    await index.initialize();

    await expect(index.query([1, 0], { topK: 3 })).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(index.insert([chunk("short", [1, 0])])).rejects.toThrow(
      "chunk short: expected vector dimension 4, received 2"
    );
  });
});

describe("modules/rag/qdrant-vector-index writes", () => {
  it("derives a stable UUID point id from the chunk id", () => {
    const id = pointIdFor("ipc-420-c0");

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(pointIdFor("ipc-420-c0")).toBe(id);
    expect(pointIdFor("ipc-420-c1")).not.toBe(id);
  });

  it("overwrites a chunk that is inserted again", async () => {
    const { index } = createIndex(4);
    await index.initialize();

    await index.insert([chunk("a", [1, 0, 0, 0])]);
    await index.insert([{ ...chunk("a", [0, 1, 0, 0]), text: "revised text of a" }]);

    await expect(index.count()).resolves.toBe(1);
    const results = await index.query([0, 1, 0, 0], { topK: 5 });
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ chunk_id: "a", text: "revised text of a", score: 1 });
  });

  it("keeps every chunk when two documents are ingested concurrently", async () => {
    const embeddingProvider = new HashingEmbeddingProvider(TEST_DIMENSIONS);
    const vectorIndex = createTestVectorIndex();

    await Promise.all([
      ingestDocument({ documentName: "fir.pdf", pages: ["Complaint lodged at the station."] }, { embeddingProvider, vectorIndex }),
      ingestDocument({ documentName: "notice.pdf", pages: ["Notice served on the landlord."] }, { embeddingProvider, vectorIndex })
    ]);

    await expect(vectorIndex.count("upload")).resolves.toBe(2);
  });

  it("resolves the store on every call so a failed connection can recover", async () => {
    const client = createLocalVectorStoreClient({ filePath: null });
    const resolveStore = vi
      .fn<() => Promise<VectorStoreClient>>()
      .mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
      .mockResolvedValue(client);
    const index = new QdrantVectorIndex(resolveStore, { collection: "legal_chunks", dimensions: 4 });

    await expect(index.count()).rejects.toThrow("connect ECONNREFUSED");
    await expect(index.count()).resolves.toBe(0);
    expect(resolveStore).toHaveBeenCalledTimes(2);
  });
});

describe("modules/rag/retriever", () => {
  it("returns an ingested chunk first when queried with its exact text", async () => {
    const embeddingProvider = new HashingEmbeddingProvider(TEST_DIMENSIONS);
    const vectorIndex = createTestVectorIndex();
    await ingestDocument(
      { documentName: "IPC 420: Cheating", sourceId: "ipc-420", origin: "seed", pages: [SECTION_420_TEXT] },
      { embeddingProvider, vectorIndex }
    );
    await ingestDocument(
      { documentName: "Theft", sourceId: "ipc-378", origin: "seed", pages: ["Theft of movable property dishonestly taken"] },
      { embeddingProvider, vectorIndex }
    );

    const retrieve = createRetriever({ embeddingProvider, vectorIndex, settings: TEST_SETTINGS });
    const result = await retrieve({ query: SECTION_420_TEXT, scope: "all" });

    expect(result.status).toBe("grounded");
    expect(result.chunks[0]?.chunk_id).toBe("ipc-420-c0");
    expect(result.chunks[0]?.text).toBe(SECTION_420_TEXT);
    expect(result.bestScore).toBeCloseTo(1, 6);
    expect(result.bestScore).toBeGreaterThanOrEqual(TEST_SETTINGS.relevanceFloor);
  });

  it("reports unavailable when the vector store cannot be reached", async () => {
    const vectorIndex = new QdrantVectorIndex(
      async () => {
        throw new Error("connect ECONNREFUSED 127.0.0.1:6333");
      },
      { collection: "legal_chunks", dimensions: TEST_DIMENSIONS }
    );
    const retrieve = createRetriever({
      embeddingProvider: new HashingEmbeddingProvider(TEST_DIMENSIONS),
      vectorIndex,
      settings: TEST_SETTINGS,
      logWarn: vi.fn()
    });

    await expect(retrieve({ query: "What is Section 420?", scope: "all" })).resolves.toMatchObject({
      status: "unavailable",
      chunks: [],
      bestScore: 0
    });
  });

  it("retrieves an ingested section for a matching question", async () => {
    const embeddingProvider = new HashingEmbeddingProvider(TEST_DIMENSIONS);
    const vectorIndex = createTestVectorIndex();
    await ingestDocument(
      { documentName: "IPC 420: Cheating", sourceId: "ipc-420", origin: "seed", pages: [SECTION_420_TEXT] },
      { embeddingProvider, vectorIndex }
    );
    await ingestDocument(
      { documentName: "Theft", sourceId: "ipc-378", origin: "seed", pages: ["Theft of movable property dishonestly taken"] },
      { embeddingProvider, vectorIndex }
    );

    const retrieve = createRetriever({ embeddingProvider, vectorIndex, settings: TEST_SETTINGS });
    const result = await retrieve({ query: "What is Section 420?", scope: "all" });

    expect(result.status).toBe("grounded");
    expect(result.chunks[0]?.source_id).toBe("ipc-420");
    expect(result.chunks[0]?.chunk_id).toBe("ipc-420-c0");
    expect(result.citations[0]?.id).toBe("ipc-420:ipc-420-c0");
    expect(result.bestScore).toBeGreaterThan(0.3);
    expect(result.bestScore).toBe(result.chunks[0]?.score);
  });

  it("restricts the uploads scope to uploaded chunks", async () => {
    const embeddingProvider = new HashingEmbeddingProvider(TEST_DIMENSIONS);
    const vectorIndex = createTestVectorIndex();
    await ingestDocument(
      { documentName: "IPC 420", sourceId: "ipc-420", origin: "seed", pages: [SECTION_420_TEXT] },
      { embeddingProvider, vectorIndex }
    );

    const retrieve = createRetriever({ embeddingProvider, vectorIndex, settings: TEST_SETTINGS });

    await expect(retrieve({ query: "What is Section 420?", scope: "uploads" })).resolves.toMatchObject({
      status: "empty",
      chunks: [],
      bestScore: 0
    });
  });

  it("drops chunks below the relevance floor and keeps the best score", async () => {
    const vectorIndex = stubIndex([scored("a", 0.5), scored("b", 0.19), scored("c", 0.1)]);
    const recordRetrievalLatency = vi.fn();
    const retrieve = createRetriever({
      embeddingProvider: stubEmbedder(async () => new Array<number>(TEST_DIMENSIONS).fill(0)),
      vectorIndex,
      settings: TEST_SETTINGS,
      now: vi.fn().mockReturnValueOnce(100).mockReturnValueOnce(130),
      recordRetrievalLatency,
      logInfo: vi.fn()
    });

    const result = await retrieve({ query: "q", scope: "all", topK: 3 });

    expect(result.chunks.map((item) => item.chunk_id)).toEqual(["a"]);
    expect(result.bestScore).toBe(0.5);
    expect(result.latencyMs).toBe(30);
    expect(recordRetrievalLatency).toHaveBeenCalledWith(30);
    expect(vectorIndex.query).toHaveBeenCalledWith(expect.any(Array), { topK: 3, origin: undefined });
  });

  it("reports empty when nothing clears the floor", async () => {
    const retrieve = createRetriever({
      embeddingProvider: stubEmbedder(async () => new Array<number>(TEST_DIMENSIONS).fill(0)),
      vectorIndex: stubIndex([scored("a", 0.15)]),
      settings: TEST_SETTINGS,
      logInfo: vi.fn()
    });

    await expect(retrieve({ query: "q", scope: "all" })).resolves.toMatchObject({
      status: "empty",
      chunks: [],
      citations: [],
      bestScore: 0.15
    });
  });

  it("reports unavailable instead of throwing when embedding fails", async () => {
    const logWarn = vi.fn();
    const vectorIndex = stubIndex([]);
    const retrieve = createRetriever({
      embeddingProvider: stubEmbedder(async () => {
        throw httpError(401, "invalid api key");
      }),
      vectorIndex,
      settings: TEST_SETTINGS,
      logWarn
    });

    const result = await retrieve({ query: "q", scope: "all", conversationId: "conv-1" });

    expect(result).toMatchObject({ status: "unavailable", chunks: [], citations: [], bestScore: 0 });
    expect(vectorIndex.query).not.toHaveBeenCalled();
    expect(logWarn).toHaveBeenCalledWith(
      "rag.retrieve.unavailable",
      { requestId: null, conversationId: "conv-1" },
      expect.objectContaining({ scope: "all", error_name: "RetrievalUnavailableError" })
    );
    expect(getMetricsSnapshot().error_rates).toEqual({ retrieval_unavailable: 1 });
  });

  it("reports unavailable when the embedding call times out", async () => {
    const embed = vi.fn((_text: string, _signal?: AbortSignal) => neverSettles<number[]>());
    const retrieve = createRetriever({
      embeddingProvider: stubEmbedder(embed),
      vectorIndex: stubIndex([]),
      settings: { ...TEST_SETTINGS, providerTimeoutMs: 20 },
      logWarn: vi.fn()
    });

    await expect(retrieve({ query: "q", scope: "uploads" })).resolves.toMatchObject({ status: "unavailable" });
    expect(embed).toHaveBeenCalledTimes(1);
  });
});
