import { randomUUID } from "node:crypto";
import { logInfo } from "../../observability/logger.js";
import { callWithPolicy, DEFAULT_CALL_POLICY, type CallPolicy } from "../providers/call-policy.js";
import type { EmbeddingProvider } from "../providers/types.js";
import { DEFAULT_SPLITTER_OPTIONS, splitText, type TextSplitterOptions } from "./text-splitter.js";
import type { ChunkOrigin, DocumentChunk, VectorIndex } from "./types.js";

export interface IngestDocumentInput {
  documentName: string;
  /** Page texts in reading order; page numbers are 1-based positions. */
  pages: string[];
  origin?: ChunkOrigin;
  sourceId?: string;
  act?: string;
  section?: string;
  requestId?: string;
}

export interface IngestionSummary {
  source_id: string;
  document_name: string;
  origin: ChunkOrigin;
  page_count: number;
  chunk_count: number;
}

export interface DocumentStats {
  total_chunks: number;
  uploaded_chunks: number;
  seed_chunks: number;
  has_uploads: boolean;
}

export interface IngestionDependencies {
  embeddingProvider: EmbeddingProvider;
  vectorIndex: VectorIndex;
  splitterOptions?: TextSplitterOptions;
  policy?: CallPolicy;
  idSuffix?: () => string;
  logInfo?: typeof logInfo;
}

const resolveDependencies = (dependencies: IngestionDependencies) => ({
  embeddingProvider: dependencies.embeddingProvider,
  vectorIndex: dependencies.vectorIndex,
  splitterOptions: dependencies.splitterOptions ?? DEFAULT_SPLITTER_OPTIONS,
  policy: dependencies.policy ?? DEFAULT_CALL_POLICY,
  idSuffix: dependencies.idSuffix ?? (() => randomUUID().slice(0, 8)),
  logInfo: dependencies.logInfo ?? logInfo
});

export const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "") || "document";

export const ingestDocument = async (
  input: IngestDocumentInput,
  dependencies: IngestionDependencies
): Promise<IngestionSummary> => {
  const resolved = resolveDependencies(dependencies);
  const origin = input.origin ?? "upload";
  const sourceId = input.sourceId ?? `${slugify(input.documentName)}-${resolved.idSuffix()}`;

  const pending: Array<Omit<DocumentChunk, "embedding">> = [];
  input.pages.forEach((pageText, pageIndex) => {
    for (const text of splitText(pageText, resolved.splitterOptions)) {
      const chunkIndex = pending.length;
      pending.push({
        id: `${sourceId}-c${chunkIndex}`,
        text,
        metadata: {
          source_id: sourceId,
          document_name: input.documentName,
          page: pageIndex + 1,
          chunk_index: chunkIndex,
          origin,
          act: input.act,
          section: input.section
        }
      });
    }
  });

  if (pending.length > 0) {
    const embeddings = await callWithPolicy(
      (signal) => resolved.embeddingProvider.embedMany(pending.map((chunk) => chunk.text), signal),
      resolved.policy,
      "document embedding"
    );
    await resolved.vectorIndex.initialize();
    await resolved.vectorIndex.insert(
      pending.map((chunk, index) => ({ ...chunk, embedding: embeddings[index] }))
    );
  }

  const summary: IngestionSummary = {
    source_id: sourceId,
    document_name: input.documentName,
    origin,
    page_count: input.pages.length,
    chunk_count: pending.length
  };
  resolved.logInfo("rag.ingest.complete", { requestId: input.requestId ?? null }, { ...summary });
  return summary;
};

export const clearDocuments = async (vectorIndex: VectorIndex, origin?: ChunkOrigin): Promise<void> => {
  await vectorIndex.deleteAll(origin);
};

export const documentStats = async (vectorIndex: VectorIndex): Promise<DocumentStats> => {
  const [total, uploaded, seed] = await Promise.all([
    vectorIndex.count(),
    vectorIndex.count("upload"),
    vectorIndex.count("seed")
  ]);
  return {
    total_chunks: total,
    uploaded_chunks: uploaded,
    seed_chunks: seed,
    has_uploads: uploaded > 0
  };
};
