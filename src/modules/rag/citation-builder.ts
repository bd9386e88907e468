import type { Citation, RetrievedChunk } from "./types.js";

const sanitizeIdPart = (value: string): string =>
  value.replace(/[^a-zA-Z0-9_-]/g, "_");

const readInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
};

export const buildCitations = (chunks: RetrievedChunk[]): Citation[] => {
  const seen = new Map<string, number>();

  return chunks.map((chunk) => {
    const baseId = `${sanitizeIdPart(chunk.source_id)}:${sanitizeIdPart(chunk.chunk_id)}`;
    const currentCount = seen.get(baseId) ?? 0;
    seen.set(baseId, currentCount + 1);
    const suffix = currentCount === 0 ? "" : `:${currentCount + 1}`;

    return {
      id: `${baseId}${suffix}`,
      source_id: chunk.source_id,
      chunk_id: chunk.chunk_id,
      document_name: chunk.metadata.document_name,
      page: readInteger(chunk.metadata.page),
      chunk_index: readInteger(chunk.metadata.chunk_index),
      score: chunk.score
    };
  });
};
