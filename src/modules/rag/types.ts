export type ChunkOrigin = "seed" | "upload";

export type ChunkMetadata = {
  source_id: string;
  document_name: string;
  page: number;
  chunk_index: number;
  origin: ChunkOrigin;
  act?: string;
  section?: string;
};

export type DocumentChunk = {
  id: string;
  text: string;
  embedding: number[];
  metadata: ChunkMetadata;
};

export type RetrievedChunk = {
  source_id: string;
  chunk_id: string;
  text: string;
  score: number;
  metadata: Record<string, string>;
};

export type Citation = {
  id: string;
  source_id: string;
  chunk_id: string;
  document_name?: string;
  page?: number;
  chunk_index?: number;
  score: number;
};

export type VectorQueryOptions = {
  topK: number;
  origin?: ChunkOrigin;
};

export interface VectorIndex {
  readonly dimensions: number;
  initialize(): Promise<void>;
  insert(chunks: DocumentChunk[]): Promise<void>;
  query(vector: number[], options: VectorQueryOptions): Promise<RetrievedChunk[]>;
  deleteAll(origin?: ChunkOrigin): Promise<void>;
  count(origin?: ChunkOrigin): Promise<number>;
}

export type RetrievalScope = "all" | "uploads";

export type RetrievalInput = {
  query: string;
  scope: RetrievalScope;
  topK?: number;
  requestId?: string;
  conversationId?: string;
};

export type RetrievalStatus = "grounded" | "empty" | "unavailable";

export type RetrievalResult = {
  chunks: RetrievedChunk[];
  citations: Citation[];
  bestScore: number;
  status: RetrievalStatus;
  latencyMs: number;
};
