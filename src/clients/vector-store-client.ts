export type PointFilter = {
  must?: Array<{ key: string; match: { value: string } }>;
};

export type VectorPoint = {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
};

export type ScoredPoint = {
  id: string | number;
  score: number;
  payload: Record<string, unknown>;
};

/**
 * The slice of the Qdrant REST surface the vector index relies on. Implemented
 * by the Qdrant adapter and by the local store used in local mode and tests.
 */
export interface VectorStoreClient {
  listCollections(): Promise<string[]>;
  collectionExists(name: string): Promise<boolean>;
  getCollectionVectorSize(name: string): Promise<number | null>;
  createCollection(name: string, vectorSize: number): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  search(name: string, request: { vector: number[]; limit: number; filter?: PointFilter }): Promise<ScoredPoint[]>;
  upsert(name: string, points: VectorPoint[]): Promise<void>;
  delete(name: string, filter: PointFilter): Promise<void>;
  count(name: string, filter?: PointFilter): Promise<number>;
}
