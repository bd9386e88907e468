import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config/index.js";
import type { PointFilter, ScoredPoint, VectorPoint, VectorStoreClient } from "./vector-store-client.js";

type StoredCollection = {
  vectorSize: number;
  points: VectorPoint[];
};

const storeFileSchema = z.object({
  collections: z.record(
    z.object({
      vectorSize: z.number().int().positive(),
      points: z.array(
        z.object({
          id: z.string(),
          vector: z.array(z.number()),
          payload: z.record(z.unknown())
        })
      )
    })
  )
});

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined = config.LOCAL_VECTOR_STORE_FILE): string {
  const trimmed = configured?.trim();
  const relative = trimmed && trimmed.length > 0 ? trimmed : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative)
    ? relative
    : path.resolve(process.cwd(), relative);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matchesFilter(payload: Record<string, unknown>, filter?: PointFilter): boolean {
  const must = filter?.must ?? [];
  return must.every((clause) => payload[clause.key] === clause.match.value);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

async function readStore(filePath: string): Promise<Map<string, StoredCollection>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return new Map();
    }
    throw error;
  }

  const parsed = storeFileSchema.parse(JSON.parse(raw));
  return new Map(Object.entries(parsed.collections));
}

async function writeStore(filePath: string, collections: Map<string, StoredCollection>): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify({ collections: Object.fromEntries(collections) }), "utf8");
  await fs.rename(tmpPath, filePath);
}

export interface LocalVectorStoreOptions {
  /** File to persist to; `null` keeps everything in memory. */
  filePath?: string | null;
}

/**
 * Exact cosine search over points held in memory, optionally persisted to a
 * JSON file. Mutations run one at a time, each reading the current collection
 * and swapping in a new points array, so a concurrent search always sees
 * either the old or the new collection.
 */
export function createLocalVectorStoreClient(options: LocalVectorStoreOptions = {}): VectorStoreClient {
  const filePath = options.filePath === undefined ? resolveStorePath() : options.filePath;
  let loaded: Promise<Map<string, StoredCollection>> | null = null;
  let mutations: Promise<void> = Promise.resolve();

  const load = (): Promise<Map<string, StoredCollection>> => {
    if (!loaded) {
      loaded = filePath ? readStore(filePath) : Promise.resolve(new Map());
    }
    return loaded;
  };

  const requireCollection = (collections: Map<string, StoredCollection>, name: string): StoredCollection => {
    const collection = collections.get(name);
    if (!collection) {
      throw new Error(`Collection ${name} does not exist`);
    }
    return collection;
  };

  /** `apply` returns whether it changed anything worth persisting. */
  const mutate = (apply: (collections: Map<string, StoredCollection>) => boolean): Promise<void> => {
    const next = mutations.then(async () => {
      const collections = await load();
      if (apply(collections) && filePath) {
        await writeStore(filePath, collections);
      }
    });
    mutations = next.catch(() => undefined);
    return next;
  };

  return {
    async listCollections() {
      const collections = await load();
      return Array.from(collections.keys());
    },

    async collectionExists(name) {
      const collections = await load();
      return collections.has(name);
    },

    async getCollectionVectorSize(name) {
      const collections = await load();
      return collections.get(name)?.vectorSize ?? null;
    },

    async createCollection(name, vectorSize) {
      await mutate((collections) => {
        if (collections.has(name)) {
          return false;
        }
        collections.set(name, { vectorSize, points: [] });
        return true;
      });
    },

    async deleteCollection(name) {
      await mutate((collections) => collections.delete(name));
    },

    async search(name, request): Promise<ScoredPoint[]> {
      const collection = requireCollection(await load(), name);
      return collection.points
        .filter((point) => matchesFilter(point.payload, request.filter))
        .map((point) => ({
          id: point.id,
          score: cosineSimilarity(point.vector, request.vector),
          payload: point.payload
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(1, request.limit));
    },

    async upsert(name, points) {
      await mutate((collections) => {
        const collection = requireCollection(collections, name);
        const byId = new Map(collection.points.map((point) => [point.id, point]));
        for (const point of points) {
          byId.set(point.id, { id: point.id, vector: point.vector, payload: point.payload });
        }
        collections.set(name, { vectorSize: collection.vectorSize, points: Array.from(byId.values()) });
        return true;
      });
    },

    async delete(name, filter) {
      await mutate((collections) => {
        const collection = requireCollection(collections, name);
        collections.set(name, {
          vectorSize: collection.vectorSize,
          points: collection.points.filter((point) => !matchesFilter(point.payload, filter))
        });
        return true;
      });
    },

    async count(name, filter) {
      const collection = requireCollection(await load(), name);
      return collection.points.filter((point) => matchesFilter(point.payload, filter)).length;
    }
  };
}
