import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { lazySingleton, probeHealth, retryOnStartup, type ClientHealth } from "./client-support.js";
import { createLocalVectorStoreClient } from "./local-vector-store.js";
import type { VectorStoreClient } from "./vector-store-client.js";

export interface QdrantSingleton {
  client: VectorStoreClient;
  healthCheck: () => Promise<ClientHealth>;
}

const REQUEST_TIMEOUT_MS = 5000;

/**
 * Narrows the Qdrant REST client to VectorStoreClient. Writes wait for the
 * operation to be applied so a subsequent search observes them.
 */
export function createQdrantVectorStoreClient(client: QdrantClient): VectorStoreClient {
  return {
    async listCollections() {
      const result = await client.getCollections();
      return result.collections.map((collection) => collection.name);
    },

    async collectionExists(name) {
      const result = await client.collectionExists(name);
      return result.exists;
    },

    async getCollectionVectorSize(name) {
      const result = await client.collectionExists(name);
      if (!result.exists) {
        return null;
      }
      const info = await client.getCollection(name);
      const vectors = info.config.params.vectors;
      if (vectors && "size" in vectors && typeof vectors.size === "number") {
        return vectors.size;
      }
      return null;
    },

    async createCollection(name, vectorSize) {
      await client.createCollection(name, {
        vectors: { size: vectorSize, distance: "Cosine" }
      });
    },

    async deleteCollection(name) {
      await client.deleteCollection(name);
    },

    async search(name, request) {
      const points = await client.search(name, {
        vector: request.vector,
        limit: request.limit,
        filter: request.filter,
        with_payload: true
      });
      return points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: point.payload ?? {}
      }));
    },

    async upsert(name, points) {
      await client.upsert(name, { wait: true, points });
    },

    async delete(name, filter) {
      await client.delete(name, { wait: true, filter });
    },

    async count(name, filter) {
      const result = await client.count(name, { filter, exact: true });
      return result.count;
    }
  };
}

const qdrant = lazySingleton<QdrantSingleton>(async () => {
  // Local mode without QDRANT_URL keeps vectors in a JSON file beside the app.
  if (config.APP_MODE === "local" && !config.QDRANT_URL) {
    const localClient = createLocalVectorStoreClient();
    logInfo("clients.qdrant.ready", {}, { backend: "local-file" });
    return {
      client: localClient,
      healthCheck: () => probeHealth(() => localClient.listCollections(), "local file vector store")
    };
  }

  const url = config.QDRANT_URL;
  if (!url) {
    throw new Error("QDRANT_URL is required to connect to Qdrant.");
  }

  const client = new QdrantClient({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });
  await retryOnStartup(() => client.getCollections(), { attempts: 3, delayMs: 250 });
  logInfo("clients.qdrant.ready", {}, { backend: "qdrant" });

  return {
    client: createQdrantVectorStoreClient(client),
    healthCheck: () => probeHealth(() => client.collectionExists(config.QDRANT_COLLECTION))
  };
});

export const getQdrantClient = (): Promise<QdrantSingleton> => qdrant.get();

/**
 * Defers connecting until the first index call, so an unreachable server
 * surfaces as a failed call rather than a failed start.
 */
export const resolveQdrantVectorStore = async (): Promise<VectorStoreClient> => (await qdrant.get()).client;

export async function shutdownQdrantClient(): Promise<void> {
  if (!qdrant.current()) {
    return;
  }
  qdrant.reset();
  logInfo("clients.qdrant.closed", {});
}

export function resetQdrantClientForTests(): void {
  qdrant.reset();
}
