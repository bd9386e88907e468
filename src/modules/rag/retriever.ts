import type { AssistantSettings } from "../../config/index.js";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordRetrievalLatency } from "../../observability/metrics.js";
import { callWithPolicy } from "../providers/call-policy.js";
import { RetrievalUnavailableError } from "../providers/errors.js";
import type { EmbeddingProvider } from "../providers/types.js";
import { buildCitations } from "./citation-builder.js";
import type { RetrievalInput, RetrievalResult, RetrievedChunk, VectorIndex } from "./types.js";

export type RetrieverSettings = Pick<
  AssistantSettings,
  "retrievalTopK" | "relevanceFloor" | "providerTimeoutMs" | "transientRetryDelayMs"
>;

export interface RetrieverDependencies {
  embeddingProvider: EmbeddingProvider;
  vectorIndex: VectorIndex;
  settings: RetrieverSettings;
  now?: () => number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export type Retriever = (input: RetrievalInput) => Promise<RetrievalResult>;

const resolveDependencies = (dependencies: RetrieverDependencies) => ({
  embeddingProvider: dependencies.embeddingProvider,
  vectorIndex: dependencies.vectorIndex,
  settings: dependencies.settings,
  now: dependencies.now ?? Date.now,
  recordRetrievalLatency: dependencies.recordRetrievalLatency ?? recordRetrievalLatency,
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn
});

/**
 * Embeds the query and returns the top-K chunks at or above the relevance
 * floor. Never throws: an embedding or index failure yields status
 * "unavailable" with no chunks.
 */
export const createRetriever = (dependencies: RetrieverDependencies): Retriever => {
  const resolved = resolveDependencies(dependencies);
  const policy = {
    timeoutMs: resolved.settings.providerTimeoutMs,
    retryDelayMs: resolved.settings.transientRetryDelayMs
  };

  return async (input) => {
    const startedAt = resolved.now();
    const correlation = {
      requestId: input.requestId ?? null,
      conversationId: input.conversationId ?? null
    };
    const topK = Math.max(1, input.topK ?? resolved.settings.retrievalTopK);
    const origin = input.scope === "uploads" ? "upload" : undefined;

    let candidates: RetrievedChunk[];
    try {
      const embedding = await callWithPolicy(
        (signal) => resolved.embeddingProvider.embed(input.query, signal),
        policy,
        "embedding"
      );
      candidates = await callWithPolicy(
        () => resolved.vectorIndex.query(embedding, { topK, origin }),
        policy,
        "vector index query"
      );
    } catch (error) {
      const latencyMs = resolved.now() - startedAt;
      const failure = new RetrievalUnavailableError("Retrieval is unavailable.", { cause: error });
      recordErrorRate("retrieval_unavailable");
      resolved.recordRetrievalLatency(latencyMs);
      resolved.logWarn("rag.retrieve.unavailable", correlation, {
        scope: input.scope,
        latency_ms: latencyMs,
        ...serializeError(failure)
      });
      return { chunks: [], citations: [], bestScore: 0, status: "unavailable", latencyMs };
    }

    const chunks = candidates
      .filter((chunk) => chunk.score >= resolved.settings.relevanceFloor)
      .slice(0, topK);
    const bestScore = candidates.length > 0 ? candidates[0].score : 0;
    const latencyMs = resolved.now() - startedAt;
    resolved.recordRetrievalLatency(latencyMs);

    resolved.logInfo("rag.retrieve.complete", correlation, {
      scope: input.scope,
      latency_ms: latencyMs,
      candidate_count: candidates.length,
      result_count: chunks.length,
      best_score: bestScore,
      relevance_floor: resolved.settings.relevanceFloor
    });

    return {
      chunks,
      citations: buildCitations(chunks),
      bestScore,
      status: chunks.length > 0 ? "grounded" : "empty",
      latencyMs
    };
  };
};
