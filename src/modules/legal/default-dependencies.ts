import { assistantSettingsFromConfig, config, type AssistantSettings, type Config } from "../../config/index.js";
import { getOpenAIClient } from "../../clients/openai.js";
import { resolveQdrantVectorStore } from "../../clients/qdrant.js";
import { InMemoryHistoryStore } from "../history/in-memory-history-store.js";
import { PostgresHistoryStore } from "../history/postgres-history-store.js";
import type { HistoryStore } from "../history/types.js";
import { HashingEmbeddingProvider } from "../providers/hashing-embedding-provider.js";
import { OpenAIEmbeddingProvider } from "../providers/openai-embedding-provider.js";
import { OpenAIGenerationProvider } from "../providers/openai-generation-provider.js";
import type { EmbeddingProvider, GenerationProvider } from "../providers/types.js";
import { QdrantVectorIndex } from "../rag/qdrant-vector-index.js";
import { createRetriever } from "../rag/retriever.js";
import type { VectorIndex } from "../rag/types.js";
import { LlmClassifier } from "./classifier.js";
import { DocumentQueryHandler } from "./handlers/document-query.js";
import { GeneralHandler } from "./handlers/general.js";
import { SectionExpertHandler } from "./handlers/section-expert.js";
import { LegalQueryRouter } from "./router.js";

export interface AssistantComponents {
  settings: AssistantSettings;
  embeddingProvider: EmbeddingProvider;
  generationProvider: GenerationProvider;
  vectorIndex: VectorIndex;
  historyStore: HistoryStore;
  router: LegalQueryRouter;
}

export interface AssistantOverrides {
  settings?: AssistantSettings;
  embeddingProvider?: EmbeddingProvider;
  generationProvider?: GenerationProvider;
  vectorIndex?: VectorIndex;
  historyStore?: HistoryStore;
}

/** Wires classifier, handlers and router around the given capabilities. */
export const buildAssistant = (
  components: Omit<AssistantComponents, "router">,
  source: Config = config
): AssistantComponents => {
  const { settings, embeddingProvider, generationProvider, vectorIndex, historyStore } = components;
  const retriever = createRetriever({ embeddingProvider, vectorIndex, settings });
  const sectionExpert = new SectionExpertHandler({
    retriever,
    generationProvider,
    settings,
    model: source.OPENAI_MODEL
  });

  const router = new LegalQueryRouter({
    classifier: new LlmClassifier({
      generationProvider,
      settings,
      model: source.OPENAI_CLASSIFIER_MODEL
    }),
    handlers: {
      sectionExpert,
      documentQuery: new DocumentQueryHandler({
        retriever,
        generationProvider,
        settings,
        model: source.OPENAI_MODEL,
        vectorIndex,
        sectionExpert
      }),
      general: new GeneralHandler({ generationProvider, settings, model: source.OPENAI_MODEL })
    },
    historyStore,
    vectorIndex,
    settings
  });

  return { ...components, router };
};

export const createEmbeddingProvider = async (source: Config = config): Promise<EmbeddingProvider> => {
  if (source.EMBEDDING_PROVIDER === "hashing") {
    return new HashingEmbeddingProvider(source.EMBEDDING_DIMENSIONS);
  }
  const { client } = await getOpenAIClient();
  return new OpenAIEmbeddingProvider({
    client,
    model: source.OPENAI_EMBEDDING_MODEL,
    dimensions: source.EMBEDDING_DIMENSIONS
  });
};

export const createVectorIndex = async (source: Config = config): Promise<VectorIndex> =>
  new QdrantVectorIndex(resolveQdrantVectorStore, {
    collection: source.QDRANT_COLLECTION,
    dimensions: source.EMBEDDING_DIMENSIONS
  });

export const createHistoryStore = (source: Config = config): HistoryStore =>
  source.HISTORY_BACKEND === "postgres"
    ? new PostgresHistoryStore(source.HISTORY_MAX_TURNS)
    : new InMemoryHistoryStore(source.HISTORY_MAX_TURNS);

/** Composition root used by the server and scripts; any part can be overridden. */
export const createDefaultAssistant = async (
  overrides: AssistantOverrides = {},
  source: Config = config
): Promise<AssistantComponents> => {
  const settings = overrides.settings ?? assistantSettingsFromConfig(source);
  const generationProvider =
    overrides.generationProvider ??
    new OpenAIGenerationProvider({ client: (await getOpenAIClient()).client, model: source.OPENAI_MODEL });
  const embeddingProvider = overrides.embeddingProvider ?? (await createEmbeddingProvider(source));
  const vectorIndex = overrides.vectorIndex ?? (await createVectorIndex(source));
  const historyStore = overrides.historyStore ?? createHistoryStore(source);

  return buildAssistant({ settings, embeddingProvider, generationProvider, vectorIndex, historyStore }, source);
};
