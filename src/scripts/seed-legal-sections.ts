import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { assistantSettingsFromConfig, config } from "../config/index.js";
import { shutdownQdrantClient } from "../clients/qdrant.js";
import { createEmbeddingProvider, createVectorIndex } from "../modules/legal/default-dependencies.js";
import type { EmbeddingProvider } from "../modules/providers/types.js";
import { clearDocuments, ingestDocument, type IngestionSummary } from "../modules/rag/ingestion.js";
import type { VectorIndex } from "../modules/rag/types.js";
import { logError, logInfo } from "../observability/logger.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultSeedFile = path.resolve(path.dirname(currentFilePath), "../../data/seed/legal-sections.json");

const seedEntrySchema = z.object({
  act: z.string().min(1),
  section: z.string().min(1),
  title: z.string().min(1),
  text: z.string().min(1)
});

export type SeedEntry = z.infer<typeof seedEntrySchema>;

export async function loadSeedEntries(
  filePath: string = defaultSeedFile,
  readFileFn: (filePath: string, encoding: "utf8") => Promise<string> = readFile
): Promise<SeedEntry[]> {
  const raw = await readFileFn(filePath, "utf8");
  return z.array(seedEntrySchema).parse(JSON.parse(raw));
}

export interface SeedDependencies {
  embeddingProvider: EmbeddingProvider;
  vectorIndex: VectorIndex;
  reset?: boolean;
}

/** Loads reference sections as `origin = seed` chunks, one source per section. */
export async function seedLegalSections(entries: SeedEntry[], dependencies: SeedDependencies): Promise<IngestionSummary[]> {
  const { embeddingProvider, vectorIndex } = dependencies;
  await vectorIndex.initialize();
  if (dependencies.reset) {
    await clearDocuments(vectorIndex, "seed");
  }

  const settings = assistantSettingsFromConfig();
  const summaries: IngestionSummary[] = [];
  for (const entry of entries) {
    summaries.push(
      await ingestDocument(
        {
          documentName: `${entry.act} ${entry.section}: ${entry.title}`,
          pages: [entry.text],
          origin: "seed",
          sourceId: `${entry.act}-${entry.section}`.toLowerCase(),
          act: entry.act,
          section: entry.section
        },
        {
          embeddingProvider,
          vectorIndex,
          policy: { timeoutMs: settings.providerTimeoutMs, retryDelayMs: settings.transientRetryDelayMs }
        }
      )
    );
  }
  return summaries;
}

async function main(): Promise<void> {
  const entries = await loadSeedEntries();
  const summaries = await seedLegalSections(entries, {
    embeddingProvider: await createEmbeddingProvider(),
    vectorIndex: await createVectorIndex(),
    reset: process.argv.includes("--reset")
  });
  logInfo("seed.complete", {}, {
    collection: config.QDRANT_COLLECTION,
    section_count: summaries.length,
    chunk_count: summaries.reduce((total, summary) => total + summary.chunk_count, 0)
  });
}

if (process.argv[1] === currentFilePath) {
  main()
    .catch((error: unknown) => {
      logError("seed.failed", {}, { error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    })
    .finally(() => shutdownQdrantClient());
}
