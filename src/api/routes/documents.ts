import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { clearDocuments, documentStats, ingestDocument } from "../../modules/rag/ingestion.js";
import { logInfo } from "../../observability/logger.js";
import { resolveRequestId, toValidationError, type AssistantGetter } from "./request-helpers.js";

const ingestBodySchema = z
  .object({
    document_name: z.string().trim().min(1, "document_name is required"),
    pages: z.array(z.string()).optional(),
    text: z.string().optional()
  })
  .refine((value) => (value.pages?.some((page) => page.trim().length > 0) ?? false) || (value.text?.trim().length ?? 0) > 0, {
    message: "Either pages or text must contain document content",
    path: ["pages"]
  });

const clearQuerySchema = z.object({
  scope: z.enum(["uploads", "all"]).default("uploads")
});

export interface DocumentRoutesDependencies {
  getAssistant: AssistantGetter;
}

export async function registerDocumentRoutes(app: FastifyInstance, dependencies: DocumentRoutesDependencies): Promise<void> {
  app.post("/documents", async (request, reply) => {
    const parsed = ingestBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "body");
    }

    const { embeddingProvider, vectorIndex, settings } = await dependencies.getAssistant();
    const summary = await ingestDocument(
      {
        documentName: parsed.data.document_name,
        pages: parsed.data.pages ?? [parsed.data.text ?? ""],
        origin: "upload",
        requestId: resolveRequestId(request)
      },
      {
        embeddingProvider,
        vectorIndex,
        policy: { timeoutMs: settings.providerTimeoutMs, retryDelayMs: settings.transientRetryDelayMs }
      }
    );

    reply.code(201);
    return summary;
  });

  app.get("/documents/stats", async () => {
    const { vectorIndex } = await dependencies.getAssistant();
    return documentStats(vectorIndex);
  });

  app.delete("/documents", async (request, reply) => {
    const parsed = clearQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "query");
    }

    const { vectorIndex } = await dependencies.getAssistant();
    await clearDocuments(vectorIndex, parsed.data.scope === "uploads" ? "upload" : undefined);
    logInfo("documents.cleared", { requestId: resolveRequestId(request) }, { scope: parsed.data.scope });
    return { status: "ok", scope: parsed.data.scope };
  });
}
